import { PayerType } from '../payments/payer-type.enum';

export type ReportFormat = 'csv' | 'excel' | 'pdf' | 'text';

export const REPORT_FORMATS: readonly ReportFormat[] = ['csv', 'excel', 'pdf', 'text'];

export interface ReportFilter {
    from?: string;
    to?: string;
    projectId?: string;
    ownerId?: string;
    payerType?: PayerType;
}

/** One payment as it appears in a report; money in halalas. */
export interface ReportRow {
    paymentId: string;
    paidOn: string;
    contractNumber: string | null;
    projectId: string | null;
    projectName: string | null;
    unitNumber: string | null;
    ownerName: string | null;
    payerType: PayerType;
    description: string | null;
    amount: number;
    companyCommission: number;
    vatOnCommission: number;
    netToOwner: number;
}

export interface MoneyTotals {
    amount: number;
    companyCommission: number;
    vatOnCommission: number;
    netToOwner: number;
}

export interface Breakdown {
    key: string;
    label: string;
    count: number;
    amount: number;
    companyCommission: number;
}

export interface Growth {
    from: string;
    to: string;
    percentage: number | null;
}

export interface ReportSummary {
    filter: ReportFilter;
    generatedAt: string;
    count: number;
    totals: MoneyTotals;
    averagePayment: number;
    averageCommission: number;
    commissionPercentage: number;
    byPayerType: Record<PayerType, { count: number; amount: number }>;
    byProject: Breakdown[];
    monthly: Breakdown[];
    quarterly: Breakdown[];
    growth: Growth | null;
    topPayments: ReportRow[];
}

export interface RenderedReport {
    content: Buffer;
    contentType: string;
    fileName: string;
}
