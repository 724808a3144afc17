import { ReportRow, MoneyTotals } from '../report.types';
import { fromHalalas } from '../../../common/utils/money.util';

export const PAYMENT_HEADERS = [
    'Date',
    'Contract',
    'Project',
    'Unit',
    'Owner',
    'Payer',
    'Description',
    'Amount (SAR)',
    'Commission (SAR)',
    'VAT (SAR)',
    'Net to owner (SAR)',
];

export type Cell = string | number;

export function paymentCells(row: ReportRow, money: (halalas: number) => Cell): Cell[] {
    return [
        row.paidOn,
        safeText(row.contractNumber),
        safeText(row.projectName),
        safeText(row.unitNumber),
        safeText(row.ownerName),
        row.payerType,
        safeText(row.description),
        money(row.amount),
        money(row.companyCommission),
        money(row.vatOnCommission),
        money(row.netToOwner),
    ];
}

// Spreadsheets run text starting with these as a formula; a leading quote keeps it text
export function safeText(value: string | null): string {
    if (!value) return '';
    return /^[=+\-@\t\r]/.test(value) ? `'${value}` : value;
}

export function totalCells(totals: MoneyTotals, money: (halalas: number) => Cell): Cell[] {
    return ['Total', '', '', '', '', '', '', money(totals.amount), money(totals.companyCommission), money(totals.vatOnCommission), money(totals.netToOwner)];
}

// "1500.00"; no grouping so spreadsheets read it back as a number
export function plainSar(halalas: number): string {
    return fromHalalas(halalas).toFixed(2);
}

export function reportFileStem(now: Date = new Date()): string {
    return `payments-report-${now.toISOString().slice(0, 10)}`;
}
