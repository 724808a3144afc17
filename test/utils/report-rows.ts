import { PayerType } from '../../src/modules/payments/payer-type.enum';
import { ReportRow } from '../../src/modules/reports/report.types';

export function reportRow(overrides: Partial<ReportRow>): ReportRow {
    return {
        paymentId: 'payment',
        paidOn: '2024-01-01',
        contractNumber: null,
        projectId: null,
        projectName: null,
        unitNumber: null,
        ownerName: null,
        payerType: PayerType.TENANT,
        description: null,
        amount: 0,
        companyCommission: 0,
        vatOnCommission: 0,
        netToOwner: 0,
        ...overrides,
    };
}

export const SAMPLE_ROWS: ReportRow[] = [
    reportRow({
        paymentId: 'p-1', paidOn: '2024-01-15', contractNumber: 'C-1', projectId: 'palm', projectName: 'Palm Towers',
        unitNumber: 'A-1', ownerName: 'Owner A', description: 'Rent, January',
        amount: 100000, companyCommission: 5000, vatOnCommission: 750, netToOwner: 94250,
    }),
    reportRow({
        paymentId: 'p-2', paidOn: '2024-02-10', contractNumber: 'C-2', projectId: 'olive', projectName: 'Olive Court',
        unitNumber: 'B-2', payerType: PayerType.OWNER,
        amount: 300000, companyCommission: 15000, vatOnCommission: 2250, netToOwner: 282750,
    }),
    reportRow({
        paymentId: 'p-3', paidOn: '2024-02-20', contractNumber: 'C-1', projectId: 'palm', projectName: 'Palm Towers',
        unitNumber: 'A-1', ownerName: 'Owner A',
        amount: 50000, companyCommission: 2500, vatOnCommission: 375, netToOwner: 47125,
    }),
];
