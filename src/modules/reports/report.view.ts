import { Breakdown, ReportRow, ReportSummary } from './report.types';
import { fromHalalas } from '../../common/utils/money.util';

function breakdownInSar(item: Breakdown): Breakdown {
    return { ...item, amount: fromHalalas(item.amount), companyCommission: fromHalalas(item.companyCommission) };
}

export function rowInSar(row: ReportRow): ReportRow {
    return {
        ...row,
        amount: fromHalalas(row.amount),
        companyCommission: fromHalalas(row.companyCommission),
        vatOnCommission: fromHalalas(row.vatOnCommission),
        netToOwner: fromHalalas(row.netToOwner),
    };
}

// Same shape with money in SAR
export function summaryInSar(summary: ReportSummary): ReportSummary {
    return {
        ...summary,
        totals: {
            amount: fromHalalas(summary.totals.amount),
            companyCommission: fromHalalas(summary.totals.companyCommission),
            vatOnCommission: fromHalalas(summary.totals.vatOnCommission),
            netToOwner: fromHalalas(summary.totals.netToOwner),
        },
        averagePayment: fromHalalas(summary.averagePayment),
        averageCommission: fromHalalas(summary.averageCommission),
        byPayerType: {
            tenant: { ...summary.byPayerType.tenant, amount: fromHalalas(summary.byPayerType.tenant.amount) },
            owner: { ...summary.byPayerType.owner, amount: fromHalalas(summary.byPayerType.owner.amount) },
        },
        byProject: summary.byProject.map(breakdownInSar),
        monthly: summary.monthly.map(breakdownInSar),
        quarterly: summary.quarterly.map(breakdownInSar),
        topPayments: summary.topPayments.map(rowInSar),
    };
}
