import { PayerType } from '../payments/payer-type.enum';
import { Breakdown, Growth, MoneyTotals, ReportFilter, ReportRow, ReportSummary } from './report.types';
import { divideRoundHalfUp } from '../../common/utils/money.util';
import { quarterOf } from '../../common/utils/date-only.util';

const TOP_PAYMENTS = 5;

function round2(value: number): number {
    return Math.round(value * 100) / 100;
}

export function sumRows(rows: ReportRow[]): MoneyTotals {
    return rows.reduce<MoneyTotals>((acc, row) => ({
        amount: acc.amount + row.amount,
        companyCommission: acc.companyCommission + row.companyCommission,
        vatOnCommission: acc.vatOnCommission + row.vatOnCommission,
        netToOwner: acc.netToOwner + row.netToOwner,
    }), { amount: 0, companyCommission: 0, vatOnCommission: 0, netToOwner: 0 });
}

function groupBy(rows: ReportRow[], keyOf: (row: ReportRow) => { key: string; label: string }): Breakdown[] {
    const groups = new Map<string, Breakdown>();
    for (const row of rows) {
        const { key, label } = keyOf(row);
        const group = groups.get(key) ?? { key, label, count: 0, amount: 0, companyCommission: 0 };
        group.count += 1;
        group.amount += row.amount;
        group.companyCommission += row.companyCommission;
        groups.set(key, group);
    }
    return [...groups.values()];
}

/**
 * Change between the two latest months, in percent. Null percentage when the earlier month is zero.
 */
export function monthOverMonth(monthly: Breakdown[]): Growth | null {
    if (monthly.length < 2) return null;
    const previous = monthly[monthly.length - 2];
    const latest = monthly[monthly.length - 1];
    return {
        from: previous.key,
        to: latest.key,
        percentage: previous.amount === 0 ? null : round2(((latest.amount - previous.amount) / previous.amount) * 100),
    };
}

export function summarize(rows: ReportRow[], filter: ReportFilter, now: Date = new Date()): ReportSummary {
    const totals = sumRows(rows);
    const count = rows.length;

    const byPayerType: ReportSummary['byPayerType'] = {
        [PayerType.TENANT]: { count: 0, amount: 0 },
        [PayerType.OWNER]: { count: 0, amount: 0 },
    };
    for (const row of rows) {
        byPayerType[row.payerType].count += 1;
        byPayerType[row.payerType].amount += row.amount;
    }

    const byProject = groupBy(rows, row => ({
        key: row.projectId ?? 'none',
        label: row.projectName ?? 'No project',
    })).sort((a, b) => b.amount - a.amount || a.label.localeCompare(b.label));

    const byPeriod = (a: Breakdown, b: Breakdown) => a.key.localeCompare(b.key);
    const monthly = groupBy(rows, row => ({ key: row.paidOn.slice(0, 7), label: row.paidOn.slice(0, 7) })).sort(byPeriod);
    const quarterly = groupBy(rows, row => ({ key: quarterOf(row.paidOn), label: quarterOf(row.paidOn) })).sort(byPeriod);

    const topPayments = [...rows]
        .sort((a, b) => b.amount - a.amount || b.paidOn.localeCompare(a.paidOn))
        .slice(0, TOP_PAYMENTS);

    return {
        filter,
        generatedAt: now.toISOString(),
        count,
        totals,
        averagePayment: count > 0 ? divideRoundHalfUp(totals.amount, count) : 0,
        averageCommission: count > 0 ? divideRoundHalfUp(totals.companyCommission, count) : 0,
        commissionPercentage: totals.amount > 0 ? round2((totals.companyCommission / totals.amount) * 100) : 0,
        byPayerType,
        byProject,
        monthly,
        quarterly,
        growth: monthOverMonth(monthly),
        topPayments,
    };
}
