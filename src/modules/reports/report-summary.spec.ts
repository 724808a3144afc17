import { monthOverMonth, summarize } from './report-summary';
import { SAMPLE_ROWS } from '../../../test/utils/report-rows';

describe('summarize', () => {
    const now = new Date('2024-03-01T08:00:00Z');

    it('totals and averages the rows', () => {
        const summary = summarize(SAMPLE_ROWS, { from: '2024-01-01' }, now);

        expect(summary.filter).toEqual({ from: '2024-01-01' });
        expect(summary.generatedAt).toBe('2024-03-01T08:00:00.000Z');
        expect(summary.count).toBe(3);
        expect(summary.totals).toEqual({ amount: 450000, companyCommission: 22500, vatOnCommission: 3375, netToOwner: 424125 });
        expect(summary.averagePayment).toBe(150000);
        expect(summary.averageCommission).toBe(7500);
        expect(summary.commissionPercentage).toBe(5);
        expect(summary.byPayerType).toEqual({
            tenant: { count: 2, amount: 150000 },
            owner: { count: 1, amount: 300000 },
        });
    });

    it('breaks the rows down by project, month and quarter', () => {
        const summary = summarize(SAMPLE_ROWS, {}, now);

        expect(summary.byProject).toEqual([
            { key: 'olive', label: 'Olive Court', count: 1, amount: 300000, companyCommission: 15000 },
            { key: 'palm', label: 'Palm Towers', count: 2, amount: 150000, companyCommission: 7500 },
        ]);
        expect(summary.monthly).toEqual([
            { key: '2024-01', label: '2024-01', count: 1, amount: 100000, companyCommission: 5000 },
            { key: '2024-02', label: '2024-02', count: 2, amount: 350000, companyCommission: 17500 },
        ]);
        expect(summary.quarterly).toEqual([
            { key: '2024-Q1', label: '2024-Q1', count: 3, amount: 450000, companyCommission: 22500 },
        ]);
        expect(summary.growth).toEqual({ from: '2024-01', to: '2024-02', percentage: 250 });
        expect(summary.topPayments.map(row => row.paymentId)).toEqual(['p-2', 'p-1', 'p-3']);
    });

    it('handles an empty report', () => {
        const summary = summarize([], {}, now);

        expect(summary.count).toBe(0);
        expect(summary.averagePayment).toBe(0);
        expect(summary.commissionPercentage).toBe(0);
        expect(summary.byProject).toEqual([]);
        expect(summary.growth).toBeNull();
    });
});

describe('monthOverMonth', () => {
    const month = (key: string, amount: number) => ({ key, label: key, count: 1, amount, companyCommission: 0 });

    it('compares the two latest months', () => {
        expect(monthOverMonth([month('2024-01', 500), month('2024-02', 300), month('2024-03', 200)]))
            .toEqual({ from: '2024-02', to: '2024-03', percentage: -33.33 });
    });

    it('has no percentage when the earlier month is zero', () => {
        expect(monthOverMonth([month('2024-01', 0), month('2024-02', 100)]))
            .toEqual({ from: '2024-01', to: '2024-02', percentage: null });
    });
});
