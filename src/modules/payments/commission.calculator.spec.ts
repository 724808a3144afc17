import { calculateCommission } from './commission.calculator';

describe('calculateCommission', () => {
    it('applies the company rate then VAT on the commission', () => {
        // 1,000.00 SAR at 5% with 15% VAT
        expect(calculateCommission(100000, 500, 1500)).toEqual({
            companyCommission: 5000,
            vatOnCommission: 750,
            netToOwner: 94250,
        });
    });

    it('rounds half a halala up', () => {
        expect(calculateCommission(10, 500, 1500)).toEqual({ companyCommission: 1, vatOnCommission: 0, netToOwner: 9 });
        expect(calculateCommission(30, 500, 1500)).toEqual({ companyCommission: 2, vatOnCommission: 0, netToOwner: 28 });
    });

    it('always sums back to the payment', () => {
        for (const amount of [1, 99, 333333, 150050, 987654321]) {
            const result = calculateCommission(amount, 500, 1500);
            expect(result.companyCommission + result.vatOnCommission + result.netToOwner).toBe(amount);
        }
    });

    it('handles an uneven amount', () => {
        expect(calculateCommission(333333, 500, 1500)).toEqual({
            companyCommission: 16667,
            vatOnCommission: 2500,
            netToOwner: 314166,
        });
    });

    it('is a pure function of its inputs', () => {
        expect(calculateCommission(150050, 250, 1500)).toEqual(calculateCommission(150050, 250, 1500));
    });

    it('gives the owner everything at a zero rate', () => {
        expect(calculateCommission(5000, 0, 1500)).toEqual({ companyCommission: 0, vatOnCommission: 0, netToOwner: 5000 });
    });

    it('rejects fractional halalas and negative rates', () => {
        expect(() => calculateCommission(1.5, 500, 1500)).toThrow(RangeError);
        expect(() => calculateCommission(100, -1, 1500)).toThrow(RangeError);
    });
});
