import { BASIS_POINTS, divideRoundHalfUp } from '../../common/utils/money.util';

export interface CommissionBreakdown {
    companyCommission: number;
    vatOnCommission: number;
    netToOwner: number;
}

/**
 * Splits a payment (halalas) into the company commission, VAT on that commission and
 * the owner's share. Rates are basis points. The three parts always sum to `amount`.
 */
export function calculateCommission(amount: number, companyRateBp: number, vatRateBp: number): CommissionBreakdown {
    if (!Number.isSafeInteger(amount) || amount < 0) {
        throw new RangeError(`Amount must be a non-negative integer number of halalas, got ${amount}`);
    }
    if (!Number.isInteger(companyRateBp) || !Number.isInteger(vatRateBp) || companyRateBp < 0 || vatRateBp < 0) {
        throw new RangeError('Rates must be non-negative integer basis points');
    }

    const companyCommission = divideRoundHalfUp(amount * companyRateBp, BASIS_POINTS);
    const vatOnCommission = divideRoundHalfUp(companyCommission * vatRateBp, BASIS_POINTS);
    return {
        companyCommission,
        vatOnCommission,
        netToOwner: amount - companyCommission - vatOnCommission,
    };
}
