// Amounts are kept in halalas (1 SAR = 100 halalas) and rates in basis points (1% = 100 bp).

export const HALALAS_PER_SAR = 100;
export const BASIS_POINTS = 10000;

const sarFormatter = new Intl.NumberFormat('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
});

export function toHalalas(sar: number): number {
    return Math.round(sar * HALALAS_PER_SAR);
}

export function fromHalalas(halalas: number): number {
    return halalas / HALALAS_PER_SAR;
}

export function percentToBasisPoints(percent: number): number {
    return Math.round(percent * 100);
}

export function basisPointsToPercent(bp: number): number {
    return bp / 100;
}

/**
 * Integer division rounding halves away from zero.
 * Both operands must be integers and the denominator positive.
 */
export function divideRoundHalfUp(numerator: number, denominator: number): number {
    const sign = numerator < 0 ? -1 : 1;
    const abs = Math.abs(numerator);
    return sign * Math.floor((2 * abs + denominator) / (2 * denominator));
}

export function formatSar(halalas: number): string {
    return sarFormatter.format(fromHalalas(halalas));
}
