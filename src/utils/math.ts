import BigNumber from 'bignumber.js';

// ═══════════════════════════════════════════════════════════════════════════════
// FIXED-POINT ARITHMETIC
// ═══════════════════════════════════════════════════════════════════════════════
//
// Reserve amounts are integers in the asset's smallest unit. Ratios are carried
// at RATIO_DECIMALS places and rounded toward zero, so chained quotes never pick
// up binary floating-point drift.

export const RATIO_DECIMALS = 18;

export const FixedPoint = BigNumber.clone({
    DECIMAL_PLACES: RATIO_DECIMALS,
    ROUNDING_MODE: BigNumber.ROUND_DOWN,
});

export type FixedPoint = BigNumber;

export const BPS_DENOMINATOR = 10_000;

export const toBigNumber = (value: BigNumber.Value): BigNumber => {
    return new FixedPoint(value);
};

/**
 * True when the value is a finite, non-negative whole number.
 */
export const isNonNegativeInteger = (value: BigNumber): boolean => {
    return value.isFinite() && value.isInteger() && !value.isNegative();
};

/**
 * Constant-product output amount, integer arithmetic, floored:
 * reserveOut·amountIn·(10000−fee) / (reserveIn·10000 + amountIn·(10000−fee))
 */
export const constantProductOut = (
    amountIn: BigNumber,
    reserveIn: BigNumber,
    reserveOut: BigNumber,
    feeBps: number
): BigNumber => {
    const amountInWithFee = amountIn.times(BPS_DENOMINATOR - feeBps);
    const numerator = reserveOut.times(amountInWithFee);
    const denominator = reserveIn.times(BPS_DENOMINATOR).plus(amountInWithFee);
    return numerator.idiv(denominator);
};

/**
 * (numerator / denominator) at RATIO_DECIMALS, rounded toward zero.
 */
export const ratio = (numerator: BigNumber, denominator: BigNumber): BigNumber => {
    return new FixedPoint(numerator).div(denominator);
};

export const clamp = (value: number, min: number, max: number): number => {
    return Math.max(min, Math.min(max, value));
};
