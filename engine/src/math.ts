/**
 * Live Market Engine - Math Utilities
 * Pure functions for common calculations
 */

/**
 * Clamp a value between min and max
 */
export function clamp(value: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, value));
}

/**
 * Safe division that returns the fallback if the denominator is 0
 */
export function safeDivide(numerator: number, denominator: number, fallback = 0): number {
    if (denominator === 0 || !Number.isFinite(denominator)) {
        return fallback;
    }
    const result = numerator / denominator;
    return Number.isFinite(result) ? result : fallback;
}

/**
 * Round to N decimal places
 */
export function roundTo(value: number, decimals: number): number {
    const factor = Math.pow(10, decimals);
    return Math.round(value * factor) / factor;
}

/**
 * Sum an array
 */
export function sum(values: number[]): number {
    return values.reduce((a, b) => a + b, 0);
}

/**
 * log(k!) by direct summation; k stays small for goal/card/corner counts
 */
export function logFactorial(k: number): number {
    let result = 0;
    for (let i = 2; i <= k; i++) {
        result += Math.log(i);
    }
    return result;
}

/**
 * log(exp(a) + exp(b)) without overflow
 */
export function logAddExp(a: number, b: number): number {
    if (a === -Infinity) return b;
    if (b === -Infinity) return a;
    const hi = Math.max(a, b);
    return hi + Math.log1p(Math.exp(-Math.abs(a - b)));
}

/**
 * Decimal odds implied by a probability in percent. Null when the outcome is impossible.
 */
export function fairDecimalOdds(probabilityPct: number): number | null {
    if (probabilityPct <= 0) return null;
    return roundTo(100 / probabilityPct, 2);
}
