/**
 * Live Market Engine - Poisson Distribution
 * Log-space pmf/cdf so that large means (cards, corners, long horizons)
 * neither overflow nor lose the small terms.
 */

import { logAddExp, logFactorial } from './math';

/**
 * P(X = k) for X ~ Poisson(lambda)
 */
export function poissonPmf(k: number, lambda: number): number {
    if (!Number.isInteger(k) || k < 0) return 0;
    if (lambda <= 0) return k === 0 ? 1 : 0;
    return Math.exp(k * Math.log(lambda) - lambda - logFactorial(k));
}

/**
 * P(X <= k) for X ~ Poisson(lambda), accumulated in log space
 */
export function poissonCdf(k: number, lambda: number): number {
    const kk = Math.floor(k);
    if (kk < 0) return 0;
    if (lambda <= 0) return 1;

    const logLambda = Math.log(lambda);
    let logTerm = -lambda;
    let logAcc = logTerm;
    for (let i = 1; i <= kk; i++) {
        logTerm += logLambda - Math.log(i);
        logAcc = logAddExp(logAcc, logTerm);
    }
    return Math.min(1, Math.exp(logAcc));
}

/**
 * P(X >= k)
 */
export function poissonSurvival(k: number, lambda: number): number {
    return 1 - poissonCdf(k - 1, lambda);
}

/**
 * P(at least one event) = 1 - e^-λ
 */
export function probabilityAtLeastOne(lambda: number): number {
    if (lambda <= 0) return 0;
    return -Math.expm1(-lambda);
}
