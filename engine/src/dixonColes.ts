/**
 * Live Market Engine - Dixon-Coles Module
 *
 * Independent Poisson under-weights correlated low scorelines. The tau
 * factor reweights the four cells (0,0), (1,0), (0,1), (1,1):
 *
 *   τ(0,0) = 1 - λμρ     τ(1,0) = 1 + λρ
 *   τ(0,1) = 1 + μρ      τ(1,1) = 1 - ρ
 *
 * and leaves every other cell at 1. Anything that depends on the joint
 * (BTTS, 1X2, totals) must be summed over the corrected matrix; multiplying
 * per-team marginals afterwards throws the correlation away.
 */

import { poissonPmf } from './poisson';
import type { CorrectScore } from './types';

export type ScoreMatrix = number[][];

export interface ScoreMatrixOptions {
    rho: number;
    maxGoals: number;
    /** false gives plain independent Poisson */
    corrected?: boolean;
}

export interface OutcomeMasses {
    home: number;
    draw: number;
    away: number;
}

export interface HistoricalScore {
    lambdaHome: number;
    lambdaAway: number;
    homeGoals: number;
    awayGoals: number;
}

/**
 * Dixon-Coles tau correction factor, floored at zero
 */
export function tau(i: number, j: number, lambda: number, mu: number, rho: number): number {
    let factor = 1;
    if (i === 0 && j === 0) factor = 1 - lambda * mu * rho;
    else if (i === 1 && j === 0) factor = 1 + lambda * rho;
    else if (i === 0 && j === 1) factor = 1 + mu * rho;
    else if (i === 1 && j === 1) factor = 1 - rho;
    return Math.max(0, factor);
}

/**
 * Joint score distribution matrix[i][j] = P(home = i, away = j), summing to 1
 */
export function buildScoreMatrix(lambda: number, mu: number, options: ScoreMatrixOptions): ScoreMatrix {
    const corrected = options.corrected ?? true;
    const size = options.maxGoals + 1;
    const matrix: ScoreMatrix = [];
    let total = 0;

    for (let i = 0; i < size; i++) {
        const row: number[] = [];
        const pHome = poissonPmf(i, lambda);
        for (let j = 0; j < size; j++) {
            const factor = corrected ? tau(i, j, lambda, mu, options.rho) : 1;
            const p = pHome * poissonPmf(j, mu) * factor;
            row.push(p);
            total += p;
        }
        matrix.push(row);
    }

    if (total > 0) {
        for (const row of matrix) {
            for (let j = 0; j < row.length; j++) row[j] /= total;
        }
    }
    return matrix;
}

/**
 * Corrected mass for a single scoreline (0 outside the matrix)
 */
export function scoreProbability(matrix: ScoreMatrix, i: number, j: number): number {
    return matrix[i]?.[j] ?? 0;
}

/**
 * Sum the cells that satisfy a predicate
 */
export function sumMatrix(matrix: ScoreMatrix, predicate: (i: number, j: number) => boolean): number {
    let total = 0;
    matrix.forEach((row, i) => row.forEach((p, j) => {
        if (predicate(i, j)) total += p;
    }));
    return total;
}

/**
 * P(both sides finish on at least one goal), with goals already scored
 * offsetting the remaining-goals matrix. At 0-0 this is the mass over i>=1, j>=1.
 */
export function bttsProbability(matrix: ScoreMatrix, homeScored = 0, awayScored = 0): number {
    return sumMatrix(matrix, (i, j) => homeScored + i >= 1 && awayScored + j >= 1);
}

/**
 * Final-result masses given the current score and the remaining-goals matrix
 */
export function outcomeMasses(matrix: ScoreMatrix, homeScore = 0, awayScore = 0): OutcomeMasses {
    const masses: OutcomeMasses = { home: 0, draw: 0, away: 0 };
    matrix.forEach((row, i) => row.forEach((p, j) => {
        const diff = homeScore + i - (awayScore + j);
        if (diff > 0) masses.home += p;
        else if (diff === 0) masses.draw += p;
        else masses.away += p;
    }));
    return masses;
}

/**
 * P(final total goals > line)
 */
export function overProbability(matrix: ScoreMatrix, line: number, currentGoals = 0): number {
    return sumMatrix(matrix, (i, j) => currentGoals + i + j > line);
}

/**
 * Most likely remaining scorelines, best first
 */
export function topCorrectScores(matrix: ScoreMatrix, topN = 5, maxPerSide = 5): CorrectScore[] {
    const scores: CorrectScore[] = [];
    for (let i = 0; i <= Math.min(maxPerSide, matrix.length - 1); i++) {
        for (let j = 0; j <= Math.min(maxPerSide, matrix.length - 1); j++) {
            scores.push({ home: i, away: j, probability: scoreProbability(matrix, i, j) });
        }
    }
    return scores
        .sort((a, b) => b.probability - a.probability || a.home - b.home || a.away - b.away)
        .slice(0, topN);
}

/**
 * Fit rho to historical results by log-likelihood over a bounded grid.
 * Small samples return the fallback.
 */
export function estimateRho(
    history: HistoricalScore[],
    options: { fallback: number; maxGoals: number; minSamples?: number; step?: number }
): number {
    const minSamples = options.minSamples ?? 50;
    if (history.length < minSamples) return options.fallback;

    const step = options.step ?? 0.01;
    let bestRho = options.fallback;
    let bestLogLik = -Infinity;

    for (let rho = -0.3; rho <= 0.3 + 1e-9; rho += step) {
        let logLik = 0;
        for (const h of history) {
            const matrix = buildScoreMatrix(h.lambdaHome, h.lambdaAway, { rho, maxGoals: options.maxGoals });
            const p = scoreProbability(matrix, h.homeGoals, h.awayGoals);
            logLik += p > 0 ? Math.log(p) : -50;
        }
        if (logLik > bestLogLik) {
            bestLogLik = logLik;
            bestRho = Math.round(rho * 1000) / 1000;
        }
    }
    return bestRho;
}
