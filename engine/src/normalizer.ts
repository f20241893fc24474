/**
 * Live Market Engine - Probability Normalizer
 *
 * Clamp-then-normalize for any mutually exclusive outcome set:
 *   1. clamp each raw value into [floor, ceiling]
 *   2. sum the clamped values
 *   3. rescale every value by 100 / sum
 * Nothing is clamped again after step 3.
 */

import { clamp, sum } from './math';

export interface NormalizeOptions {
    floor?: number;
    ceiling?: number;
}

export const SUM_TOLERANCE = 1e-6;

export function normalizeProbabilities(raw: number[], options: NormalizeOptions = {}): number[] {
    if (raw.length === 0) return [];

    const floor = Math.max(0, options.floor ?? 0);
    const ceiling = options.ceiling ?? 100;

    const clamped = raw.map(v => (Number.isFinite(v) ? clamp(v, floor, ceiling) : floor));
    const total = sum(clamped);

    if (total <= 0) {
        return raw.map(() => 100 / raw.length);
    }
    return clamped.map(v => (v * 100) / total);
}

/**
 * Keyed variant: { home, draw, away } in, same keys out
 */
export function normalizeRecord<K extends string>(
    raw: Record<K, number>,
    keys: readonly K[],
    options: NormalizeOptions = {}
): Record<K, number> {
    const values = normalizeProbabilities(keys.map(k => raw[k]), options);
    const out: Partial<Record<K, number>> = {};
    keys.forEach((k, i) => {
        out[k] = values[i];
    });
    return { ...raw, ...out };
}

/**
 * Post-condition callers can assert in tests
 */
export function sumsToHundred(values: number[], tolerance = SUM_TOLERANCE): boolean {
    return Math.abs(sum(values) - 100) < tolerance;
}
