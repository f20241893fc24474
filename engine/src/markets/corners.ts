/**
 * Total Corners Over/Under
 * Same Poisson extrapolation as goals; before the observed-rate minute a
 * near-zero count says nothing, so the league average is used.
 */

import type { EngineConfig } from '../config';
import { safeDivide } from '../math';
import type { MarketContext, MarketResult } from '../types';
import { overUnderLine, overUnderResults } from './shared';

export function computeExpectedCornersRemaining(
    minute: number,
    currentCorners: number,
    timeRemaining: number,
    config: EngineConfig
): number {
    if (minute < config.corners.observedRateAfterMinute) {
        return (config.league.cornersPerMatch * timeRemaining) / config.regulationMinutes;
    }
    return safeDivide(currentCorners, minute) * timeRemaining;
}

export function cornersMarket(ctx: MarketContext, config: EngineConfig): MarketResult[] {
    const { snapshot, projection } = ctx;
    const current = snapshot.corners.home + snapshot.corners.away;
    const expected = computeExpectedCornersRemaining(snapshot.minute, current, projection.timeRemaining, config);

    return config.thresholds.corners.flatMap(line => {
        const probs = overUnderLine(current, expected, line);
        const rationale = probs.settled
            ? `Already hit: ${current} corners`
            : `Current: ${current}, expected total ${(current + expected).toFixed(1)}`;
        return overUnderResults('CORNERS', 'Total Corners', line, probs, ctx.confidence, rationale);
    });
}
