/**
 * Total Goals Over/Under
 */

import type { EngineConfig } from '../config';
import { totalExpectedRemaining } from '../goalRate';
import type { MarketContext, MarketResult } from '../types';
import { overUnderLine, overUnderResults } from './shared';
import type { LineProbabilities } from './shared';

export function computeTotalGoalsLine(
    currentGoals: number,
    remainingExpected: number,
    threshold: number
): LineProbabilities {
    return overUnderLine(currentGoals, remainingExpected, threshold);
}

export function totalGoalsMarket(ctx: MarketContext, config: EngineConfig): MarketResult[] {
    const { snapshot, projection } = ctx;
    const current = snapshot.homeScore + snapshot.awayScore;
    const remaining = totalExpectedRemaining(projection);

    return config.thresholds.totalGoals.flatMap(line => {
        const probs = computeTotalGoalsLine(current, remaining, line);
        const rationale = probs.settled
            ? `Already hit: ${current} goals scored`
            : `Current: ${current}, expected remaining ${remaining.toFixed(2)}, need ${probs.needed} more`;
        return overUnderResults('TOTAL_GOALS', 'Total Goals', line, probs, ctx.confidence, rationale);
    });
}
