/**
 * Team Total Goals Over/Under
 */

import type { EngineConfig } from '../config';
import type { MarketContext, MarketResult, Side } from '../types';
import { overUnderLine, overUnderResults, teamName } from './shared';
import type { LineProbabilities } from './shared';

export function computeTeamTotalLine(teamGoals: number, teamRemaining: number, threshold: number): LineProbabilities {
    return overUnderLine(teamGoals, teamRemaining, threshold);
}

export function teamTotalsMarket(ctx: MarketContext, config: EngineConfig): MarketResult[] {
    const { snapshot, projection } = ctx;
    const sides: Side[] = ['home', 'away'];

    return sides.flatMap(side => {
        const goals = side === 'home' ? snapshot.homeScore : snapshot.awayScore;
        const remaining = side === 'home' ? projection.homeExpectedRemaining : projection.awayExpectedRemaining;
        const marketName = `${teamName(snapshot, side)} Total Goals`;

        return config.thresholds.teamTotals.flatMap(line => {
            const probs = computeTeamTotalLine(goals, remaining, line);
            const rationale = probs.settled
                ? `Already scored ${goals}`
                : `Current: ${goals}, expected total ${(goals + remaining).toFixed(1)}`;
            return overUnderResults('TEAM_TOTAL', marketName, line, probs, ctx.confidence, rationale);
        });
    });
}
