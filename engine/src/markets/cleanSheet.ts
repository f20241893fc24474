/**
 * Clean Sheet: P(home clean sheet) = e^(-away remaining), and vice versa
 */

import type { MarketContext, MarketResult, Side } from '../types';
import { makeResult, teamName } from './shared';

export function computeCleanSheet(opponentRemaining: number): number {
    return Math.exp(-Math.max(0, opponentRemaining)) * 100;
}

function sideResult(ctx: MarketContext, side: Side): MarketResult {
    const { snapshot, projection } = ctx;
    const conceded = side === 'home' ? snapshot.awayScore : snapshot.homeScore;
    const opponentRemaining = side === 'home' ? projection.awayExpectedRemaining : projection.homeExpectedRemaining;
    const selection = `${teamName(snapshot, side)} Clean Sheet`;

    if (conceded > 0) {
        return makeResult({
            market: 'CLEAN_SHEET',
            selection,
            probability: 0,
            state: 'COMPLETE',
            confidenceTier: ctx.confidence,
            rationale: `Already conceded ${conceded}`
        });
    }
    return makeResult({
        market: 'CLEAN_SHEET',
        selection,
        probability: computeCleanSheet(opponentRemaining),
        confidenceTier: ctx.confidence,
        rationale: `Opponent expected remaining ${opponentRemaining.toFixed(2)}, ${projection.timeRemaining}min left`
    });
}

export function cleanSheetMarket(ctx: MarketContext): MarketResult[] {
    return [sideResult(ctx, 'home'), sideResult(ctx, 'away')];
}
