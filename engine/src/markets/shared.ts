/**
 * Shared market plumbing: line settlement, labels, result construction
 */

import { fairDecimalOdds } from '../math';
import { poissonCdf } from '../poisson';
import type { ConfidenceTier, MarketKind, MarketResult, MarketState, MatchSnapshot, Side } from '../types';

/** Added before ceil() so float noise on whole-number lines cannot round up */
export const LINE_EPSILON = 1e-9;

export interface LineProbabilities {
    over: number;
    under: number;
    /** further events required for Over to land */
    needed: number;
    settled: boolean;
}

/**
 * Over/Under for one line given the current count and the expected
 * remaining events:
 *   needed   = ceil(threshold - current + ε)
 *   P(Under) = PoissonCDF(needed - 1; expected)
 *   P(Over)  = 100 - P(Under)
 * A line the count has already passed is settled at Over = 100.
 */
export function overUnderLine(current: number, expectedRemaining: number, threshold: number): LineProbabilities {
    if (current > threshold) {
        return { over: 100, under: 0, needed: 0, settled: true };
    }
    const needed = Math.ceil(threshold - current + LINE_EPSILON);
    const under = poissonCdf(needed - 1, Math.max(0, expectedRemaining)) * 100;
    return { over: 100 - under, under, needed, settled: false };
}

export function marketLabel(kind: MarketKind): string {
    switch (kind) {
        case 'TOTAL_GOALS': return 'Total Goals';
        case 'BTTS': return 'Both Teams To Score';
        case 'CLEAN_SHEET': return 'Clean Sheet';
        case 'TEAM_TOTAL': return 'Team Total Goals';
        case 'NEXT_GOAL': return 'Next Goal';
        case 'MATCH_RESULT': return 'Match Result';
        case 'CARDS': return 'Total Cards';
        case 'CORNERS': return 'Total Corners';
        default: {
            const unreachable: never = kind;
            throw new Error(`[MARKET:UNKNOWN] ${String(unreachable)}`);
        }
    }
}

export function teamName(snapshot: MatchSnapshot, side: Side): string {
    const name = side === 'home' ? snapshot.homeTeam : snapshot.awayTeam;
    return name && name.trim() ? name.trim() : side === 'home' ? 'Home' : 'Away';
}

export function formatLine(line: number): string {
    return line.toFixed(1);
}

export interface ResultInput {
    market: MarketKind;
    marketName?: string;
    selection: string;
    line?: number;
    probability: number;
    state?: MarketState;
    confidenceTier: ConfidenceTier;
    rationale: string;
}

export function makeResult(input: ResultInput): MarketResult {
    const probability = input.probability;
    return {
        market: input.market,
        marketName: input.marketName ?? marketLabel(input.market),
        selection: input.selection,
        line: input.line,
        probability,
        state: input.state ?? 'ACTIVE',
        confidenceTier: input.confidenceTier,
        rationale: input.rationale,
        fairOdds: fairDecimalOdds(probability)
    };
}

/**
 * Over and Under results for one line of a count market
 */
export function overUnderResults(
    market: MarketKind,
    marketName: string,
    line: number,
    probs: LineProbabilities,
    confidenceTier: ConfidenceTier,
    rationale: string
): MarketResult[] {
    const state: MarketState = probs.settled ? 'COMPLETE' : 'ACTIVE';
    return [
        makeResult({
            market, marketName, line, state, confidenceTier, rationale,
            selection: `Over ${formatLine(line)}`,
            probability: probs.over
        }),
        makeResult({
            market, marketName, line, state, confidenceTier, rationale,
            selection: `Under ${formatLine(line)}`,
            probability: probs.under
        })
    ];
}
