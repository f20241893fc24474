/**
 * Live Market Engine - Best Bet Selector
 * Ranks one match's open market results. Settled lines carry no
 * information and never reach the ranking.
 */

import { fairDecimalOdds, roundTo } from './math';
import type { MarketKind, MarketResult } from './types';

// Most specific market first; lower rank wins a probability tie
export const MARKET_SPECIFICITY: Record<MarketKind, number> = {
    TEAM_TOTAL: 0,
    CLEAN_SHEET: 1,
    NEXT_GOAL: 2,
    MATCH_RESULT: 3,
    BTTS: 4,
    CORNERS: 5,
    CARDS: 6,
    TOTAL_GOALS: 7
};

export interface SelectorOptions {
    minProbability?: number;
    topN?: number;
}

export interface RankedBet extends MarketResult {
    /** Fair odds less the margin a bookmaker would likely apply */
    estimatedMarketOdds: number | null;
    /** Model probability minus the estimated market's implied probability, in points */
    valueEdge: number | null;
}

export interface Selection {
    best: RankedBet | null;
    ranked: RankedBet[];
    topN: RankedBet[];
}

/**
 * Bookmaker margin by how short the price is: 5% on heavy favourites,
 * 7% on likely outcomes, 10% on the rest.
 */
export function estimateBookmakerMargin(probability: number): number {
    if (probability >= 80) return 0.05;
    if (probability >= 60) return 0.07;
    return 0.1;
}

export function computeValueEdge(result: MarketResult): Pick<RankedBet, 'estimatedMarketOdds' | 'valueEdge'> {
    const fairOdds = result.fairOdds ?? fairDecimalOdds(result.probability);
    if (fairOdds === null) {
        return { estimatedMarketOdds: null, valueEdge: null };
    }
    const marketOdds = fairOdds * (1 - estimateBookmakerMargin(result.probability));
    return {
        estimatedMarketOdds: roundTo(marketOdds, 2),
        valueEdge: roundTo(result.probability - 100 / marketOdds, 1)
    };
}

export function compareResults(a: MarketResult, b: MarketResult): number {
    if (a.probability !== b.probability) return b.probability - a.probability;

    const bySpecificity = MARKET_SPECIFICITY[a.market] - MARKET_SPECIFICITY[b.market];
    if (bySpecificity !== 0) return bySpecificity;

    const byLine = (a.line ?? 0) - (b.line ?? 0);
    if (byLine !== 0) return byLine;

    if (a.selection < b.selection) return -1;
    if (a.selection > b.selection) return 1;
    return 0;
}

export function selectBestBets(results: MarketResult[], options: SelectorOptions = {}): Selection {
    const minProbability = options.minProbability ?? 0;
    const topN = Math.max(0, Math.floor(options.topN ?? 5));

    const ranked: RankedBet[] = results
        .filter(r => r.state !== 'COMPLETE' && Number.isFinite(r.probability))
        .sort(compareResults)
        .map(r => ({ ...r, ...computeValueEdge(r) }));

    return {
        best: ranked.find(r => r.probability >= minProbability) ?? null,
        ranked,
        topN: ranked.slice(0, topN)
    };
}
