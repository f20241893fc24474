/**
 * Market registry. Keyed by the closed MarketKind union so a new kind
 * cannot be added without a calculator.
 */

import type { EngineConfig } from '../config';
import type { MarketContext, MarketKind, MarketResult } from '../types';
import { bttsMarket } from './btts';
import { cardsMarket } from './cards';
import { cleanSheetMarket } from './cleanSheet';
import { cornersMarket } from './corners';
import { matchResultMarket } from './matchResult';
import { nextGoalMarket } from './nextGoal';
import { teamTotalsMarket } from './teamTotals';
import { totalGoalsMarket } from './totalGoals';

export type MarketCalculator = (ctx: MarketContext, config: EngineConfig) => MarketResult[];

export const MARKET_CALCULATORS: Record<MarketKind, MarketCalculator> = {
    TOTAL_GOALS: totalGoalsMarket,
    BTTS: bttsMarket,
    CLEAN_SHEET: cleanSheetMarket,
    TEAM_TOTAL: teamTotalsMarket,
    NEXT_GOAL: nextGoalMarket,
    MATCH_RESULT: matchResultMarket,
    CARDS: cardsMarket,
    CORNERS: cornersMarket
};

export const MARKET_ORDER: readonly MarketKind[] = [
    'MATCH_RESULT',
    'TOTAL_GOALS',
    'BTTS',
    'CLEAN_SHEET',
    'TEAM_TOTAL',
    'NEXT_GOAL',
    'CARDS',
    'CORNERS'
];

export * from './shared';
export * from './totalGoals';
export * from './btts';
export * from './cleanSheet';
export * from './teamTotals';
export * from './nextGoal';
export * from './matchResult';
export * from './cards';
export * from './corners';
