/**
 * Market calculator tests
 */

import { describe, it, expect } from 'vitest';

import { DEFAULT_CONFIG, resolveConfig } from '../config';
import type { EngineConfig } from '../config';
import { buildMarketContext } from '../evaluate';
import { sumsToHundred } from '../normalizer';
import { parseSnapshot } from '../snapshot';
import type { MarketResult } from '../types';
import { bttsMarket, scaledPhaseBias } from './btts';
import { cardsMarket, computeCardsExpectation } from './cards';
import { cleanSheetMarket, computeCleanSheet } from './cleanSheet';
import { computeExpectedCornersRemaining, cornersMarket } from './corners';
import { MARKET_CALCULATORS, MARKET_ORDER } from './index';
import { computeMatchResult, matchResultMarket } from './matchResult';
import type { MatchResultInput } from './matchResult';
import { adjustedRemaining, computeNextGoal, computeNextGoalFromRates, nextGoalMarket } from './nextGoal';
import { marketLabel, overUnderLine } from './shared';
import { teamTotalsMarket } from './teamTotals';
import { computeTotalGoalsLine, totalGoalsMarket } from './totalGoals';

function contextFor(wire: Record<string, unknown>, config: EngineConfig = DEFAULT_CONFIG) {
    return buildMarketContext(parseSnapshot({ fixture_id: 'fx-test', ...wire }), config);
}

function pick(results: MarketResult[], selection: string, marketName?: string): MarketResult {
    const found = results.find(r => r.selection === selection && (marketName === undefined || r.marketName === marketName));
    if (!found) throw new Error(`no result for ${selection}`);
    return found;
}

// Half-time, 1-0, 0.6 xG each: 0.6 expected goals remaining per side
const HALF_TIME = {
    home_team: 'Rovers',
    minute: 45,
    home_score: 1,
    away_score: 0,
    home_xg: 0.6,
    away_xg: 0.6
};

// ============================================================================
// SHARED LINE MATHS
// ============================================================================

describe('Over/Under lines', () => {
    it('Over 2.5 with one goal and 1.2 expected remaining', () => {
        const line = computeTotalGoalsLine(1, 1.2, 2.5);
        expect(line.needed).toBe(2);
        expect(line.settled).toBe(false);
        expect(line.over).toBeCloseTo(33.7373, 3);
        expect(line.over + line.under).toBeCloseTo(100, 10);
    });

    it('settles a line the count has already passed', () => {
        expect(overUnderLine(3, 0.5, 2.5)).toEqual({ over: 100, under: 0, needed: 0, settled: true });
    });

    it('labels every market kind', () => {
        expect(MARKET_ORDER.map(marketLabel)).toEqual([
            'Match Result',
            'Total Goals',
            'Both Teams To Score',
            'Clean Sheet',
            'Team Total Goals',
            'Next Goal',
            'Total Cards',
            'Total Corners'
        ]);
        expect(Object.keys(MARKET_CALCULATORS)).toHaveLength(8);
    });
});

// ============================================================================
// GOALS MARKETS
// ============================================================================

describe('Total Goals', () => {
    it('produces Over/Under per default line', () => {
        const results = totalGoalsMarket(contextFor(HALF_TIME), DEFAULT_CONFIG);
        expect(results).toHaveLength(10);

        const over05 = pick(results, 'Over 0.5');
        expect(over05.state).toBe('COMPLETE');
        expect(over05.probability).toBe(100);

        const over25 = pick(results, 'Over 2.5');
        expect(over25.state).toBe('ACTIVE');
        expect(over25.line).toBe(2.5);
        expect(over25.probability).toBeCloseTo(33.7373, 3);
        expect(over25.rationale).toBe('Current: 1, expected remaining 1.20, need 2 more');
    });
});

describe('Team Totals', () => {
    it('uses each side\'s own remaining expectation', () => {
        const results = teamTotalsMarket(contextFor(HALF_TIME), DEFAULT_CONFIG);
        expect(results).toHaveLength(12);

        const homeOver15 = pick(results, 'Over 1.5', 'Rovers Total Goals');
        expect(homeOver15.probability).toBeCloseTo((1 - Math.exp(-0.6)) * 100, 8);

        const homeOver05 = pick(results, 'Over 0.5', 'Rovers Total Goals');
        expect(homeOver05.state).toBe('COMPLETE');

        const awayOver05 = pick(results, 'Over 0.5', 'Away Total Goals');
        expect(awayOver05.state).toBe('ACTIVE');
        expect(awayOver05.probability).toBeCloseTo((1 - Math.exp(-0.6)) * 100, 8);
    });
});

describe('Clean Sheet', () => {
    it('is e^-opponentRemaining, and settled at zero once conceded', () => {
        expect(computeCleanSheet(1)).toBeCloseTo(36.7879, 3);

        const [home, away] = cleanSheetMarket(contextFor(HALF_TIME));
        expect(home.selection).toBe('Rovers Clean Sheet');
        expect(home.probability).toBeCloseTo(Math.exp(-0.6) * 100, 8);
        expect(home.state).toBe('ACTIVE');

        expect(away.selection).toBe('Away Clean Sheet');
        expect(away.probability).toBe(0);
        expect(away.state).toBe('COMPLETE');
    });

    it('rises for the side facing ten men', () => {
        const [home] = cleanSheetMarket(contextFor({ ...HALF_TIME, red_cards: { home: 0, away: 1 } }));
        // away remaining 0.6 × 0.40 × 0.95
        expect(home.probability).toBeCloseTo(Math.exp(-0.228) * 100, 8);
        expect(home.probability).toBeGreaterThan(Math.exp(-0.6) * 100);
    });
});

describe('Both Teams To Score', () => {
    it('is COMPLETE once both sides have scored', () => {
        const results = bttsMarket(contextFor({ ...HALF_TIME, minute: 60, home_score: 2, away_score: 1 }), DEFAULT_CONFIG);
        expect(results.map(r => [r.selection, r.probability, r.state])).toEqual([
            ['Yes', 100, 'COMPLETE'],
            ['No', 0, 'COMPLETE']
        ]);
    });

    it('scales the phase bias by 4p(1 - p) before normalizing', () => {
        const config = resolveConfig({ dixonColesEnabled: false });
        const [yes, no] = bttsMarket(contextFor(HALF_TIME, config), config);

        // P(away scores) = 1 - e^-0.6, plus the POST_HT_RESET +3pp scaled by 4p(1 - p)
        const p = 1 - Math.exp(-0.6);
        expect(yes.probability).toBeCloseTo(p * 100 + 3 * 4 * p * (1 - p), 8);
        expect(yes.probability + no.probability).toBeCloseTo(100, 10);
        expect(yes.rationale).toBe('1-0, away needs 1 goal; POST_HT_RESET bias +3pp');
    });

    it('applies the full bias only at even odds', () => {
        expect(scaledPhaseBias(0.5, 12)).toBe(12);
        expect(scaledPhaseBias(0, 12)).toBe(0);
        expect(scaledPhaseBias(1, 20)).toBe(0);
    });

    it('leaves an impossible BTTS at zero when no time remains', () => {
        const oneNil = bttsMarket(contextFor({ minute: 90, home_score: 1, away_score: 0, home_xg: 1.2, away_xg: 0.8 }), DEFAULT_CONFIG);
        expect(oneNil.map(r => [r.selection, r.probability])).toEqual([['Yes', 0], ['No', 100]]);

        const goalless = bttsMarket(contextFor({ minute: 90, home_xg: 1.2, away_xg: 0.8 }), DEFAULT_CONFIG);
        expect(goalless.map(r => [r.selection, r.probability])).toEqual([['Yes', 0], ['No', 100]]);
    });

    it('shrinks the bias as the chance of a goal vanishes', () => {
        const config = resolveConfig({ dixonColesEnabled: false });
        const [yes] = bttsMarket(contextFor({ minute: 88, home_score: 1, away_score: 0, home_xg: 1.2, away_xg: 0.8 }, config), config);

        // away remaining = 0.8 / 88 × 2; DESPERATE +12 scaled by 4p(1 - p)
        const p = 1 - Math.exp(-0.8 / 44);
        expect(yes.probability).toBeCloseTo(p * 100 + 12 * 4 * p * (1 - p), 8);
        expect(yes.probability).toBeLessThan(3);
    });

    it('keeps Yes/No summing to 100 under a large bias', () => {
        const config = resolveConfig({ phaseBias: { DESPERATE: 90 } });
        const results = bttsMarket(contextFor({ minute: 80, home_xg: 0.5, away_xg: 0.5 }, config), config);
        expect(sumsToHundred(results.map(r => r.probability))).toBe(true);
        results.forEach(r => {
            expect(r.probability).toBeGreaterThanOrEqual(0);
            expect(r.probability).toBeLessThanOrEqual(100);
        });
    });
});

describe('Next Goal', () => {
    it('splits the chance of any goal by rate share', () => {
        const probs = computeNextGoalFromRates(0.06, 0.04, 30);
        expect(probs.home).toBeCloseTo(57.01, 2);
        expect(probs.away).toBeCloseTo(38.01, 2);
        expect(probs.none).toBeCloseTo(4.98, 2);
        expect(probs.home + probs.away + probs.none).toBeCloseTo(100, 10);
    });

    it('is all "none" with nothing expected', () => {
        expect(computeNextGoal(0, 0)).toEqual({ home: 0, away: 0, none: 100 });
    });

    it('applies momentum multipliers and the trailing-side boost', () => {
        const ctx = contextFor({ ...HALF_TIME, home_score: 0, away_score: 1 });
        const remaining = adjustedRemaining(ctx, DEFAULT_CONFIG);

        // Neutral momentum: both multipliers 0.6; home trails so x1.1
        expect(remaining.home).toBeCloseTo(0.6 * 0.6 * 1.1, 12);
        expect(remaining.away).toBeCloseTo(0.6 * 0.6, 12);

        const results = nextGoalMarket(ctx, DEFAULT_CONFIG);
        expect(results.map(r => r.selection)).toEqual(['Rovers scores next', 'Away scores next', 'No more goals']);
        expect(results.reduce((acc, r) => acc + r.probability, 0)).toBeCloseTo(100, 10);
    });

    it('favours the eleven after a sending-off', () => {
        const even = nextGoalMarket(contextFor(HALF_TIME), DEFAULT_CONFIG);
        const ctx = contextFor({ ...HALF_TIME, red_cards: { home: 0, away: 1 } });
        const remaining = adjustedRemaining(ctx, DEFAULT_CONFIG);

        // home 0.6 × 1.45; away 0.6 × 0.40 × 0.95, trailing x1.1; momentum 0.6 each
        expect(remaining.home).toBeCloseTo(0.87 * 0.6, 12);
        expect(remaining.away).toBeCloseTo(0.228 * 0.6 * 1.1, 12);

        const [home, away] = nextGoalMarket(ctx, DEFAULT_CONFIG);
        expect(home.probability).toBeGreaterThan(even[0].probability);
        expect(away.probability).toBeLessThan(even[1].probability);
    });
});

// ============================================================================
// MATCH RESULT
// ============================================================================

describe('Match Result', () => {
    const base: MatchResultInput = {
        minute: 0,
        homeScore: 0,
        awayScore: 0,
        homeXgRemaining: 0,
        awayXgRemaining: 0,
        possessionHome: 0,
        possessionAway: 0,
        dangerousAttacksHome: 0,
        dangerousAttacksAway: 0
    };

    it('reads the level seed straight off the table', () => {
        expect(computeMatchResult(base, DEFAULT_CONFIG).normalized).toEqual({ home: 35, draw: 30, away: 35 });
    });

    it('boosts the leader with the square of elapsed time', () => {
        const result = computeMatchResult({ ...base, minute: 90, homeScore: 1 }, DEFAULT_CONFIG);
        expect(result.timeBoost).toBe(30);
        expect(result.raw).toEqual({ home: 90, draw: 25, away: 15 });
        expect(result.normalized.home).toBeCloseTo(900 / 13, 10);
        expect(result.normalized.draw).toBeCloseTo(250 / 13, 10);
        expect(result.normalized.away).toBeCloseTo(150 / 13, 10);
    });

    it('mirrors the seed for an away lead', () => {
        const result = computeMatchResult({ ...base, minute: 45, awayScore: 2 }, DEFAULT_CONFIG);
        expect(result.raw).toEqual({ home: 8, draw: 14, away: 85.5 });
        expect(result.normalized.away).toBeCloseTo(8550 / 107.5, 10);
    });

    it('caps adjustments and clamps before normalizing', () => {
        const result = computeMatchResult({ ...base, minute: 90, homeScore: 3, homeXgRemaining: 5 }, DEFAULT_CONFIG);
        expect(result.xgAdjustment).toBe(20);
        expect(result.raw.home).toBe(140);
        expect(result.raw.draw).toBeCloseTo(1, 12);
        expect(result.raw.away).toBe(-17);
        expect(result.normalized.home).toBeCloseTo(1000 / 11, 10);
        expect(result.normalized.draw).toBeCloseTo(50 / 11, 10);
        expect(result.normalized.away).toBeCloseTo(50 / 11, 10);
        // one rescale, no re-clamp: floored cells land under the floor
        expect(result.normalized.away).toBeLessThan(DEFAULT_CONFIG.matchResult.scoreFloor);
        expect(sumsToHundred(Object.values(result.normalized))).toBe(true);
    });

    it('scales possession and attack share', () => {
        const result = computeMatchResult({
            ...base,
            possessionHome: 60,
            possessionAway: 40,
            dangerousAttacksHome: 30,
            dangerousAttacksAway: 10
        }, DEFAULT_CONFIG);
        expect(result.possessionAdjustment).toBeCloseTo(2, 12);
        expect(result.attackAdjustment).toBeCloseTo(5, 12);
    });

    it('names the selections after the teams', () => {
        const results = matchResultMarket(contextFor(HALF_TIME), DEFAULT_CONFIG);
        expect(results.map(r => r.selection)).toEqual(['1 (Rovers Win)', 'X (Draw)', '2 (Away Win)']);
        expect(sumsToHundred(results.map(r => r.probability))).toBe(true);
    });
});

// ============================================================================
// CARDS & CORNERS
// ============================================================================

describe('Cards', () => {
    it('adapts the fouls-per-card ratio once there is a sample', () => {
        const e = computeCardsExpectation({ minute: 30, timeRemaining: 60, currentCards: 3, fouls: 18 }, DEFAULT_CONFIG);
        expect(e.expectedFoulsRemaining).toBeCloseTo(36, 12);
        expect(e.foulsPerCard).toBe(6);
        expect(e.ratioSource).toBe('OBSERVED');
        expect(e.expectedCardsRemaining).toBeCloseTo(6, 12);
    });

    it('uses league defaults early', () => {
        const e = computeCardsExpectation({ minute: 5, timeRemaining: 85, currentCards: 0, fouls: 2 }, DEFAULT_CONFIG);
        expect(e.expectedFoulsRemaining).toBeCloseTo(22 * 85 / 90, 12);
        expect(e.foulsPerCard).toBe(4.5);
        expect(e.ratioSource).toBe('LEAGUE_DEFAULT');
    });

    it('bounds the observed ratio', () => {
        expect(computeCardsExpectation({ minute: 30, timeRemaining: 60, currentCards: 1, fouls: 30 }, DEFAULT_CONFIG).foulsPerCard).toBe(10);
        expect(computeCardsExpectation({ minute: 30, timeRemaining: 60, currentCards: 2, fouls: 1 }, DEFAULT_CONFIG).foulsPerCard).toBe(2);
    });

    it('inflates late bookings', () => {
        const late = computeCardsExpectation({ minute: 80, timeRemaining: 10, currentCards: 4, fouls: 20 }, DEFAULT_CONFIG);
        expect(late.lateMultiplier).toBe(1.3);
        expect(late.expectedCardsRemaining).toBeCloseTo(0.65, 12);
        expect(computeCardsExpectation({ minute: 65, timeRemaining: 25, currentCards: 4, fouls: 20 }, DEFAULT_CONFIG).lateMultiplier).toBe(1.15);
    });

    it('counts red cards toward the total', () => {
        const results = cardsMarket(contextFor({
            minute: 50,
            cards: { home: 2, away: 1 },
            red_cards: { home: 0, away: 1 },
            fouls: { home: 10, away: 10 }
        }), DEFAULT_CONFIG);
        expect(results).toHaveLength(10);
        expect(pick(results, 'Over 3.5').state).toBe('COMPLETE');
        expect(pick(results, 'Over 4.5').state).toBe('ACTIVE');
        expect(pick(results, 'Over 4.5').rationale).toContain('Current: 4,');
    });
});

describe('Corners', () => {
    it('uses the league average before minute 10', () => {
        expect(computeExpectedCornersRemaining(5, 1, 85, DEFAULT_CONFIG)).toBeCloseTo(10 * 85 / 90, 12);
        expect(computeExpectedCornersRemaining(45, 6, 45, DEFAULT_CONFIG)).toBeCloseTo(6, 12);
    });

    it('extrapolates the observed rate afterwards', () => {
        const results = cornersMarket(contextFor({ minute: 45, corners: { home: 4, away: 2 } }), DEFAULT_CONFIG);
        expect(results).toHaveLength(12);
        // needs 2 more with 6 expected
        expect(pick(results, 'Over 7.5').probability).toBeCloseTo(98.2649, 3);
        expect(pick(results, 'Under 7.5').probability).toBeCloseTo(1.7351, 3);
    });
});
