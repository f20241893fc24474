/**
 * Total Cards Over/Under
 *
 * expected_cards_remaining = expected_fouls_remaining / fouls_per_card
 *
 * The fouls-per-card ratio adapts to this match's own ratio once there is a
 * sample (past the adaptive minute with at least one card booked), bounded so
 * one early booking cannot produce an absurd ratio. Before that the league
 * constant applies.
 */

import type { EngineConfig } from '../config';
import { clamp, safeDivide } from '../math';
import type { MarketContext, MarketResult } from '../types';
import { overUnderLine, overUnderResults } from './shared';

export interface CardsInput {
    minute: number;
    timeRemaining: number;
    currentCards: number;
    fouls: number;
}

export interface CardsExpectation {
    expectedFoulsRemaining: number;
    foulsPerCard: number;
    ratioSource: 'OBSERVED' | 'LEAGUE_DEFAULT';
    lateMultiplier: number;
    expectedCardsRemaining: number;
}

export function resolveFoulsPerCard(input: CardsInput, config: EngineConfig): { ratio: number; source: CardsExpectation['ratioSource'] } {
    const c = config.cards;
    const hasSample = input.minute > c.adaptiveAfterMinute
        && input.currentCards > 0
        && input.fouls >= c.minObservedFouls;

    if (!hasSample) {
        return { ratio: config.league.foulsPerCard, source: 'LEAGUE_DEFAULT' };
    }
    return {
        ratio: clamp(input.fouls / input.currentCards, c.ratioMin, c.ratioMax),
        source: 'OBSERVED'
    };
}

export function computeCardsExpectation(input: CardsInput, config: EngineConfig): CardsExpectation {
    const c = config.cards;

    const expectedFoulsRemaining = input.minute >= c.observedRateAfterMinute
        ? safeDivide(input.fouls, input.minute) * input.timeRemaining
        : (config.league.foulsPerMatch * input.timeRemaining) / config.regulationMinutes;

    const { ratio, source } = resolveFoulsPerCard(input, config);

    // Bookings cluster late
    const lateMultiplier = input.minute >= 75
        ? c.lateMultiplierFrom75
        : input.minute >= 60
            ? c.lateMultiplierFrom60
            : 1;

    return {
        expectedFoulsRemaining,
        foulsPerCard: ratio,
        ratioSource: source,
        lateMultiplier,
        expectedCardsRemaining: safeDivide(expectedFoulsRemaining, ratio) * lateMultiplier
    };
}

export function cardsMarket(ctx: MarketContext, config: EngineConfig): MarketResult[] {
    const { snapshot, projection } = ctx;
    const currentCards = snapshot.cards.home + snapshot.cards.away + snapshot.redCards.home + snapshot.redCards.away;
    const expectation = computeCardsExpectation({
        minute: snapshot.minute,
        timeRemaining: projection.timeRemaining,
        currentCards,
        fouls: snapshot.fouls.home + snapshot.fouls.away
    }, config);

    return config.thresholds.cards.flatMap(line => {
        const probs = overUnderLine(currentCards, expectation.expectedCardsRemaining, line);
        const rationale = probs.settled
            ? `Already hit: ${currentCards} cards`
            : `Current: ${currentCards}, expected remaining ${expectation.expectedCardsRemaining.toFixed(2)}, `
                + `${expectation.foulsPerCard.toFixed(1)} fouls/card (${expectation.ratioSource.toLowerCase()})`;
        return overUnderResults('CARDS', 'Total Cards', line, probs, ctx.confidence, rationale);
    });
}
