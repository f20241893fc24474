/**
 * Next Goal (Home / Away / None)
 *
 *   P(any)        = 1 - e^-(h + a)
 *   P(home|goal)  = h / (h + a)
 *   home_next     = P(any) × P(home|goal)
 *   none          = 100 - home_next - away_next
 *
 * `none` is taken by subtraction so the three always sum to 100.
 */

import type { EngineConfig } from '../config';
import { safeDivide } from '../math';
import { probabilityAtLeastOne } from '../poisson';
import type { MarketContext, MarketResult } from '../types';
import { makeResult, teamName } from './shared';

export interface NextGoalProbabilities {
    home: number;
    away: number;
    none: number;
}

/**
 * From expected remaining goals per side
 */
export function computeNextGoal(homeRemaining: number, awayRemaining: number): NextGoalProbabilities {
    const h = Math.max(0, homeRemaining);
    const a = Math.max(0, awayRemaining);
    const pAny = probabilityAtLeastOne(h + a);
    const pHomeGivenGoal = safeDivide(h, h + a, 0.5);

    const home = pAny * pHomeGivenGoal * 100;
    const away = pAny * (1 - pHomeGivenGoal) * 100;
    return { home, away, none: 100 - home - away };
}

/**
 * From per-minute rates and the minutes left
 */
export function computeNextGoalFromRates(
    homeRatePerMin: number,
    awayRatePerMin: number,
    timeRemaining: number
): NextGoalProbabilities {
    return computeNextGoal(homeRatePerMin * timeRemaining, awayRatePerMin * timeRemaining);
}

/**
 * Momentum-adjusted remaining goals: rate × attack multiplier, with the
 * trailing side pushing a little harder
 */
export function adjustedRemaining(ctx: MarketContext, config: EngineConfig): { home: number; away: number } {
    const { snapshot, projection, momentum } = ctx;
    let home = projection.homeExpectedRemaining * momentum.homeAttackMultiplier;
    let away = projection.awayExpectedRemaining * momentum.awayAttackMultiplier;

    if (snapshot.homeScore < snapshot.awayScore) home *= config.nextGoal.trailingTeamBoost;
    else if (snapshot.awayScore < snapshot.homeScore) away *= config.nextGoal.trailingTeamBoost;

    return { home, away };
}

export function nextGoalMarket(ctx: MarketContext, config: EngineConfig): MarketResult[] {
    const { snapshot, momentum, projection } = ctx;
    const remaining = adjustedRemaining(ctx, config);
    const probs = computeNextGoal(remaining.home, remaining.away);
    const momentumNote = `momentum ${(momentum.momentumRatioHome * 100).toFixed(0)}% home`;

    return [
        makeResult({
            market: 'NEXT_GOAL',
            selection: `${teamName(snapshot, 'home')} scores next`,
            probability: probs.home,
            confidenceTier: ctx.confidence,
            rationale: `Home expected ${remaining.home.toFixed(2)} (x${momentum.homeAttackMultiplier.toFixed(2)}), ${momentumNote}`
        }),
        makeResult({
            market: 'NEXT_GOAL',
            selection: `${teamName(snapshot, 'away')} scores next`,
            probability: probs.away,
            confidenceTier: ctx.confidence,
            rationale: `Away expected ${remaining.away.toFixed(2)} (x${momentum.awayAttackMultiplier.toFixed(2)}), ${momentumNote}`
        }),
        makeResult({
            market: 'NEXT_GOAL',
            selection: 'No more goals',
            probability: probs.none,
            confidenceTier: ctx.confidence,
            rationale: `Expected goals remaining ${(remaining.home + remaining.away).toFixed(2)} in ${projection.timeRemaining}min`
        })
    ];
}
