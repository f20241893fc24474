/**
 * Live Market Engine - Goal Rate Module
 * Per-minute scoring rate per side, guarded against early-game extrapolation
 */

import type { EngineConfig } from './config';
import { safeDivide } from './math';
import type { GoalRateProjection, MatchSnapshot, RateSource, SidePair } from './types';

/**
 * Regulation minutes still to play (never negative in stoppage time)
 */
export function computeTimeRemaining(minute: number, config: EngineConfig): number {
    return Math.max(config.regulationMinutes - minute, 0);
}

/**
 * Shot-based xG stand-in for feeds that carry no xG:
 * xg_proxy = 0.08 * shots + 0.25 * shots_on_target
 */
export function computeXgProxy(shots: number, shotsOnTarget: number, config: EngineConfig): number {
    return config.xgProxy.shotWeight * shots + config.xgProxy.shotOnTargetWeight * shotsOnTarget;
}

/**
 * Cumulative xG per side, falling back to the shot proxy when the feed has none
 */
export function resolveCumulativeXg(
    snapshot: MatchSnapshot,
    config: EngineConfig
): { home: number; away: number; source: RateSource } {
    if (snapshot.homeXg > 0 || snapshot.awayXg > 0) {
        return { home: snapshot.homeXg, away: snapshot.awayXg, source: 'XG' };
    }
    return {
        home: computeXgProxy(snapshot.shots.home, snapshot.shotsOnTarget.home, config),
        away: computeXgProxy(snapshot.shots.away, snapshot.shotsOnTarget.away, config),
        source: 'SHOT_PROXY'
    };
}

/**
 * Per-side rate multipliers from red cards. A dismissed side scores less and
 * its opponent more; several reds for one side count once.
 */
export function computeRedCardMultipliers(redCards: SidePair, config: EngineConfig): SidePair {
    const rc = config.redCard;
    const multiplier: SidePair = { home: 1, away: 1 };

    if (redCards.home > 0) {
        multiplier.home *= rc.tenManPenalty * rc.homeDismissedExtraPenalty;
        multiplier.away *= rc.opponentBoost * rc.awayOpponentExtraBoost;
    }
    if (redCards.away > 0) {
        multiplier.away *= rc.tenManPenalty * rc.awayDismissedExtraPenalty;
        multiplier.home *= rc.opponentBoost;
    }
    return multiplier;
}

/**
 * Project each side's scoring rate.
 *
 * Above the reliability threshold: rate = cumulative xG / minute.
 * At or below it the observed rate is ignored and the league default
 * expected goals (per 90) are spread over the remaining minutes.
 * Red-card multipliers apply to either rate.
 */
export function projectGoalRates(snapshot: MatchSnapshot, config: EngineConfig): GoalRateProjection {
    const minute = snapshot.minute;
    const timeRemaining = computeTimeRemaining(minute, config);

    let homeRatePerMin: number;
    let awayRatePerMin: number;
    let reliable: boolean;
    let source: RateSource;

    if (minute > config.reliabilityThresholdMinutes) {
        const xg = resolveCumulativeXg(snapshot, config);
        homeRatePerMin = safeDivide(xg.home, minute);
        awayRatePerMin = safeDivide(xg.away, minute);
        reliable = true;
        source = xg.source;
    } else {
        homeRatePerMin = config.league.defaultHomeXg / config.regulationMinutes;
        awayRatePerMin = config.league.defaultAwayXg / config.regulationMinutes;
        reliable = false;
        source = 'LEAGUE_DEFAULT';
    }

    const redCardMultiplier = computeRedCardMultipliers(snapshot.redCards, config);
    homeRatePerMin *= redCardMultiplier.home;
    awayRatePerMin *= redCardMultiplier.away;

    return {
        homeRatePerMin,
        awayRatePerMin,
        reliable,
        timeRemaining,
        homeExpectedRemaining: homeRatePerMin * timeRemaining,
        awayExpectedRemaining: awayRatePerMin * timeRemaining,
        source,
        redCardMultiplier
    };
}

/**
 * Projected remaining goals for both sides combined
 */
export function totalExpectedRemaining(projection: GoalRateProjection): number {
    return projection.homeExpectedRemaining + projection.awayExpectedRemaining;
}
