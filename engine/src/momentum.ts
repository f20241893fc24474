/**
 * Live Market Engine - Momentum Module
 *
 * Trailing-window attack tally per side. Re-derived from the snapshot's
 * event history on every call, so the same snapshot always yields the same
 * window.
 *
 * Momentum is a dimensionless share; goal rates are goals/minute. The two
 * only meet multiplicatively (rate *= attackMultiplier).
 */

import type { EngineConfig } from './config';
import { clamp, safeDivide } from './math';
import type { MatchEvent, MatchSnapshot, MomentumTally, MomentumWindow, Side, SubstitutionEvent } from './types';

const MOMENTUM_KINDS = new Set<MatchEvent['kind']>(['shot', 'dangerous_attack', 'corner']);

export const ATTACK_MULTIPLIER_MIN = 0.2;
export const ATTACK_MULTIPLIER_MAX = 1.0;

export const OFFENSIVE_SUB_SHIFT = 0.05;
export const LATE_OFFENSIVE_SUB_SHIFT = 0.08;
export const LATE_SUB_AFTER_MINUTE = 70;
export const DEFENSIVE_SUB_SHIFT = -0.05;

function emptyTally(): MomentumTally {
    return { shots: 0, dangerousAttacks: 0, corners: 0 };
}

function tallyTotal(t: MomentumTally): number {
    return t.shots + t.dangerousAttacks + t.corners;
}

function addToTally(tally: MomentumTally, kind: MatchEvent['kind']) {
    if (kind === 'shot') tally.shots++;
    else if (kind === 'dangerous_attack') tally.dangerousAttacks++;
    else if (kind === 'corner') tally.corners++;
}

/**
 * Tally shots, dangerous attacks and corners inside [minute - window, minute]
 */
export function tallyWindow(
    events: MatchEvent[],
    currentMinute: number,
    windowMinutes: number
): { home: MomentumTally; away: MomentumTally } {
    const fromMinute = currentMinute - windowMinutes;
    const tallies: Record<Side, MomentumTally> = { home: emptyTally(), away: emptyTally() };

    for (const e of events) {
        if (!MOMENTUM_KINDS.has(e.kind)) continue;
        if (e.minute < fromMinute || e.minute > currentMinute) continue;
        addToTally(tallies[e.side], e.kind);
    }
    return tallies;
}

/**
 * home / (home + away); 0.5 when neither side has anything
 */
export function computeMomentumRatio(homeEvents: number, awayEvents: number): number {
    return safeDivide(homeEvents, homeEvents + awayEvents, 0.5);
}

/**
 * clamp(0.6 + (ratio - 0.5) * 0.8, 0.2, 1.0)
 */
export function computeAttackMultiplier(momentumRatio: number): number {
    return clamp(0.6 + (momentumRatio - 0.5) * 0.8, ATTACK_MULTIPLIER_MIN, ATTACK_MULTIPLIER_MAX);
}

/**
 * Share shift one substitution gives its own side. Unflagged changes are neutral.
 */
export function substitutionShift(sub: SubstitutionEvent): number {
    if (sub.offensive === undefined) return 0;
    if (!sub.offensive) return DEFENSIVE_SUB_SHIFT;
    return sub.minute > LATE_SUB_AFTER_MINUTE ? LATE_OFFENSIVE_SUB_SHIFT : OFFENSIVE_SUB_SHIFT;
}

/**
 * Net shift of the home share from substitutions inside [minute - window, minute]
 */
export function substitutionShiftHome(
    substitutions: SubstitutionEvent[],
    currentMinute: number,
    windowMinutes: number
): number {
    const fromMinute = currentMinute - windowMinutes;
    let shift = 0;
    for (const sub of substitutions) {
        if (sub.minute < fromMinute || sub.minute > currentMinute) continue;
        shift += sub.side === 'home' ? substitutionShift(sub) : -substitutionShift(sub);
    }
    return shift;
}

/**
 * Momentum window for a snapshot. Without event history, falls back to the
 * cumulative dangerous-attack split. Recent substitutions then shift the
 * home share.
 */
export function computeMomentum(
    snapshot: MatchSnapshot,
    currentMinute: number,
    config: EngineConfig
): MomentumWindow {
    const windowMinutes = config.momentumWindowMinutes;
    const hasHistory = snapshot.events.some(e => MOMENTUM_KINDS.has(e.kind));

    let home: MomentumTally;
    let away: MomentumTally;
    let ratio: number;

    if (hasHistory) {
        ({ home, away } = tallyWindow(snapshot.events, currentMinute, windowMinutes));
        ratio = computeMomentumRatio(tallyTotal(home), tallyTotal(away));
    } else {
        home = emptyTally();
        away = emptyTally();
        ratio = computeMomentumRatio(snapshot.dangerousAttacks.home, snapshot.dangerousAttacks.away);
    }

    const subShift = substitutionShiftHome(snapshot.substitutionEvents, currentMinute, windowMinutes);
    ratio = clamp(ratio + subShift, 0, 1);

    return {
        fromMinute: Math.max(0, currentMinute - windowMinutes),
        toMinute: currentMinute,
        home,
        away,
        momentumRatioHome: ratio,
        momentumRatioAway: 1 - ratio,
        homeAttackMultiplier: computeAttackMultiplier(ratio),
        awayAttackMultiplier: computeAttackMultiplier(1 - ratio),
        substitutionShiftHome: subShift,
        source: hasHistory ? 'EVENTS' : 'CUMULATIVE'
    };
}
