/**
 * Live Market Engine - Phase State Machine
 * Match clock -> named phase. Pure function of the minute; no hidden state.
 */

import type { EngineConfig } from './config';
import type { PhaseReading, PhaseState } from './types';

/**
 * Resolve the phase for a minute using half-open [start, end) intervals.
 * Before the first boundary is OPENING; stoppage time past the last
 * boundary stays in the final phase.
 */
export function getPhase(minute: number, config: EngineConfig): PhaseState {
    const boundaries = config.phaseBoundaries;
    for (const b of boundaries) {
        if (minute >= b.start && minute < b.end) return b.phase;
    }
    const first = boundaries[0];
    if (!first || minute < first.start) return 'OPENING';
    return 'DESPERATE';
}

/**
 * Phase plus its BTTS-style bias (percentage points) and urgency
 */
export function readPhase(
    minute: number,
    homeScore: number,
    awayScore: number,
    config: EngineConfig
): PhaseReading {
    const phase = getPhase(minute, config);
    let bias = config.phaseBias[phase];

    if (phase === 'DESPERATE' && homeScore === 0 && awayScore === 0) {
        bias += config.desperateGoallessBias;
    }

    return { phase, bias, urgency: config.phaseUrgency[phase] };
}

/**
 * Whether a move from one minute to another crosses into a new phase
 */
export function isPhaseTransition(previousMinute: number, minute: number, config: EngineConfig): boolean {
    return getPhase(previousMinute, config) !== getPhase(minute, config);
}
