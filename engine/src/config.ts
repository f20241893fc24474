/**
 * Live Market Engine - Configuration
 * All tunable parameters in one place. Callers inject an EngineConfig;
 * nothing here is mutated at runtime.
 */

import { z } from 'zod';
import { PHASES } from './types';
import type { PhaseState, UrgencyLevel } from './types';

export interface PhaseBoundary {
    phase: PhaseState;
    start: number;
    end: number;
}

export interface LeagueConstants {
    /** Expected home goals over 90 minutes when the live rate is not trusted */
    defaultHomeXg: number;
    defaultAwayXg: number;
    /** League fouls per booking */
    foulsPerCard: number;
    foulsPerMatch: number;
    cornersPerMatch: number;
}

export interface EngineConfig {
    regulationMinutes: number;
    reliabilityThresholdMinutes: number;
    dixonColesRho: number;
    dixonColesEnabled: boolean;
    maxGoals: number;
    phaseBoundaries: PhaseBoundary[];
    phaseBias: Record<PhaseState, number>;
    phaseUrgency: Record<PhaseState, UrgencyLevel>;
    /** Extra BTTS bias when still goalless in the last phase */
    desperateGoallessBias: number;
    momentumWindowMinutes: number;
    league: LeagueConstants;
    xgProxy: { shotWeight: number; shotOnTargetWeight: number };
    thresholds: {
        totalGoals: number[];
        teamTotals: number[];
        cards: number[];
        corners: number[];
    };
    cards: {
        adaptiveAfterMinute: number;
        minObservedFouls: number;
        ratioMin: number;
        ratioMax: number;
        observedRateAfterMinute: number;
        lateMultiplierFrom60: number;
        lateMultiplierFrom75: number;
    };
    corners: {
        observedRateAfterMinute: number;
    };
    nextGoal: {
        trailingTeamBoost: number;
    };
    /** Goal-rate multipliers once a side is down to ten men */
    redCard: {
        opponentBoost: number;
        tenManPenalty: number;
        homeDismissedExtraPenalty: number;
        awayDismissedExtraPenalty: number;
        /** Extra lift for the away side when the home side is dismissed */
        awayOpponentExtraBoost: number;
    };
    matchResult: {
        /** [leader-or-home, draw, trailer-or-away] seeds by min(|goal diff|, 3) */
        seedsByMargin: [number, number, number][];
        xgAdjustmentScale: number;
        xgAdjustmentCap: number;
        possessionScale: number;
        possessionCap: number;
        attackScale: number;
        attackCap: number;
        drawXgDampening: number;
        timeBoostMax: number;
        scoreFloor: number;
        scoreCeiling: number;
    };
}

type NestedKeys = 'phaseBias' | 'phaseUrgency' | 'league' | 'xgProxy' | 'thresholds' | 'cards' | 'corners' | 'nextGoal' | 'redCard' | 'matchResult';

export interface ConfigOverrides extends Partial<Omit<EngineConfig, NestedKeys>> {
    phaseBias?: Partial<EngineConfig['phaseBias']>;
    phaseUrgency?: Partial<EngineConfig['phaseUrgency']>;
    league?: Partial<LeagueConstants>;
    xgProxy?: Partial<EngineConfig['xgProxy']>;
    thresholds?: Partial<EngineConfig['thresholds']>;
    cards?: Partial<EngineConfig['cards']>;
    corners?: Partial<EngineConfig['corners']>;
    nextGoal?: Partial<EngineConfig['nextGoal']>;
    redCard?: Partial<EngineConfig['redCard']>;
    matchResult?: Partial<EngineConfig['matchResult']>;
}

export const DEFAULT_CONFIG: EngineConfig = {
    // ============================================================================
    // CLOCK
    // ============================================================================
    regulationMinutes: 90,
    reliabilityThresholdMinutes: 20,

    // ============================================================================
    // SCORE MODEL
    // ============================================================================
    dixonColesRho: -0.05,
    dixonColesEnabled: true,
    maxGoals: 10,

    // ============================================================================
    // PHASES
    // ============================================================================
    phaseBoundaries: [
        { phase: 'OPENING', start: 0, end: 15 },
        { phase: 'PROBING', start: 15, end: 30 },
        { phase: 'PRE_HT_PUSH', start: 30, end: 45 },
        { phase: 'POST_HT_RESET', start: 45, end: 60 },
        { phase: 'DECISION_TIME', start: 60, end: 75 },
        { phase: 'DESPERATE', start: 75, end: 90 }
    ],
    phaseBias: {
        OPENING: -5,
        PROBING: 0,
        PRE_HT_PUSH: 8,
        POST_HT_RESET: 3,
        DECISION_TIME: 5,
        DESPERATE: 12
    },
    phaseUrgency: {
        OPENING: 'LOW',
        PROBING: 'LOW',
        PRE_HT_PUSH: 'MEDIUM',
        POST_HT_RESET: 'MEDIUM',
        DECISION_TIME: 'HIGH',
        DESPERATE: 'VERY_HIGH'
    },
    desperateGoallessBias: 8,

    // ============================================================================
    // MOMENTUM
    // ============================================================================
    momentumWindowMinutes: 5,

    // ============================================================================
    // LEAGUE TABLE
    // ============================================================================
    league: {
        defaultHomeXg: 0.8,
        defaultAwayXg: 0.6,
        foulsPerCard: 4.5,
        foulsPerMatch: 22,
        cornersPerMatch: 10
    },
    xgProxy: { shotWeight: 0.08, shotOnTargetWeight: 0.25 },

    // ============================================================================
    // MARKET LINES
    // ============================================================================
    thresholds: {
        totalGoals: [0.5, 1.5, 2.5, 3.5, 4.5],
        teamTotals: [0.5, 1.5, 2.5],
        cards: [2.5, 3.5, 4.5, 5.5, 6.5],
        corners: [7.5, 8.5, 9.5, 10.5, 11.5, 12.5]
    },
    cards: {
        adaptiveAfterMinute: 20,
        minObservedFouls: 1,
        ratioMin: 2,
        ratioMax: 10,
        observedRateAfterMinute: 10,
        lateMultiplierFrom60: 1.15,
        lateMultiplierFrom75: 1.3
    },
    corners: {
        observedRateAfterMinute: 10
    },
    nextGoal: {
        trailingTeamBoost: 1.1
    },

    // ============================================================================
    // DISMISSALS
    // ============================================================================
    redCard: {
        opponentBoost: 1.45,
        tenManPenalty: 0.4,
        homeDismissedExtraPenalty: 0.9,
        awayDismissedExtraPenalty: 0.95,
        awayOpponentExtraBoost: 1.05
    },
    matchResult: {
        seedsByMargin: [
            [35, 30, 35],
            [60, 25, 15],
            [78, 14, 8],
            [90, 7, 3]
        ],
        xgAdjustmentScale: 10,
        xgAdjustmentCap: 20,
        possessionScale: 0.2,
        possessionCap: 10,
        attackScale: 20,
        attackCap: 10,
        drawXgDampening: 0.3,
        timeBoostMax: 30,
        scoreFloor: 5,
        scoreCeiling: 100
    }
};

// ============================================================================
// VALIDATION
// ============================================================================

const lineList = z.array(z.number().positive()).min(1);

const EngineConfigSchema = z.object({
    regulationMinutes: z.number().positive(),
    reliabilityThresholdMinutes: z.number().min(0),
    dixonColesRho: z.number().min(-1).max(1),
    dixonColesEnabled: z.boolean(),
    maxGoals: z.number().int().min(2).max(30),
    phaseBoundaries: z.array(z.object({
        phase: z.enum(PHASES),
        start: z.number(),
        end: z.number()
    })).length(PHASES.length),
    momentumWindowMinutes: z.number().positive(),
    league: z.object({
        defaultHomeXg: z.number().min(0),
        defaultAwayXg: z.number().min(0),
        foulsPerCard: z.number().positive(),
        foulsPerMatch: z.number().min(0),
        cornersPerMatch: z.number().min(0)
    }),
    thresholds: z.object({
        totalGoals: lineList,
        teamTotals: lineList,
        cards: lineList,
        corners: lineList
    }),
    redCard: z.object({
        opponentBoost: z.number().positive(),
        tenManPenalty: z.number().positive(),
        homeDismissedExtraPenalty: z.number().positive(),
        awayDismissedExtraPenalty: z.number().positive(),
        awayOpponentExtraBoost: z.number().positive()
    }),
    matchResult: z.object({
        seedsByMargin: z.array(z.tuple([z.number(), z.number(), z.number()])).min(1),
        scoreFloor: z.number().min(0),
        scoreCeiling: z.number().positive()
    }).refine(m => m.scoreCeiling > m.scoreFloor, 'scoreCeiling must exceed scoreFloor')
}).passthrough();

/**
 * Phase boundaries must be the six phases in order, contiguous and ascending
 */
function validatePhaseBoundaries(boundaries: PhaseBoundary[]): string[] {
    const errors: string[] = [];
    boundaries.forEach((b, i) => {
        if (b.phase !== PHASES[i]) errors.push(`phase ${i} must be ${PHASES[i]}, got ${b.phase}`);
        if (b.end <= b.start) errors.push(`${b.phase}: end must exceed start`);
        const prev = boundaries[i - 1];
        if (prev && prev.end !== b.start) errors.push(`${b.phase}: must start where ${prev.phase} ends`);
    });
    return errors;
}

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws `[CONFIG:INVALID]` when the merged config cannot drive the engine.
 */
export function resolveConfig(overrides: ConfigOverrides = {}): EngineConfig {
    const merged: EngineConfig = {
        ...DEFAULT_CONFIG,
        ...overrides,
        phaseBias: { ...DEFAULT_CONFIG.phaseBias, ...overrides.phaseBias },
        phaseUrgency: { ...DEFAULT_CONFIG.phaseUrgency, ...overrides.phaseUrgency },
        league: { ...DEFAULT_CONFIG.league, ...overrides.league },
        xgProxy: { ...DEFAULT_CONFIG.xgProxy, ...overrides.xgProxy },
        thresholds: { ...DEFAULT_CONFIG.thresholds, ...overrides.thresholds },
        cards: { ...DEFAULT_CONFIG.cards, ...overrides.cards },
        corners: { ...DEFAULT_CONFIG.corners, ...overrides.corners },
        nextGoal: { ...DEFAULT_CONFIG.nextGoal, ...overrides.nextGoal },
        redCard: { ...DEFAULT_CONFIG.redCard, ...overrides.redCard },
        matchResult: { ...DEFAULT_CONFIG.matchResult, ...overrides.matchResult }
    };

    const parsed = EngineConfigSchema.safeParse(merged);
    const errors = parsed.success
        ? []
        : parsed.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`);
    errors.push(...validatePhaseBoundaries(merged.phaseBoundaries));

    if (errors.length > 0) {
        throw new Error(`[CONFIG:INVALID] ${errors.join('; ')}`);
    }
    return merged;
}
