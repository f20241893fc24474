/**
 * Live Market Engine - Type Definitions
 * Canonical data contracts for the entire system
 */

// ============================================================================
// SNAPSHOT INPUT CONTRACT (what ingestion must produce)
// ============================================================================

export type Side = 'home' | 'away';

export interface SidePair {
    home: number;
    away: number;
}

export type MatchEventKind =
    | 'shot'
    | 'dangerous_attack'
    | 'corner'
    | 'goal'
    | 'card'
    | 'substitution';

export interface MatchEvent {
    minute: number;
    side: Side;
    kind: MatchEventKind;
}

export interface SubstitutionEvent {
    minute: number;
    side: Side;
    offensive?: boolean;
}

/**
 * One live poll of a fixture. Every numeric field has already been coerced
 * to a finite, non-negative number by the snapshot schema.
 */
export interface MatchSnapshot {
    fixtureId: string;
    homeTeam?: string;
    awayTeam?: string;
    minute: number;
    homeScore: number;
    awayScore: number;
    homeXg: number;
    awayXg: number;
    shots: SidePair;
    shotsOnTarget: SidePair;
    corners: SidePair;
    cards: SidePair;
    redCards: SidePair;
    fouls: SidePair;
    possession: SidePair;
    dangerousAttacks: SidePair;
    substitutionEvents: SubstitutionEvent[];
    events: MatchEvent[];
}

// ============================================================================
// COMPONENT OUTPUTS
// ============================================================================

export type RateSource = 'XG' | 'SHOT_PROXY' | 'LEAGUE_DEFAULT';

export interface GoalRateProjection {
    homeRatePerMin: number;
    awayRatePerMin: number;
    reliable: boolean;
    timeRemaining: number;
    homeExpectedRemaining: number;
    awayExpectedRemaining: number;
    source: RateSource;
    /** Applied to each side's rate after a sending-off; 1 when none */
    redCardMultiplier: SidePair;
}

export const PHASES = [
    'OPENING',
    'PROBING',
    'PRE_HT_PUSH',
    'POST_HT_RESET',
    'DECISION_TIME',
    'DESPERATE'
] as const;

export type PhaseState = typeof PHASES[number];

export type UrgencyLevel = 'LOW' | 'MEDIUM' | 'HIGH' | 'VERY_HIGH';

export interface PhaseReading {
    phase: PhaseState;
    bias: number;
    urgency: UrgencyLevel;
}

export interface MomentumTally {
    shots: number;
    dangerousAttacks: number;
    corners: number;
}

export interface MomentumWindow {
    fromMinute: number;
    toMinute: number;
    home: MomentumTally;
    away: MomentumTally;
    momentumRatioHome: number;
    momentumRatioAway: number;
    homeAttackMultiplier: number;
    awayAttackMultiplier: number;
    /** Net home-share shift from substitutions in the window */
    substitutionShiftHome: number;
    source: 'EVENTS' | 'CUMULATIVE';
}

/** A scoreline and its probability in [0, 1] */
export interface CorrectScore {
    home: number;
    away: number;
    probability: number;
}

// ============================================================================
// MARKET CONTRACT
// ============================================================================

export type MarketKind =
    | 'TOTAL_GOALS'
    | 'BTTS'
    | 'CLEAN_SHEET'
    | 'TEAM_TOTAL'
    | 'NEXT_GOAL'
    | 'MATCH_RESULT'
    | 'CARDS'
    | 'CORNERS';

export type MarketState = 'ACTIVE' | 'COMPLETE';

export type ConfidenceTier = 'LOW' | 'MEDIUM' | 'HIGH' | 'VERY_HIGH';

export interface MarketResult {
    market: MarketKind;
    marketName: string;
    selection: string;
    line?: number;
    probability: number;
    state: MarketState;
    confidenceTier: ConfidenceTier;
    rationale: string;
    fairOdds: number | null;
}

/** Inputs every market calculator receives for one snapshot */
export interface MarketContext {
    snapshot: MatchSnapshot;
    projection: GoalRateProjection;
    phase: PhaseReading;
    momentum: MomentumWindow;
    confidence: ConfidenceTier;
}

// ============================================================================
// EVALUATION CONTRACT
// ============================================================================

export interface MarketFailure {
    market: MarketKind;
    message: string;
}

export interface EvaluationOutput {
    fixtureId: string;
    minute: number;
    projection: GoalRateProjection;
    phase: PhaseReading;
    momentum: MomentumWindow;
    /** Most likely final scores from the corrected remaining-goals matrix */
    correctScores: CorrectScore[];
    results: MarketResult[];
    failures: MarketFailure[];
}
