/**
 * Live Market Engine - Confidence Tiers
 * How much the current snapshot can be trusted, as a closed tier union
 */

import type { ConfidenceTier, GoalRateProjection, MomentumWindow, PhaseReading } from './types';

export interface ConfidenceInput {
    minute: number;
    projection: GoalRateProjection;
    momentum: MomentumWindow;
    phase: PhaseReading;
}

export function computeConfidenceScore(input: ConfidenceInput): number {
    let score = 0;

    // Time played
    if (input.minute >= 30) score += 25;
    if (input.minute >= 45) score += 15;

    // Signal quality
    if (input.projection.source === 'XG') score += 20;
    else if (input.projection.source === 'SHOT_PROXY') score += 10;
    if (input.projection.reliable) score += 15;

    // Clear momentum either way
    if (Math.abs(input.momentum.momentumRatioHome - 0.5) >= 0.15) score += 15;

    if (input.phase.urgency === 'HIGH' || input.phase.urgency === 'VERY_HIGH') score += 10;

    return score;
}

export function scoreToTier(score: number): ConfidenceTier {
    if (score >= 80) return 'VERY_HIGH';
    if (score >= 60) return 'HIGH';
    if (score >= 40) return 'MEDIUM';
    return 'LOW';
}

export function computeConfidenceTier(input: ConfidenceInput): ConfidenceTier {
    return scoreToTier(computeConfidenceScore(input));
}
