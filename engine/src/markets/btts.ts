/**
 * Both Teams To Score
 *
 * Once both sides have scored the market is COMPLETE and never offered as a
 * forward-looking pick.
 */

import type { EngineConfig } from '../config';
import { buildScoreMatrix, bttsProbability } from '../dixonColes';
import { normalizeProbabilities } from '../normalizer';
import { probabilityAtLeastOne } from '../poisson';
import type { MarketContext, MarketResult } from '../types';
import { makeResult } from './shared';

export interface BttsInput {
    homeScore: number;
    awayScore: number;
    homeRemaining: number;
    awayRemaining: number;
    rho: number;
    maxGoals: number;
    corrected: boolean;
}

/**
 * Independent form: P(home scores) × P(away scores), with a side that has
 * already scored counting as certain
 */
export function computeIndependentBtts(input: Omit<BttsInput, 'rho' | 'maxGoals' | 'corrected'>): number {
    const pHome = input.homeScore > 0 ? 1 : probabilityAtLeastOne(input.homeRemaining);
    const pAway = input.awayScore > 0 ? 1 : probabilityAtLeastOne(input.awayRemaining);
    return pHome * pAway;
}

/**
 * BTTS probability in [0, 1]. With correction on it is the corrected joint
 * mass over every remaining scoreline that leaves both sides on >= 1.
 */
export function computeBttsProbability(input: BttsInput): number {
    if (!input.corrected) return computeIndependentBtts(input);
    const matrix = buildScoreMatrix(input.homeRemaining, input.awayRemaining, {
        rho: input.rho,
        maxGoals: input.maxGoals
    });
    return bttsProbability(matrix, input.homeScore, input.awayScore);
}

/**
 * Phase bias in points, scaled by 4p(1 - p): full strength at p = 0.5,
 * zero when the model says BTTS is certain or impossible
 */
export function scaledPhaseBias(p: number, bias: number): number {
    return bias * 4 * p * (1 - p);
}

export function bttsMarket(ctx: MarketContext, config: EngineConfig): MarketResult[] {
    const { snapshot, projection, phase } = ctx;
    const scoreline = `${snapshot.homeScore}-${snapshot.awayScore}`;

    if (snapshot.homeScore > 0 && snapshot.awayScore > 0) {
        const rationale = `Both teams already scored (${scoreline})`;
        return [
            makeResult({ market: 'BTTS', selection: 'Yes', probability: 100, state: 'COMPLETE', confidenceTier: ctx.confidence, rationale }),
            makeResult({ market: 'BTTS', selection: 'No', probability: 0, state: 'COMPLETE', confidenceTier: ctx.confidence, rationale })
        ];
    }

    const p = computeBttsProbability({
        homeScore: snapshot.homeScore,
        awayScore: snapshot.awayScore,
        homeRemaining: projection.homeExpectedRemaining,
        awayRemaining: projection.awayExpectedRemaining,
        rho: config.dixonColesRho,
        maxGoals: config.maxGoals,
        corrected: config.dixonColesEnabled
    });

    const bias = scaledPhaseBias(p, phase.bias);
    const [yes, no] = normalizeProbabilities([p * 100 + bias, (1 - p) * 100 - bias]);

    const needs = snapshot.homeScore > 0
        ? 'away needs 1 goal'
        : snapshot.awayScore > 0
            ? 'home needs 1 goal'
            : 'both need to score';
    const rationale = `${scoreline}, ${needs}; ${phase.phase} bias ${phase.bias >= 0 ? '+' : ''}${phase.bias}pp`;

    return [
        makeResult({ market: 'BTTS', selection: 'Yes', probability: yes, confidenceTier: ctx.confidence, rationale }),
        makeResult({ market: 'BTTS', selection: 'No', probability: no, confidenceTier: ctx.confidence, rationale })
    ];
}
