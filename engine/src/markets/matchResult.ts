/**
 * Match Result (1X2)
 *
 * Seeds come from the size of the current goal difference, then get additive
 * adjustments for projected xG, possession and dangerous-attack share, plus a
 * time boost that grows with the square of elapsed time for whichever outcome
 * the score already satisfies.
 *
 * Ordering: clamp each raw score to the floor, sum, rescale to 100. Never
 * clamp after rescaling.
 */

import type { EngineConfig } from '../config';
import { clamp, safeDivide } from '../math';
import { normalizeRecord } from '../normalizer';
import type { MarketContext, MarketResult } from '../types';
import { makeResult, teamName } from './shared';

export interface MatchResultInput {
    minute: number;
    homeScore: number;
    awayScore: number;
    homeXgRemaining: number;
    awayXgRemaining: number;
    possessionHome: number;
    possessionAway: number;
    dangerousAttacksHome: number;
    dangerousAttacksAway: number;
}

export interface MatchResultScores {
    home: number;
    draw: number;
    away: number;
}

export interface MatchResultBreakdown {
    raw: MatchResultScores;
    normalized: MatchResultScores;
    xgAdjustment: number;
    possessionAdjustment: number;
    attackAdjustment: number;
    timeBoost: number;
}

const OUTCOMES = ['home', 'draw', 'away'] as const;

/**
 * Raw (pre-normalization) 1X2 scores
 */
export function computeRawMatchResult(
    input: MatchResultInput,
    config: EngineConfig
): Omit<MatchResultBreakdown, 'normalized'> {
    const mr = config.matchResult;
    const diff = input.homeScore - input.awayScore;
    const seed = mr.seedsByMargin[Math.min(Math.abs(diff), mr.seedsByMargin.length - 1)];
    const [leader, drawSeed, trailer] = seed;

    // Level: [home, draw, away] read straight off the row
    let home = diff < 0 ? trailer : leader;
    let away = diff < 0 ? leader : trailer;
    let draw = drawSeed;

    const xgDiff = input.homeXgRemaining - input.awayXgRemaining;
    const xgAdjustment = clamp(xgDiff * mr.xgAdjustmentScale, -mr.xgAdjustmentCap, mr.xgAdjustmentCap);

    const possessionTotal = input.possessionHome + input.possessionAway;
    const possessionAdjustment = possessionTotal > 0
        ? clamp(((input.possessionHome / possessionTotal) * 100 - 50) * mr.possessionScale, -mr.possessionCap, mr.possessionCap)
        : 0;

    const attackTotal = input.dangerousAttacksHome + input.dangerousAttacksAway;
    const attackAdjustment = attackTotal > 0
        ? clamp((safeDivide(input.dangerousAttacksHome, attackTotal, 0.5) - 0.5) * mr.attackScale, -mr.attackCap, mr.attackCap)
        : 0;

    const elapsed = clamp(safeDivide(input.minute, config.regulationMinutes), 0, 1);
    const timeBoost = mr.timeBoostMax * elapsed * elapsed;

    const swing = xgAdjustment + possessionAdjustment + attackAdjustment;
    home += swing;
    away -= swing;
    draw -= Math.abs(xgAdjustment) * mr.drawXgDampening;

    if (diff > 0) home += timeBoost;
    else if (diff < 0) away += timeBoost;
    else draw += timeBoost;

    return {
        raw: { home, draw, away },
        xgAdjustment,
        possessionAdjustment,
        attackAdjustment,
        timeBoost
    };
}

export function computeMatchResult(input: MatchResultInput, config: EngineConfig): MatchResultBreakdown {
    const breakdown = computeRawMatchResult(input, config);
    const normalized = normalizeRecord(breakdown.raw, OUTCOMES, {
        floor: config.matchResult.scoreFloor,
        ceiling: config.matchResult.scoreCeiling
    });
    return { ...breakdown, normalized };
}

export function matchResultMarket(ctx: MarketContext, config: EngineConfig): MarketResult[] {
    const { snapshot, projection } = ctx;
    const result = computeMatchResult({
        minute: snapshot.minute,
        homeScore: snapshot.homeScore,
        awayScore: snapshot.awayScore,
        homeXgRemaining: projection.homeExpectedRemaining,
        awayXgRemaining: projection.awayExpectedRemaining,
        possessionHome: snapshot.possession.home,
        possessionAway: snapshot.possession.away,
        dangerousAttacksHome: snapshot.dangerousAttacks.home,
        dangerousAttacksAway: snapshot.dangerousAttacks.away
    }, config);

    const xgDiff = projection.homeExpectedRemaining - projection.awayExpectedRemaining;
    const context = `Score ${snapshot.homeScore}-${snapshot.awayScore}, xG momentum ${xgDiff >= 0 ? '+' : ''}${xgDiff.toFixed(2)}, ${projection.timeRemaining}min left`;

    return [
        makeResult({
            market: 'MATCH_RESULT',
            selection: `1 (${teamName(snapshot, 'home')} Win)`,
            probability: result.normalized.home,
            confidenceTier: ctx.confidence,
            rationale: context
        }),
        makeResult({
            market: 'MATCH_RESULT',
            selection: 'X (Draw)',
            probability: result.normalized.draw,
            confidenceTier: ctx.confidence,
            rationale: context
        }),
        makeResult({
            market: 'MATCH_RESULT',
            selection: `2 (${teamName(snapshot, 'away')} Win)`,
            probability: result.normalized.away,
            confidenceTier: ctx.confidence,
            rationale: context
        })
    ];
}
