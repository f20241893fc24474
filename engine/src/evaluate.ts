/**
 * Live Market Engine - Evaluation Pipeline
 *
 * snapshot -> goal rates -> phase -> momentum -> confidence -> markets
 *
 * Pure and synchronous: the same snapshot and config always produce the
 * same output. A market that throws or yields a non-finite probability is
 * logged, recorded as a failure and dropped; the others still run.
 */

import { DEFAULT_CONFIG } from './config';
import type { EngineConfig } from './config';
import { computeConfidenceTier } from './confidence';
import { debugManager } from './debug';
import type { DebugManager } from './debug';
import { buildScoreMatrix, topCorrectScores } from './dixonColes';
import { projectGoalRates } from './goalRate';
import { MARKET_CALCULATORS, MARKET_ORDER } from './markets';
import type { MarketCalculator } from './markets';
import { computeMomentum } from './momentum';
import { readPhase } from './phase';
import { selectBestBets } from './selector';
import type { Selection, SelectorOptions } from './selector';
import { parseSnapshot } from './snapshot';
import type {
    CorrectScore,
    EvaluationOutput,
    MarketContext,
    MarketFailure,
    MarketKind,
    MarketResult,
    MatchSnapshot
} from './types';

const COMPONENT = 'Evaluate';

export interface EvaluateOptions {
    logger?: DebugManager;
    /** Replace individual calculators, e.g. to plug in a different model */
    calculators?: Partial<Record<MarketKind, MarketCalculator>>;
}

export interface MatchReport extends EvaluationOutput {
    selection: Selection;
}

export function buildMarketContext(snapshot: MatchSnapshot, config: EngineConfig): MarketContext {
    const projection = projectGoalRates(snapshot, config);
    const phase = readPhase(snapshot.minute, snapshot.homeScore, snapshot.awayScore, config);
    const momentum = computeMomentum(snapshot, snapshot.minute, config);
    const confidence = computeConfidenceTier({ minute: snapshot.minute, projection, momentum, phase });
    return { snapshot, projection, phase, momentum, confidence };
}

/**
 * Most likely final scores: current score plus the remaining-goals matrix
 */
export function projectCorrectScores(ctx: MarketContext, config: EngineConfig, topN = 5): CorrectScore[] {
    const matrix = buildScoreMatrix(ctx.projection.homeExpectedRemaining, ctx.projection.awayExpectedRemaining, {
        rho: config.dixonColesRho,
        maxGoals: config.maxGoals,
        corrected: config.dixonColesEnabled
    });
    return topCorrectScores(matrix, topN).map(s => ({
        home: ctx.snapshot.homeScore + s.home,
        away: ctx.snapshot.awayScore + s.away,
        probability: s.probability
    }));
}

function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

export function evaluate(
    snapshot: MatchSnapshot,
    config: EngineConfig = DEFAULT_CONFIG,
    options: EvaluateOptions = {}
): EvaluationOutput {
    const logger = options.logger ?? debugManager;
    const ctx = buildMarketContext(snapshot, config);

    const results: MarketResult[] = [];
    const failures: MarketFailure[] = [];

    for (const market of MARKET_ORDER) {
        const calculator = options.calculators?.[market] ?? MARKET_CALCULATORS[market];
        try {
            const produced = calculator(ctx, config);
            const invalid = produced.find(r => !Number.isFinite(r.probability));
            if (invalid) {
                throw new Error(`non-finite probability for ${invalid.selection}`);
            }
            results.push(...produced);
        } catch (err) {
            const message = describeError(err);
            failures.push({ market, message });
            logger.warn(COMPONENT, 'MARKET_FAILED', snapshot.fixtureId, { market, message });
        }
    }

    logger.trace(COMPONENT, 'EVALUATED', snapshot.fixtureId, {
        minute: snapshot.minute,
        phase: ctx.phase.phase,
        confidence: ctx.confidence,
        results: results.length,
        failures: failures.length
    });

    return {
        fixtureId: snapshot.fixtureId,
        minute: snapshot.minute,
        projection: ctx.projection,
        phase: ctx.phase,
        momentum: ctx.momentum,
        correctScores: projectCorrectScores(ctx, config),
        results,
        failures
    };
}

/**
 * Coerce a raw feed payload, evaluate it and rank the open markets
 */
export function evaluateRaw(
    raw: unknown,
    config: EngineConfig = DEFAULT_CONFIG,
    options: EvaluateOptions & { selector?: SelectorOptions } = {}
): MatchReport {
    const output = evaluate(parseSnapshot(raw), config, options);
    return { ...output, selection: selectBestBets(output.results, options.selector) };
}
