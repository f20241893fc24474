/**
 * Live Market Engine - Index
 * Public API exports
 */

// Types
export * from './types';

// Configuration
export { DEFAULT_CONFIG, resolveConfig } from './config';
export type { ConfigOverrides, EngineConfig, LeagueConstants, PhaseBoundary } from './config';
export { loadConfigFromEnv, requireEnv } from './env';
export type { EnvConfig, EnvConfigOptions } from './env';

// Logging
export { DebugManager, debugManager } from './debug';
export type { ConsoleThreshold, DebugLog, LogLevel } from './debug';

// Math utilities
export * from './math';
export * from './poisson';
export * from './normalizer';

// Core modules
export * from './snapshot';
export * from './goalRate';
export * from './dixonColes';
export * from './phase';
export * from './momentum';
export * from './confidence';

// Markets
export * from './markets';

// Ranking
export * from './selector';

// Main engine
export { buildMarketContext, evaluate, evaluateRaw, projectCorrectScores } from './evaluate';
export type { EvaluateOptions, MatchReport } from './evaluate';
export { describeBet, explainReport, formatProbability } from './explain';
