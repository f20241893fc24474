/**
 * Live Market Engine - Environment Configuration
 * Maps ENGINE_* variables (optionally from a .env file) onto config overrides.
 */

import * as dotenv from 'dotenv';
import { z } from 'zod';
import { resolveConfig } from './config';
import type { ConfigOverrides, EngineConfig } from './config';
import { debugManager } from './debug';
import type { ConsoleThreshold, DebugManager } from './debug';

type Env = Record<string, string | undefined>;

const blankAsMissing = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const optionalNumber = (schema: z.ZodNumber) => z.preprocess(blankAsMissing, z.coerce.number().pipe(schema).optional());

const LOG_LEVELS: Record<'trace' | 'info' | 'warn' | 'error' | 'silent', ConsoleThreshold> = {
    trace: 'TRACE',
    info: 'INFO',
    warn: 'WARN',
    error: 'ERROR',
    silent: 'SILENT'
};

const EnvSchema = z.object({
    ENGINE_RELIABILITY_THRESHOLD: optionalNumber(z.number().min(0)),
    ENGINE_DIXON_COLES_RHO: optionalNumber(z.number().min(-1).max(1)),
    ENGINE_MOMENTUM_WINDOW: optionalNumber(z.number().positive()),
    ENGINE_LOG_LEVEL: z.preprocess(
        v => (typeof v === 'string' ? v.trim().toLowerCase() : v),
        z.enum(['trace', 'info', 'warn', 'error', 'silent']).optional()
    )
});

export interface EnvConfigOptions {
    /** Variables to read; defaults to process.env after loading .env */
    env?: Env;
    /** .env file to load when reading process.env */
    path?: string;
    logger?: DebugManager;
}

export interface EnvConfig {
    config: EngineConfig;
    logLevel?: ConsoleThreshold;
}

export function requireEnv(name: string, env: Env = process.env): string {
    const value = env[name];
    if (value === undefined || value.trim() === '') {
        throw new Error(`[ENV:MISSING] ${name} is not set`);
    }
    return value;
}

export function loadConfigFromEnv(options: EnvConfigOptions = {}): EnvConfig {
    let env = options.env;
    if (!env) {
        dotenv.config(options.path ? { path: options.path } : undefined);
        env = process.env;
    }

    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`[CONFIG:INVALID] ${issues.join('; ')}`);
    }

    const vars = parsed.data;
    const overrides: ConfigOverrides = {};
    if (vars.ENGINE_RELIABILITY_THRESHOLD !== undefined) {
        overrides.reliabilityThresholdMinutes = vars.ENGINE_RELIABILITY_THRESHOLD;
    }
    if (vars.ENGINE_DIXON_COLES_RHO !== undefined) {
        overrides.dixonColesRho = vars.ENGINE_DIXON_COLES_RHO;
    }
    if (vars.ENGINE_MOMENTUM_WINDOW !== undefined) {
        overrides.momentumWindowMinutes = vars.ENGINE_MOMENTUM_WINDOW;
    }

    const logLevel = vars.ENGINE_LOG_LEVEL ? LOG_LEVELS[vars.ENGINE_LOG_LEVEL] : undefined;
    if (logLevel) {
        (options.logger ?? debugManager).setConsoleThreshold(logLevel);
    }

    return { config: resolveConfig(overrides), logLevel };
}
