/**
 * Escrow Engine Configuration
 *
 * Reads engine parameters from ESCROW_* environment variables with defaults.
 * Heights and windows are in blocks.
 */

import { z } from 'zod';
import { ConfigurationError } from './Errors.js';

// --------------------------------------------------------------------------
// Schema
// --------------------------------------------------------------------------

export const EngineConfigSchema = z.object({
    /** Privileged account with cross-cutting override authority */
    supervisor: z.string().regex(/^\S{1,128}$/, 'supervisor must be a non-empty account id'),
    /** Signed timestamps must fall within this many blocks of the current height */
    recentWindow: z.number().int().min(1),
    /** Blocks added to the deadline by a security hold */
    holdDuration: z.number().int().min(1),
    /** Highest accepted priority level */
    maxPriority: z.number().int().min(0).max(255),
    /** Upper bound for configured operations per rate-limit window */
    maxRateLimit: z.number().int().min(1),
    /** Upper bound for a rate-limit window in blocks */
    maxRateWindow: z.number().int().min(1),
    /** Upper bound on registered multisig signers */
    maxSigners: z.number().int().min(2).max(64),
    /** Distinct parties whose signatures approve a multisig request */
    multisigQuorum: z.number().int().min(2).max(3),
    /** Rejections of one code tolerated before a pressure alert is logged */
    pressureThreshold: z.number().int().min(1),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

// --------------------------------------------------------------------------
// Environment Variables
// --------------------------------------------------------------------------

const ENV_VARS = {
    SUPERVISOR: 'ESCROW_SUPERVISOR',
    RECENT_WINDOW: 'ESCROW_RECENT_WINDOW',
    HOLD_DURATION: 'ESCROW_HOLD_DURATION',
    MAX_PRIORITY: 'ESCROW_MAX_PRIORITY',
    MAX_RATE_LIMIT: 'ESCROW_MAX_RATE_LIMIT',
    MAX_RATE_WINDOW: 'ESCROW_MAX_RATE_WINDOW',
    MAX_SIGNERS: 'ESCROW_MAX_SIGNERS',
    MULTISIG_QUORUM: 'ESCROW_MULTISIG_QUORUM',
    PRESSURE_THRESHOLD: 'ESCROW_PRESSURE_THRESHOLD',
} as const;

// --------------------------------------------------------------------------
// Defaults
// --------------------------------------------------------------------------

export const DEFAULTS = {
    recentWindow: 10,
    holdDuration: 100,
    maxPriority: 10,
    maxRateLimit: 1_000,
    maxRateWindow: 10_000,
    maxSigners: 10,
    multisigQuorum: 2,
    pressureThreshold: 5,
} as const;

function parseIntEnv(value: string | undefined, fallback: number): number {
    if (value == null || value.trim() === '') return fallback;
    const parsed = Number.parseInt(value, 10);
    return Number.isNaN(parsed) ? fallback : parsed;
}

// --------------------------------------------------------------------------
// Config Loader
// --------------------------------------------------------------------------

/**
 * Load engine configuration from the environment, applying overrides last.
 * Throws ConfigurationError when the merged result fails the schema.
 */
export function loadEngineConfig(
    overrides: Partial<EngineConfig> = {},
    env: NodeJS.ProcessEnv = process.env,
): EngineConfig {
    const candidate = {
        supervisor: env[ENV_VARS.SUPERVISOR] ?? '',
        recentWindow: parseIntEnv(env[ENV_VARS.RECENT_WINDOW], DEFAULTS.recentWindow),
        holdDuration: parseIntEnv(env[ENV_VARS.HOLD_DURATION], DEFAULTS.holdDuration),
        maxPriority: parseIntEnv(env[ENV_VARS.MAX_PRIORITY], DEFAULTS.maxPriority),
        maxRateLimit: parseIntEnv(env[ENV_VARS.MAX_RATE_LIMIT], DEFAULTS.maxRateLimit),
        maxRateWindow: parseIntEnv(env[ENV_VARS.MAX_RATE_WINDOW], DEFAULTS.maxRateWindow),
        maxSigners: parseIntEnv(env[ENV_VARS.MAX_SIGNERS], DEFAULTS.maxSigners),
        multisigQuorum: parseIntEnv(env[ENV_VARS.MULTISIG_QUORUM], DEFAULTS.multisigQuorum),
        pressureThreshold: parseIntEnv(env[ENV_VARS.PRESSURE_THRESHOLD], DEFAULTS.pressureThreshold),
        ...overrides,
    };

    return validateEngineConfig(candidate);
}

/**
 * Validate a configuration assembled in code.
 */
export function validateEngineConfig(candidate: unknown): EngineConfig {
    const parsed = EngineConfigSchema.safeParse(candidate);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
        throw new ConfigurationError(`Invalid escrow engine configuration: ${issues.join('; ')}`, issues);
    }
    return parsed.data;
}
