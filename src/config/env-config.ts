// src/config/env-config.ts

/**
 * Environment Configuration Module
 * Centralizes environment validation
 * Must be called at application startup (fail-fast)
 */

import { logger } from '../utils/logger';

interface EnvValidation {
    name: string;
    required: boolean;
    validator?: (value: string) => boolean;
    errorMessage?: string;
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];
export const DATABASE_TYPES = ['sqlite', 'postgres', 'turso'] as const;

const isNonNegativeNumber = (v: string) => v.trim() !== '' && Number.isFinite(Number(v)) && Number(v) >= 0;

const ENV_VARS: EnvValidation[] = [
    {
        name: 'DATABASE_TYPE',
        required: false,
        validator: (v) => DATABASE_TYPES.some(t => t === v.toLowerCase()),
        errorMessage: `Must be one of: ${DATABASE_TYPES.join(', ')}`
    },
    {
        name: 'DATABASE_URL',
        required: false, // Only required for postgres / turso
        validator: (v) => {
            try { new URL(v); return true; } catch { return false; }
        },
        errorMessage: 'Must be a valid URL'
    },
    {
        name: 'PORT',
        required: false,
        validator: (v) => Number.isInteger(Number(v)) && Number(v) > 0 && Number(v) < 65536,
        errorMessage: 'Must be an integer between 1 and 65535'
    },
    {
        name: 'AUTH_SECRET',
        required: false, // Only required if auth middleware is enabled
        validator: (v) => v.length >= 16,
        errorMessage: 'Must be at least 16 characters'
    },
    {
        name: 'LOG_LEVEL',
        required: false,
        validator: (v) => LOG_LEVELS.includes(v),
        errorMessage: `Must be one of: ${LOG_LEVELS.join(', ')}`
    },
    {
        name: 'OEE_TREND_DEADBAND',
        required: false,
        validator: isNonNegativeNumber,
        errorMessage: 'Must be a non-negative number'
    },
    {
        name: 'OEE_REPORT_WINDOW_DAYS',
        required: false,
        validator: isNonNegativeNumber,
        errorMessage: 'Must be a non-negative number'
    },
    {
        name: 'OEE_LIST_LIMIT',
        required: false,
        validator: (v) => Number.isInteger(Number(v)) && Number(v) > 0,
        errorMessage: 'Must be a positive integer'
    }
];

/**
 * Validates the environment variables the service reads
 * Logs warnings for missing optional vars, throws for invalid values
 */
export function validateEnvironment(): void {
    const errors: string[] = [];
    const warnings: string[] = [];

    for (const envVar of ENV_VARS) {
        const value = process.env[envVar.name];

        if (!value) {
            if (envVar.required) {
                errors.push(`${envVar.name}: Missing required variable`);
            } else {
                warnings.push(`${envVar.name}: Not configured (default will be used)`);
            }
            continue;
        }

        if (envVar.validator && !envVar.validator(value)) {
            errors.push(`${envVar.name}: ${envVar.errorMessage || 'Validation failed'}`);
        }
    }

    const dbType = (process.env.DATABASE_TYPE || 'sqlite').toLowerCase();
    if ((dbType === 'postgres' || dbType === 'turso') && !process.env.DATABASE_URL) {
        errors.push(`DATABASE_URL: Required when DATABASE_TYPE=${dbType}`);
    }

    warnings.forEach(w => logger().debug(`[CONFIG] ${w}`));

    // Errors are fatal
    if (errors.length > 0) {
        errors.forEach(e => logger().error(`[CONFIG] ${e}`));
        throw new Error(`Environment validation failed: ${errors.join('; ')}`);
    }

    logger().info('[CONFIG] Environment validation passed');
}

/**
 * Helper to access required environment variables with type safety
 * @throws Error if the variable is not set
 */
export function requireEnv(name: string): string {
    const value = process.env[name];
    if (!value) {
        throw new Error(`[CONFIG] Required environment variable ${name} is not set`);
    }
    return value;
}

/**
 * Helper to access optional environment variables with a default value
 */
export function optionalEnv(name: string, defaultValue: string): string {
    return process.env[name] || defaultValue;
}
