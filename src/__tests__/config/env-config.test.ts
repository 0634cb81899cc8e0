// src/__tests__/config/env-config.test.ts

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

describe('Environment Validation', () => {
    const originalEnv = process.env;

    beforeEach(() => {
        process.env = { ...originalEnv };
        vi.resetModules();
    });

    afterEach(() => {
        process.env = originalEnv;
    });

    describe('validateEnvironment', () => {
        it('should pass with defaults only', async () => {
            delete process.env.DATABASE_TYPE;
            delete process.env.DATABASE_URL;
            delete process.env.AUTH_SECRET;

            const { validateEnvironment } = await import('../../config/env-config');

            expect(() => validateEnvironment()).not.toThrow();
        });

        it('should throw for an unknown database type', async () => {
            process.env.DATABASE_TYPE = 'oracle';

            const { validateEnvironment } = await import('../../config/env-config');

            expect(() => validateEnvironment()).toThrow('DATABASE_TYPE: Must be one of: sqlite, postgres, turso');
        });

        it('should require DATABASE_URL for postgres', async () => {
            process.env.DATABASE_TYPE = 'postgres';
            delete process.env.DATABASE_URL;

            const { validateEnvironment } = await import('../../config/env-config');

            expect(() => validateEnvironment()).toThrow('DATABASE_URL: Required when DATABASE_TYPE=postgres');
        });

        it('should throw when values are invalid', async () => {
            process.env.PORT = '70000';
            process.env.AUTH_SECRET = 'short';
            process.env.OEE_TREND_DEADBAND = '-0.5';

            const { validateEnvironment } = await import('../../config/env-config');

            expect(() => validateEnvironment()).toThrow('Environment validation failed');
        });

        it('should pass when all vars are valid', async () => {
            process.env.DATABASE_TYPE = 'turso';
            process.env.DATABASE_URL = 'libsql://oee.example.com';
            process.env.PORT = '3001';
            process.env.AUTH_SECRET = 'test-secret-placeholder';
            process.env.OEE_TREND_DEADBAND = '0.02';
            process.env.OEE_REPORT_WINDOW_DAYS = '14';
            process.env.OEE_LIST_LIMIT = '25';

            const { validateEnvironment } = await import('../../config/env-config');

            expect(() => validateEnvironment()).not.toThrow();
        });
    });

    describe('requireEnv', () => {
        it('should return value when env var is set', async () => {
            process.env.TEST_VAR = 'test-value';

            const { requireEnv } = await import('../../config/env-config');

            expect(requireEnv('TEST_VAR')).toBe('test-value');
        });

        it('should throw when env var is not set', async () => {
            delete process.env.MISSING_VAR;

            const { requireEnv } = await import('../../config/env-config');

            expect(() => requireEnv('MISSING_VAR')).toThrow('Required environment variable');
        });
    });

    describe('optionalEnv', () => {
        it('should return default when env var is not set', async () => {
            delete process.env.MISSING_OPTIONAL;

            const { optionalEnv } = await import('../../config/env-config');

            expect(optionalEnv('MISSING_OPTIONAL', 'default')).toBe('default');
        });
    });

    describe('getReportConfig', () => {
        it('should read the report tunables', async () => {
            process.env.OEE_TREND_DEADBAND = '0.05';
            process.env.OEE_REPORT_WINDOW_DAYS = '7';
            process.env.OEE_LIST_LIMIT = '20';

            const { getReportConfig } = await import('../../config/report-config');

            expect(getReportConfig()).toEqual({ trendDeadband: 0.05, defaultWindowDays: 7, listLimit: 20 });
        });

        it('should fall back to defaults on bad values', async () => {
            process.env.OEE_TREND_DEADBAND = 'abc';
            process.env.OEE_REPORT_WINDOW_DAYS = '-3';
            delete process.env.OEE_LIST_LIMIT;

            const { getReportConfig } = await import('../../config/report-config');

            expect(getReportConfig()).toEqual({ trendDeadband: 0.01, defaultWindowDays: 30, listLimit: 100 });
        });
    });
});
