// src/adapters/database/DatabaseConfig.ts

export type DatabaseType = 'sqlite' | 'postgres' | 'turso';

export interface IDatabaseConfig {
    type: DatabaseType;
    connectionString?: string;
    authToken?: string;
    ssl?: boolean;
}

export const DEFAULT_SQLITE_PATH = './data/oee.db';

type Env = Record<string, string | undefined>;

/**
 * Resolves the storage backend from the environment.
 * Under NODE_ENV=test everything runs on an in-memory SQLite database.
 */
export function loadDatabaseConfig(env: Env = process.env): IDatabaseConfig {
    if (env.NODE_ENV === 'test') {
        return { type: 'sqlite', connectionString: ':memory:' };
    }

    switch ((env.DATABASE_TYPE || 'sqlite').toLowerCase()) {
        case 'postgres':
            return {
                type: 'postgres',
                connectionString: env.DATABASE_URL || '',
                ssl: env.DATABASE_SSL === 'true'
            };

        case 'turso':
            return {
                type: 'turso',
                connectionString: env.DATABASE_URL || '',
                authToken: env.TURSO_AUTH_TOKEN
            };

        default:
            return {
                type: 'sqlite',
                connectionString: env.SQLITE_PATH || DEFAULT_SQLITE_PATH
            };
    }
}
