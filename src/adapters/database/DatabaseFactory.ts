// src/adapters/database/DatabaseFactory.ts

import { IDatabase } from './IDatabase';
import { IDatabaseConfig, loadDatabaseConfig } from './DatabaseConfig';
import { SQLiteDatabase } from './SQLiteDatabase';
import { PostgresDatabase } from './PostgresDatabase';
import { logger } from '../../utils/logger';

export function createDatabase(config: IDatabaseConfig): IDatabase {
    // Arquivo local, :memory: e Turso passam todos pelo cliente libSQL
    return config.type === 'postgres'
        ? new PostgresDatabase(config)
        : new SQLiteDatabase(config);
}

/**
 * Connects and creates the record and model tables when missing.
 */
export async function openDatabase(config: IDatabaseConfig = loadDatabaseConfig()): Promise<IDatabase> {
    const db = createDatabase(config);
    await db.connect();
    logger().info(`[DB] Connected (${config.type})`);
    return db;
}
