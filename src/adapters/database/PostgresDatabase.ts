// src/adapters/database/PostgresDatabase.ts

import { Pool } from 'pg';
import { IDatabase, QueryResult, SqlDialect, SqlValue } from './IDatabase';
import { IDatabaseConfig } from './DatabaseConfig';
import { POSTGRES_SCHEMA } from './schema';

export class PostgresDatabase implements IDatabase {
    private pool: Pool | null = null;
    private config: IDatabaseConfig;
    private connected: boolean = false;

    constructor(config: IDatabaseConfig) {
        this.config = config;
    }

    public async connect(): Promise<void> {
        if (this.connected && this.pool) return;

        // Pool pequeno: a ferramenta é de uso individual
        this.pool = new Pool({
            connectionString: this.config.connectionString,
            ssl: this.config.ssl ? { rejectUnauthorized: false } : false,
            max: 5,
            idleTimeoutMillis: 30000,
            connectionTimeoutMillis: 5000
        });
        this.connected = true;

        await this.initializeTables();
    }

    public async disconnect(): Promise<void> {
        if (this.pool) {
            await this.pool.end();
            this.pool = null;
            this.connected = false;
        }
    }

    public async query(sql: string, params: SqlValue[] = []): Promise<QueryResult> {
        const result = await this.requirePool().query(sql, params);
        return {
            rows: result.rows,
            rowCount: result.rowCount || 0
        };
    }

    public async execute(sql: string, params: SqlValue[] = []): Promise<number> {
        const result = await this.requirePool().query(sql, params);
        return result.rowCount || 0;
    }

    public isConnected(): boolean {
        return this.connected;
    }

    public getDialect(): SqlDialect {
        return 'postgres';
    }

    private requirePool(): Pool {
        if (!this.pool) throw new Error('Database not connected');
        return this.pool;
    }

    private async initializeTables(): Promise<void> {
        const pool = this.requirePool();
        for (const statement of POSTGRES_SCHEMA) {
            await pool.query(statement);
        }
    }
}
