// src/adapters/database/SQLiteDatabase.ts

import { createClient, Client } from '@libsql/client';
import { IDatabase, QueryResult, SqlDialect, SqlValue } from './IDatabase';
import { DEFAULT_SQLITE_PATH, IDatabaseConfig } from './DatabaseConfig';
import { SQLITE_SCHEMA } from './schema';
import * as fs from 'fs';
import * as path from 'path';

const IN_MEMORY = ':memory:';

/**
 * SQLite through libSQL: a local file, an in-memory database or a remote
 * Turso database, depending on the config type.
 */
export class SQLiteDatabase implements IDatabase {
    private client: Client | null = null;
    private config: IDatabaseConfig;
    private connected: boolean = false;

    constructor(config: IDatabaseConfig) {
        this.config = config;
    }

    public async connect(): Promise<void> {
        if (this.connected && this.client) return;

        this.client = createClient({
            url: this.resolveUrl(),
            authToken: this.config.authToken
        });
        this.connected = true;

        await this.initializeTables();
    }

    public async disconnect(): Promise<void> {
        if (this.client) {
            this.client.close();
            this.client = null;
            this.connected = false;
        }
    }

    public async query(sql: string, params: SqlValue[] = []): Promise<QueryResult> {
        const result = await this.requireClient().execute({ sql, args: params });
        return {
            rows: result.rows,
            rowCount: result.rows.length
        };
    }

    public async execute(sql: string, params: SqlValue[] = []): Promise<number> {
        const result = await this.requireClient().execute({ sql, args: params });
        return result.rowsAffected;
    }

    public isConnected(): boolean {
        return this.connected;
    }

    public getDialect(): SqlDialect {
        return 'sqlite';
    }

    // Turso usa a URL remota; arquivo local vira file:<path>
    private resolveUrl(): string {
        if (this.config.type === 'turso') {
            return this.config.connectionString || '';
        }

        const dbPath = this.config.connectionString || DEFAULT_SQLITE_PATH;
        if (dbPath === IN_MEMORY) return IN_MEMORY;

        const dir = path.dirname(dbPath);
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }
        return `file:${dbPath}`;
    }

    private requireClient(): Client {
        if (!this.client) throw new Error('Database not connected');
        return this.client;
    }

    private async initializeTables(): Promise<void> {
        const client = this.requireClient();
        for (const statement of SQLITE_SCHEMA) {
            await client.execute(statement);
        }
    }
}
