// src/adapters/database/IDatabase.ts

export type SqlValue = string | number | null;
export type SqlDialect = 'sqlite' | 'postgres';

// Linha crua devolvida pelo driver; os repositórios normalizam
export type DbRow = Record<string, unknown>;

export interface QueryResult {
    rows: DbRow[];
    rowCount: number;
}

export interface IDatabase {
    connect(): Promise<void>;
    disconnect(): Promise<void>;
    query(sql: string, params?: SqlValue[]): Promise<QueryResult>;
    execute(sql: string, params?: SqlValue[]): Promise<number>;
    isConnected(): boolean;
    getDialect(): SqlDialect;
}

export type DatabaseProvider = () => Promise<IDatabase>;

export function isDbRow(value: unknown): value is DbRow {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
