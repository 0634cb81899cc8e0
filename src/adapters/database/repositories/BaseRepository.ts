// src/adapters/database/repositories/BaseRepository.ts

import { DatabaseProvider, DbRow, IDatabase, SqlValue } from '../IDatabase';
import { PaginationParams, PaginatedResult } from '../../../utils/shared';
import { clampPagination } from '../../../utils/pagination';
import { StorageError, errorMessage, isOEEError } from '../../../domain/errors';
import { logger } from '../../../utils/logger';

// Cláusula WHERE já montada com placeholders $1..$n
export interface WhereClause {
    sql: string;
    params: SqlValue[];
}

export abstract class BaseRepository<T> {
    protected abstract tableName: string;
    protected abstract idColumn: string;
    protected abstract timestampColumn: string;

    constructor(private readonly dbProvider: DatabaseProvider) {}

    protected abstract fromRow(row: DbRow): T;

    protected getDb(): Promise<IDatabase> {
        return this.dbProvider();
    }

    /**
     * Runs a storage operation; anything the driver throws comes back as StorageError.
     */
    protected async run<R>(operation: string, fn: (db: IDatabase) => Promise<R>): Promise<R> {
        try {
            const db = await this.getDb();
            return await fn(db);
        } catch (error) {
            if (isOEEError(error)) throw error;
            logger().error({ err: error, table: this.tableName }, `[DB] ${operation} failed`);
            throw new StorageError(`${operation} failed: ${errorMessage(error)}`, error);
        }
    }

    protected async select(db: IDatabase, sql: string, params: SqlValue[] = []): Promise<T[]> {
        const result = await db.query(this.convertPlaceholders(db, sql), params);
        return result.rows.map(r => this.fromRow(r));
    }

    public async findById(id: string): Promise<T | null> {
        return this.run(`find ${this.tableName} by id`, async db => {
            const sql = `SELECT * FROM ${this.tableName} WHERE ${this.idColumn} = $1`;
            const rows = await this.select(db, sql, [id]);
            return rows[0] ?? null;
        });
    }

    /**
     * Paginated find, newest first
     * @param pagination - page (1-based) and limit (max 100)
     */
    protected async findPaginated(
        where: WhereClause,
        pagination: PaginationParams
    ): Promise<PaginatedResult<T>> {
        return this.run(`page ${this.tableName}`, async db => {
            const { page, limit } = clampPagination(pagination);
            const offset = (page - 1) * limit;
            const whereSql = where.sql ? ` WHERE ${where.sql}` : '';

            const countSql = `SELECT COUNT(*) AS count FROM ${this.tableName}${whereSql}`;
            const countResult = await db.query(this.convertPlaceholders(db, countSql), where.params);
            const total = Number(countResult.rows[0]?.count ?? 0);

            // id desempata registros com o mesmo timestamp entre páginas
            const next = where.params.length + 1;
            const dataSql = `SELECT * FROM ${this.tableName}${whereSql} ORDER BY ${this.timestampColumn} DESC, ${this.idColumn} DESC LIMIT $${next} OFFSET $${next + 1}`;
            const data = await this.select(db, dataSql, [...where.params, limit, offset]);

            return { data, total, page, limit };
        });
    }

    protected convertPlaceholders(db: IDatabase, sql: string): string {
        // SQLite usa ? enquanto Postgres usa $1, $2...
        return db.getDialect() === 'sqlite' ? sql.replace(/\$\d+/g, '?') : sql;
    }
}
