// src/adapters/database/repositories/SimulationRecordRepository.ts

import { BaseRepository, WhereClause } from './BaseRepository';
import { readNumber, readString } from './rowReaders';
import { DbRow, SqlValue } from '../IDatabase';
import { SimulationRecord } from '../../../domain/models/SimulationRecord';
import { ALL_MODELS } from '../../../domain/models/ReportSummary';
import { RecentRecordsQuery, RecordQuery, RecordStore } from '../../../domain/ports/RecordStore';
import { ReportFactory } from '../../../domain/factories/ReportFactory';
import { PaginatedResult, PaginationParams } from '../../../utils/shared';

const INSERT_COLUMNS = [
    'id',
    'model_name',
    'timestamp',
    'planned_time',
    'downtime',
    'actual_cycle_time',
    'ideal_cycle_time',
    'total_simulations',
    'failed_simulations',
    'availability',
    'performance',
    'quality',
    'oee',
    'notes'
] as const;

/**
 * Append-only store of simulation records. There is no update path: a
 * correction is a new record.
 */
export class SimulationRecordRepository extends BaseRepository<SimulationRecord> implements RecordStore {
    protected tableName = 'simulation_records';
    protected idColumn = 'id';
    protected timestampColumn = 'timestamp';

    protected fromRow(row: DbRow): SimulationRecord {
        return {
            id: readString(row, 'id'),
            modelName: readString(row, 'model_name'),
            timestamp: readNumber(row, 'timestamp'),
            plannedTime: readNumber(row, 'planned_time'),
            downtime: readNumber(row, 'downtime'),
            actualCycleTime: readNumber(row, 'actual_cycle_time'),
            idealCycleTime: readNumber(row, 'ideal_cycle_time'),
            totalSimulations: readNumber(row, 'total_simulations'),
            failedSimulations: readNumber(row, 'failed_simulations'),
            availability: readNumber(row, 'availability'),
            performance: readNumber(row, 'performance'),
            quality: readNumber(row, 'quality'),
            oee: readNumber(row, 'oee'),
            notes: readString(row, 'notes')
        };
    }

    public async append(record: SimulationRecord): Promise<SimulationRecord> {
        return this.run('append record', async db => {
            const placeholders = INSERT_COLUMNS.map((_, i) => `$${i + 1}`).join(', ');
            const sql = `INSERT INTO ${this.tableName} (${INSERT_COLUMNS.join(', ')}) VALUES (${placeholders})`;

            const params: SqlValue[] = [
                record.id,
                record.modelName,
                record.timestamp,
                record.plannedTime,
                record.downtime,
                record.actualCycleTime,
                record.idealCycleTime,
                record.totalSimulations,
                record.failedSimulations,
                record.availability,
                record.performance,
                record.quality,
                record.oee,
                record.notes
            ];

            await db.execute(this.convertPlaceholders(db, sql), params);
            return record;
        });
    }

    public async query(filter: RecordQuery): Promise<SimulationRecord[]> {
        const where = this.whereFor(filter);
        return this.run('query records', db =>
            this.select(db, `SELECT * FROM ${this.tableName} WHERE ${where.sql} ORDER BY timestamp ASC, id ASC`, where.params)
        );
    }

    public async findRecent(query: RecentRecordsQuery): Promise<SimulationRecord[]> {
        const where = this.whereFor(query);
        const limitSql = query.limit !== undefined ? ` LIMIT $${where.params.length + 1}` : '';
        const params = query.limit !== undefined ? [...where.params, Math.max(0, Math.floor(query.limit))] : where.params;

        return this.run('find recent records', db =>
            this.select(db, `SELECT * FROM ${this.tableName} WHERE ${where.sql} ORDER BY timestamp DESC, id DESC${limitSql}`, params)
        );
    }

    public async findPage(query: RecordQuery, pagination: PaginationParams): Promise<PaginatedResult<SimulationRecord>> {
        return this.findPaginated(this.whereFor(query), pagination);
    }

    public async findLatest(modelName: string): Promise<SimulationRecord | null> {
        return this.run('find latest record', async db => {
            const sql = `SELECT * FROM ${this.tableName} WHERE model_name = $1 ORDER BY timestamp DESC, id DESC LIMIT 1`;
            const rows = await this.select(db, sql, [modelName]);
            return rows[0] ?? null;
        });
    }

    public async listModelNames(): Promise<string[]> {
        return this.run('list model names', async db => {
            const result = await db.query(`SELECT DISTINCT model_name FROM ${this.tableName} ORDER BY model_name ASC`);
            return result.rows.map(r => readString(r, 'model_name'));
        });
    }

    // Modelo + janela [now - windowDays, now]; valida o filtro antes de ir ao banco
    private whereFor(query: RecordQuery): WhereClause {
        ReportFactory.validateFilter(query);

        const now = query.now ?? Date.now();
        const clauses: string[] = [];
        const params: SqlValue[] = [];

        if (query.modelName !== ALL_MODELS) {
            params.push(query.modelName);
            clauses.push(`model_name = $${params.length}`);
        }

        const from = ReportFactory.windowStart(query, now);
        if (from !== null) {
            params.push(from);
            clauses.push(`timestamp >= $${params.length}`);
        }

        params.push(now);
        clauses.push(`timestamp <= $${params.length}`);

        return { sql: clauses.join(' AND '), params };
    }
}
