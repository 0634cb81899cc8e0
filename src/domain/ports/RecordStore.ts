// src/domain/ports/RecordStore.ts

import { SimulationRecord } from '../models/SimulationRecord';
import { ReportFilter } from '../models/ReportSummary';
import { PaginatedResult, PaginationParams } from '../../utils/shared';

export interface RecordQuery extends ReportFilter {
    now?: number;
}

export interface RecentRecordsQuery extends RecordQuery {
    limit?: number;
}

/**
 * Durable append/query of simulation records.
 * Implementations surface driver failures as StorageError and never retry.
 */
export interface RecordStore {
    append(record: SimulationRecord): Promise<SimulationRecord>;
    /** Records inside the filter window, oldest first */
    query(filter: RecordQuery): Promise<SimulationRecord[]>;
    /** Newest first, capped by `limit` */
    findRecent(query: RecentRecordsQuery): Promise<SimulationRecord[]>;
    findPage(query: RecordQuery, pagination: PaginationParams): Promise<PaginatedResult<SimulationRecord>>;
    findById(id: string): Promise<SimulationRecord | null>;
    findLatest(modelName: string): Promise<SimulationRecord | null>;
    listModelNames(): Promise<string[]>;
}
