// src/utils/pagination.ts

import { PaginationParams, PaginatedResult } from './shared';
import { SimulationRecord } from '../domain/models/SimulationRecord';

export const PAGINATION_DEFAULTS = {
    page: 1,
    limit: 50,
    maxLimit: 100
} as const;

function toPositiveInt(value: unknown, fallback: number): number {
    const parsed = typeof value === 'string' ? parseInt(value, 10) : Number.NaN;
    return parsed > 0 ? parsed : fallback;
}

/**
 * Page and limit from `?page=&limit=`; the limit is capped at `maxLimit`.
 */
export function parsePaginationParams(query: Record<string, unknown>): PaginationParams {
    return clampPagination({
        page: toPositiveInt(query.page, PAGINATION_DEFAULTS.page),
        limit: toPositiveInt(query.limit, PAGINATION_DEFAULTS.limit)
    });
}

export function clampPagination(params: PaginationParams): PaginationParams {
    return {
        page: Math.max(1, Math.floor(params.page) || PAGINATION_DEFAULTS.page),
        limit: Math.min(Math.max(1, Math.floor(params.limit) || PAGINATION_DEFAULTS.limit), PAGINATION_DEFAULTS.maxLimit)
    };
}

// Corpo de GET /api/records
export interface RecordPageResponse {
    success: true;
    data: SimulationRecord[];
    pagination: {
        page: number;
        limit: number;
        total: number;
        totalPages: number;
    };
}

export function formatRecordPage(result: PaginatedResult<SimulationRecord>): RecordPageResponse {
    return {
        success: true,
        data: result.data,
        pagination: {
            page: result.page,
            limit: result.limit,
            total: result.total,
            totalPages: Math.ceil(result.total / result.limit)
        }
    };
}
