// src/adapters/http/controllers/queryParams.ts

import { ALL_MODELS, ReportFilter } from '../../../domain/models/ReportSummary';
import { parseWindowDays } from '../../../utils/filters';

// Express entrega string | string[] | ParsedQs; só a primeira string interessa
export function queryString(value: unknown): string | undefined {
    if (typeof value === 'string') return value;
    if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
    return undefined;
}

// `days` ausente usa o padrão, `days=all` significa todo o histórico
export function parseReportFilter(query: Record<string, unknown>, defaultWindowDays: number | null): ReportFilter {
    return {
        modelName: queryString(query.model) ?? ALL_MODELS,
        windowDays: parseWindowDays(queryString(query.days), defaultWindowDays)
    };
}
