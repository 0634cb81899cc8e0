// src/domain/models/ReportSummary.ts

import { OEEMetrics } from './SimulationRecord';

// Sentinel do filtro de modelo: considera todos os modelos
export const ALL_MODELS = 'all';

export interface ReportFilter {
    modelName: string;          // nome do modelo ou ALL_MODELS
    windowDays: number | null;  // null = todo o histórico
}

export type TrendDirection = 'improving' | 'declining' | 'flat';

export interface OEEExtremum {
    recordId: string;
    timestamp: number;
    oee: number;
}

export interface ReportSummary {
    modelName: string;
    windowDays: number | null;
    from: number | null;
    to: number;
    count: number;
    averages: OEEMetrics | null;
    best: OEEExtremum | null;
    worst: OEEExtremum | null;
    trend: TrendDirection | null;
}
