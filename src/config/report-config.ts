// src/config/report-config.ts

import { optionalEnv } from './env-config';

export interface ReportConfig {
    trendDeadband: number;      // diferença mínima de OEE médio para apontar tendência
    defaultWindowDays: number;  // janela padrão dos relatórios
    listLimit: number;          // máximo de registros em listagens
}

export const REPORT_DEFAULTS: ReportConfig = {
    trendDeadband: 0.01,
    defaultWindowDays: 30,
    listLimit: 100
};

function nonNegative(name: string, fallback: number): number {
    const value = Number(optionalEnv(name, String(fallback)));
    return Number.isFinite(value) && value >= 0 ? value : fallback;
}

/**
 * Report tunables read from the environment (OEE_TREND_DEADBAND, OEE_REPORT_WINDOW_DAYS, OEE_LIST_LIMIT)
 */
export function getReportConfig(): ReportConfig {
    return {
        trendDeadband: nonNegative('OEE_TREND_DEADBAND', REPORT_DEFAULTS.trendDeadband),
        defaultWindowDays: nonNegative('OEE_REPORT_WINDOW_DAYS', REPORT_DEFAULTS.defaultWindowDays),
        listLimit: Math.max(1, Math.floor(nonNegative('OEE_LIST_LIMIT', REPORT_DEFAULTS.listLimit)))
    };
}
