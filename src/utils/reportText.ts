// src/utils/reportText.ts

import { SimulationRecord } from '../domain/models/SimulationRecord';
import { ALL_MODELS, ReportSummary } from '../domain/models/ReportSummary';
import { formatDateTime } from './clock';

const RULE_WIDE = '='.repeat(50);
const RULE_NARROW = '='.repeat(30);
const TABLE_WIDTH = 80;

export type StatusBand = 'EXCELLENT' | 'GOOD' | 'FAIR' | 'POOR';

const BAND_TEXT: Record<StatusBand, string> = {
    EXCELLENT: 'World-class computational efficiency',
    GOOD: 'Typical computational performance',
    FAIR: 'Room for optimization',
    POOR: 'Significant optimization needed'
};

export function formatPercent(value: number): string {
    return `${(value * 100).toFixed(2)}%`;
}

export function statusBand(oee: number): StatusBand {
    if (oee >= 0.85) return 'EXCELLENT';
    if (oee >= 0.70) return 'GOOD';
    if (oee >= 0.60) return 'FAIR';
    return 'POOR';
}

export function improvementHints(record: Pick<SimulationRecord, 'availability' | 'performance' | 'quality'>): string[] {
    const hints: string[] = [];
    if (record.availability < 0.90) {
        hints.push('Availability: Optimize resource allocation and reduce system downtime');
    }
    if (record.performance < 0.95) {
        hints.push('Performance: Optimize algorithms and computational efficiency');
    }
    if (record.quality < 0.99) {
        hints.push('Quality: Improve model validation and error handling');
    }
    return hints;
}

/**
 * Plain-text report of a single run: metrics, status band and improvement hints.
 */
export function renderRecordReport(record: SimulationRecord, generatedAt: number = Date.now()): string {
    const band = statusBand(record.oee);
    const lines = [
        `OEE REPORT - ${record.modelName}`,
        `Generated: ${formatDateTime(generatedAt)}`,
        RULE_WIDE,
        '',
        `Availability: ${formatPercent(record.availability)}`,
        `Performance: ${formatPercent(record.performance)}`,
        `Quality: ${formatPercent(record.quality)}`,
        RULE_NARROW,
        `Overall OEE: ${formatPercent(record.oee)}`,
        '',
        `Status: ${band} - ${BAND_TEXT[band]}`
    ];

    if (record.oee < 0) {
        lines.push('Warning: OEE is negative (downtime exceeds planned time), check the run parameters');
    }

    const hints = improvementHints(record);
    lines.push('', 'Areas for Improvement:');
    if (hints.length === 0) {
        lines.push('- None: every factor is on target');
    } else {
        lines.push(...hints.map(h => `- ${h}`));
    }

    if (record.notes) {
        lines.push('', `Notes: ${record.notes}`);
    }

    return lines.join('\n');
}

export function describeScope(modelName: string, windowDays: number | null): string {
    const who = modelName === ALL_MODELS ? 'all models' : `model '${modelName}'`;
    const when = windowDays === null ? 'all time' : `the last ${windowDays} days`;
    return `${who} in ${when}`;
}

export function renderSummaryReport(summary: ReportSummary): string {
    const { averages, best, worst } = summary;
    if (summary.count === 0 || !averages || !best || !worst) {
        return `No data found for ${describeScope(summary.modelName, summary.windowDays)}.`;
    }

    const title = summary.modelName === ALL_MODELS ? 'All models' : summary.modelName;
    const period = summary.windowDays === null ? 'Data from all time' : `Data from the last ${summary.windowDays} days`;

    return [
        `OEE REPORT - ${title}`,
        period,
        `Number of simulation runs: ${summary.count}`,
        RULE_WIDE,
        `Average Availability: ${formatPercent(averages.availability)}`,
        `Average Performance: ${formatPercent(averages.performance)}`,
        `Average Quality: ${formatPercent(averages.quality)}`,
        RULE_NARROW,
        `Average OEE: ${formatPercent(averages.oee)}`,
        `Best OEE: ${formatPercent(best.oee)} (${formatDateTime(best.timestamp)})`,
        `Worst OEE: ${formatPercent(worst.oee)} (${formatDateTime(worst.timestamp)})`,
        `Trend: ${summary.trend ?? 'flat'}`
    ].join('\n');
}

function row(cells: Array<[string, number]>): string {
    return cells.map(([text, width]) => text.padEnd(width)).join(' ').trimEnd();
}

export function renderRecordTable(records: readonly SimulationRecord[]): string {
    const lines = [
        '='.repeat(TABLE_WIDTH),
        row([['Timestamp', 20], ['Model', 25], ['Availability', 12], ['Performance', 12], ['Quality', 12], ['OEE', 12]]),
        '-'.repeat(TABLE_WIDTH)
    ];

    for (const r of records) {
        lines.push(row([
            [formatDateTime(r.timestamp), 20],
            [r.modelName, 25],
            [formatPercent(r.availability), 12],
            [formatPercent(r.performance), 12],
            [formatPercent(r.quality), 12],
            [formatPercent(r.oee), 12]
        ]));
    }

    return lines.join('\n');
}
