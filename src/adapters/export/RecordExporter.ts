// src/adapters/export/RecordExporter.ts

import * as fs from 'fs';
import * as path from 'path';
import * as XLSX from 'xlsx';
import { SimulationRecord } from '../../domain/models/SimulationRecord';
import { InvalidInputError } from '../../domain/errors';

export const EXPORT_FORMATS = ['json', 'csv', 'xlsx'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export const EXPORT_CONTENT_TYPES: Record<ExportFormat, string> = {
    json: 'application/json',
    csv: 'text/csv',
    xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet'
};

export interface ExportOptions {
    format: ExportFormat;
    outFile: string;
}

export interface ExportResult {
    format: ExportFormat;
    outFile: string;
    count: number;
}

const SHEET_NAME = 'OEE Records';

export function isExportFormat(value: string): value is ExportFormat {
    return EXPORT_FORMATS.some(f => f === value);
}

export function parseExportFormat(value: string | undefined): ExportFormat {
    const format = (value ?? '').toLowerCase();
    if (!isExportFormat(format)) {
        throw new InvalidInputError(`unsupported export format: ${value ?? ''} (expected ${EXPORT_FORMATS.join(', ')})`, 'format');
    }
    return format;
}

// Uma linha por registro, colunas na mesma ordem da tabela
export function toRows(records: readonly SimulationRecord[]): Array<Record<string, string | number>> {
    return records.map(r => ({
        id: r.id,
        model_name: r.modelName,
        timestamp: new Date(r.timestamp).toISOString(),
        planned_time: r.plannedTime,
        downtime: r.downtime,
        actual_cycle_time: r.actualCycleTime,
        ideal_cycle_time: r.idealCycleTime,
        total_simulations: r.totalSimulations,
        failed_simulations: r.failedSimulations,
        availability: r.availability,
        performance: r.performance,
        quality: r.quality,
        oee: r.oee,
        notes: r.notes
    }));
}

function makeWorkbook(records: readonly SimulationRecord[]): XLSX.WorkBook {
    const wb = XLSX.utils.book_new();
    const ws = XLSX.utils.json_to_sheet(toRows(records));
    XLSX.utils.book_append_sheet(wb, ws, SHEET_NAME);
    return wb;
}

export function renderRecords(records: readonly SimulationRecord[], format: ExportFormat): Buffer {
    switch (format) {
        case 'json':
            return Buffer.from(JSON.stringify(records, null, 2), 'utf8');
        case 'csv': {
            const ws = XLSX.utils.json_to_sheet(toRows(records));
            return Buffer.from(XLSX.utils.sheet_to_csv(ws), 'utf8');
        }
        case 'xlsx': {
            const data: unknown = XLSX.write(makeWorkbook(records), { type: 'buffer', bookType: 'xlsx' });
            if (!Buffer.isBuffer(data)) {
                throw new Error('xlsx writer did not return a buffer');
            }
            return data;
        }
    }
}

export function exportRecords(records: readonly SimulationRecord[], options: ExportOptions): ExportResult {
    const outFile = path.resolve(options.outFile);
    fs.mkdirSync(path.dirname(outFile), { recursive: true });
    fs.writeFileSync(outFile, renderRecords(records, options.format));

    return { format: options.format, outFile, count: records.length };
}
