// src/__tests__/export/RecordExporter.test.ts

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as XLSX from 'xlsx';
import { exportRecords, isExportFormat, parseExportFormat, renderRecords, toRows } from '../../adapters/export/RecordExporter';
import { InvalidInputError } from '../../domain/errors';
import { NOW, makeRecord } from '../helpers/records';

describe('RecordExporter', () => {
    const records = [
        makeRecord({ id: 'r1' }),
        makeRecord({ id: 'r2', modelName: 'FEM', notes: 'coarse mesh' })
    ];
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'oee-export-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('recognises the supported formats', () => {
        expect(isExportFormat('csv')).toBe(true);
        expect(isExportFormat('pdf')).toBe(false);
        expect(parseExportFormat('XLSX')).toBe('xlsx');
        expect(() => parseExportFormat(undefined)).toThrow(InvalidInputError);
    });

    it('flattens records into snake_case rows', () => {
        expect(toRows([records[0]])[0]).toEqual({
            id: 'r1',
            model_name: 'CFD',
            timestamp: new Date(NOW).toISOString(),
            planned_time: 480,
            downtime: 60,
            actual_cycle_time: 15,
            ideal_cycle_time: 12,
            total_simulations: 100,
            failed_simulations: 10,
            availability: 0.875,
            performance: 0.8,
            quality: 0.9,
            oee: 0.63,
            notes: ''
        });
    });

    it('writes an indented JSON array', () => {
        const file = path.join(dir, 'out.json');
        const result = exportRecords(records, { format: 'json', outFile: file });

        expect(result).toEqual({ format: 'json', outFile: path.resolve(file), count: 2 });
        const text = fs.readFileSync(file, 'utf8');
        expect(text.split('\n')[1]).toBe('  {');
        expect(JSON.parse(text)).toEqual(records);
    });

    it('renders one CSV line per record', () => {
        const lines = renderRecords(records, 'csv').toString('utf8').split('\n');

        expect(lines).toHaveLength(3);
        expect(lines[1].startsWith('r1,CFD,2024-01-15T12:00:00.000Z,480,60,15,12,100,10,')).toBe(true);
        expect(lines[2].endsWith(',coarse mesh')).toBe(true);
    });

    it('writes a workbook that reads back', () => {
        const file = path.join(dir, 'nested', 'out.xlsx');
        exportRecords(records, { format: 'xlsx', outFile: file });

        const wb = XLSX.read(fs.readFileSync(file), { type: 'buffer' });
        expect(wb.SheetNames).toEqual(['OEE Records']);

        const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(wb.Sheets['OEE Records']);
        expect(rows.map(r => r.id)).toEqual(['r1', 'r2']);
        expect(rows[1].model_name).toBe('FEM');
        expect(rows[0].planned_time).toBe(480);
    });
});
