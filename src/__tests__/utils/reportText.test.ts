// src/__tests__/utils/reportText.test.ts

import { describe, it, expect } from 'vitest';
import {
    formatPercent,
    improvementHints,
    renderRecordReport,
    renderRecordTable,
    renderSummaryReport,
    statusBand
} from '../../utils/reportText';
import { ReportSummary } from '../../domain/models/ReportSummary';
import { DAY_MS, NOW, makeRecord } from '../helpers/records';

describe('reportText', () => {
    describe('statusBand', () => {
        it.each([
            [1.2, 'EXCELLENT'],
            [0.85, 'EXCELLENT'],
            [0.8499, 'GOOD'],
            [0.7, 'GOOD'],
            [0.6, 'FAIR'],
            [0.5999, 'POOR'],
            [-0.1, 'POOR']
        ])('classifies %s as %s', (oee, band) => {
            expect(statusBand(oee)).toBe(band);
        });
    });

    it('formats ratios as percentages with two decimals', () => {
        expect(formatPercent(0.875)).toBe('87.50%');
        expect(formatPercent(1 / 3)).toBe('33.33%');
        expect(formatPercent(-0.25)).toBe('-25.00%');
    });

    it('suggests improvements below each target', () => {
        expect(improvementHints({ availability: 0.95, performance: 0.96, quality: 0.985 }))
            .toEqual(['Quality: Improve model validation and error handling']);
        expect(improvementHints({ availability: 0.9, performance: 0.95, quality: 0.99 })).toEqual([]);
    });

    describe('renderRecordReport', () => {
        it('renders the full report of a run', () => {
            expect(renderRecordReport(makeRecord(), NOW).split('\n')).toEqual([
                'OEE REPORT - CFD',
                'Generated: 2024-01-15 12:00',
                '='.repeat(50),
                '',
                'Availability: 87.50%',
                'Performance: 80.00%',
                'Quality: 90.00%',
                '='.repeat(30),
                'Overall OEE: 63.00%',
                '',
                'Status: FAIR - Room for optimization',
                '',
                'Areas for Improvement:',
                '- Availability: Optimize resource allocation and reduce system downtime',
                '- Performance: Optimize algorithms and computational efficiency',
                '- Quality: Improve model validation and error handling'
            ]);
        });

        it('says so when every factor is on target', () => {
            const report = renderRecordReport(makeRecord({ availability: 1, performance: 1, quality: 1, oee: 1 }), NOW);
            const lines = report.split('\n');

            expect(lines).toContain('Status: EXCELLENT - World-class computational efficiency');
            expect(lines[lines.length - 1]).toBe('- None: every factor is on target');
        });

        it('warns about a negative OEE', () => {
            const lines = renderRecordReport(makeRecord({ availability: -0.25, oee: -0.18 }), NOW).split('\n');

            expect(lines[11]).toBe('Warning: OEE is negative (downtime exceeds planned time), check the run parameters');
        });

        it('appends notes', () => {
            const lines = renderRecordReport(makeRecord({ notes: 'mesh v2' }), NOW).split('\n');
            expect(lines[lines.length - 1]).toBe('Notes: mesh v2');
        });
    });

    describe('renderSummaryReport', () => {
        const summary: ReportSummary = {
            modelName: 'CFD',
            windowDays: 30,
            from: NOW - 30 * DAY_MS,
            to: NOW,
            count: 3,
            averages: { availability: 0.9, performance: 0.8, quality: 0.95, oee: 0.684 },
            best: { recordId: 'a', timestamp: NOW - DAY_MS, oee: 0.72 },
            worst: { recordId: 'b', timestamp: NOW - 2 * DAY_MS, oee: 0.65 },
            trend: 'improving'
        };

        it('renders averages, extremes and trend', () => {
            expect(renderSummaryReport(summary).split('\n')).toEqual([
                'OEE REPORT - CFD',
                'Data from the last 30 days',
                'Number of simulation runs: 3',
                '='.repeat(50),
                'Average Availability: 90.00%',
                'Average Performance: 80.00%',
                'Average Quality: 95.00%',
                '='.repeat(30),
                'Average OEE: 68.40%',
                'Best OEE: 72.00% (2024-01-14 12:00)',
                'Worst OEE: 65.00% (2024-01-13 12:00)',
                'Trend: improving'
            ]);
        });

        it('names all models and all time', () => {
            const lines = renderSummaryReport({ ...summary, modelName: 'all', windowDays: null, from: null }).split('\n');

            expect(lines[0]).toBe('OEE REPORT - All models');
            expect(lines[1]).toBe('Data from all time');
        });

        it('reports an empty selection in one line', () => {
            const empty: ReportSummary = { ...summary, count: 0, averages: null, best: null, worst: null, trend: null };

            expect(renderSummaryReport(empty)).toBe("No data found for model 'CFD' in the last 30 days.");
            expect(renderSummaryReport({ ...empty, modelName: 'all', windowDays: null }))
                .toBe('No data found for all models in all time.');
        });
    });

    it('renders a fixed-width record table', () => {
        expect(renderRecordTable([makeRecord()]).split('\n')).toEqual([
            '='.repeat(80),
            'Timestamp            Model                     Availability Performance  Quality      OEE',
            '-'.repeat(80),
            '2024-01-15 12:00     CFD                       87.50%       80.00%       90.00%       63.00%'
        ]);
    });
});
