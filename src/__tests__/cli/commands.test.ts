// src/__tests__/cli/commands.test.ts

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { runCli, CliContext, CliIO, USAGE } from '../../cli/commands';
import { SQLiteDatabase } from '../../adapters/database/SQLiteDatabase';
import { createAppContext } from '../../app/context';
import { REPORT_DEFAULTS } from '../../config/report-config';
import { NOW, memoryDatabase } from '../helpers/records';

const CALCULATE = [
    'calculate',
    '--model-name', 'CFD',
    '--planned-time', '480',
    '--downtime', '60',
    '--actual-cycle-time', '15',
    '--ideal-cycle-time', '12',
    '--total-simulations', '100',
    '--failed-simulations', '10'
];

describe('runCli', () => {
    let db: SQLiteDatabase;
    let ctx: CliContext;
    let out: string[];
    let err: string[];
    let io: CliIO;

    beforeEach(async () => {
        db = await memoryDatabase();
        ctx = { ...createAppContext({ dbProvider: async () => db, config: REPORT_DEFAULTS, now: () => NOW }), now: () => NOW };
        out = [];
        err = [];
        io = { out: line => out.push(line), err: line => err.push(line) };
    });

    afterEach(async () => {
        await db.disconnect();
    });

    const outputLines = () => out.join('\n').split('\n');

    it('prints usage without a command', async () => {
        expect(await runCli([], io, ctx)).toBe(0);
        expect(out).toEqual([USAGE]);
    });

    it('fails on an unknown command', async () => {
        expect(await runCli(['frobnicate'], io, ctx)).toBe(1);
        expect(err[0]).toBe('Unknown command: frobnicate');
    });

    describe('calculate', () => {
        it('prints the report without saving', async () => {
            expect(await runCli(CALCULATE, io, ctx)).toBe(0);

            const lines = outputLines();
            expect(lines[0]).toBe('OEE REPORT - CFD');
            expect(lines[1]).toBe('Generated: 2024-01-15 12:00');
            expect(lines).toContain('Overall OEE: 63.00%');
            expect(await ctx.service.modelNames()).toEqual([]);
        });

        it('saves with --save', async () => {
            expect(await runCli([...CALCULATE, '--save', '--notes', 'first'], io, ctx)).toBe(0);

            const saved = await ctx.service.latest('CFD');
            expect(saved?.notes).toBe('first');
            expect(out[out.length - 1]).toBe(`Record saved: ${saved?.id}`);
        });

        it('defaults the model name', async () => {
            await runCli(CALCULATE.slice(0, 1).concat(CALCULATE.slice(3)), io, ctx);
            expect(outputLines()[0]).toBe('OEE REPORT - Simulation Model');
        });

        it('reports a missing option', async () => {
            const argv = CALCULATE.filter((_, i) => i !== 5 && i !== 6);

            expect(await runCli(argv, io, ctx)).toBe(1);
            expect(err).toEqual(['Error: missing required option --downtime']);
        });

        it('reports validation errors', async () => {
            const argv = [...CALCULATE.slice(0, -1), '200'];

            expect(await runCli(argv, io, ctx)).toBe(1);
            expect(err).toEqual(['Error: failed_simulations cannot exceed total_simulations']);
        });

        it('reports non-numeric values', async () => {
            const argv = CALCULATE.map(token => (token === '480' ? 'eight' : token));

            expect(await runCli(argv, io, ctx)).toBe(1);
            expect(err).toEqual(['Error: planned_time must be a finite number']);
        });
    });

    describe('report and list', () => {
        beforeEach(async () => {
            await runCli([...CALCULATE, '--save'], io, ctx);
            out.length = 0;
        });

        it('summarizes a model', async () => {
            expect(await runCli(['report', '--model-name', 'CFD'], io, ctx)).toBe(0);

            const lines = outputLines();
            expect(lines[0]).toBe('OEE REPORT - CFD');
            expect(lines[1]).toBe('Data from the last 30 days');
            expect(lines[2]).toBe('Number of simulation runs: 1');
            expect(lines).toContain('Average OEE: 63.00%');
        });

        it('says when a model has no data', async () => {
            await runCli(['report', '--model-name', 'FEM', '--days', '7'], io, ctx);
            expect(out).toEqual(["No data found for model 'FEM' in the last 7 days."]);
        });

        it('requires a model name for report', async () => {
            expect(await runCli(['report'], io, ctx)).toBe(1);
            expect(err).toEqual(['Error: missing required option --model-name']);
        });

        it('rejects a negative window', async () => {
            expect(await runCli(['report', '--model-name', 'CFD', '--days', '-2'], io, ctx)).toBe(1);
            expect(err).toEqual(['Error: time window must be a non-negative number of days']);
        });

        it('lists recent runs as a table', async () => {
            expect(await runCli(['list', '--days', 'all'], io, ctx)).toBe(0);

            const lines = outputLines();
            expect(lines[0]).toBe('Recent simulations for all models in all time:');
            expect(lines[4]).toBe('2024-01-15 12:00     CFD                       87.50%       80.00%       90.00%       63.00%');
        });

        it('says when nothing is listed', async () => {
            await runCli(['list', '--model-name', 'FEM'], io, ctx);
            expect(out).toEqual(["No simulation data found for model 'FEM' in the last 30 days."]);
        });

        it('rejects a bad limit', async () => {
            expect(await runCli(['list', '--limit', '0'], io, ctx)).toBe(1);
            expect(err).toEqual(['Error: limit must be a positive integer']);
        });
    });

    describe('models', () => {
        it('adds, lists and removes models', async () => {
            expect(await runCli(['models', 'add', 'CFD', '--description', 'flow solver'], io, ctx)).toBe(0);
            expect(await runCli(['models'], io, ctx)).toBe(0);
            expect(await runCli(['models', 'remove', 'CFD'], io, ctx)).toBe(0);

            expect(out).toEqual([
                'Model added: CFD',
                'Registered models:',
                '  - CFD: flow solver',
                'Models with records:',
                '  (none)',
                'Model removed: CFD'
            ]);
        });

        it('fails to add a duplicate', async () => {
            await runCli(['models', 'add', 'CFD'], io, ctx);

            expect(await runCli(['models', 'add', 'CFD'], io, ctx)).toBe(1);
            expect(err).toEqual(['Error: model already exists: CFD']);
        });

        it('fails to remove an unknown model', async () => {
            expect(await runCli(['models', 'remove', 'FEM'], io, ctx)).toBe(1);
            expect(err).toEqual(['Error: model not found: FEM']);
        });
    });

    describe('export', () => {
        let dir: string;

        beforeEach(() => {
            dir = fs.mkdtempSync(path.join(os.tmpdir(), 'oee-cli-'));
        });

        afterEach(() => {
            fs.rmSync(dir, { recursive: true, force: true });
        });

        it('writes the saved records as JSON', async () => {
            await runCli([...CALCULATE, '--save'], io, ctx);
            out.length = 0;
            const file = path.join(dir, 'records.json');

            expect(await runCli(['export', '--format', 'json', '--out', file], io, ctx)).toBe(0);

            const exported: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
            expect(Array.isArray(exported) && exported.length).toBe(1);
            expect(out).toEqual([`Exported 1 records to ${path.resolve(file)}`]);
        });

        it('rejects an unknown format', async () => {
            expect(await runCli(['export', '--format', 'pdf', '--out', path.join(dir, 'x.pdf')], io, ctx)).toBe(1);
            expect(err).toEqual(['Error: unsupported export format: pdf (expected json, csv, xlsx)']);
        });
    });
});
