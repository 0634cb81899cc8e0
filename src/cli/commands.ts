// src/cli/commands.ts

import { OEEService } from '../domain/services/OEEService';
import { OEEFactory } from '../domain/factories/OEEFactory';
import { SimulationModelRepository } from '../adapters/database/repositories/SimulationModelRepository';
import { exportRecords, parseExportFormat } from '../adapters/export/RecordExporter';
import { ALL_MODELS } from '../domain/models/ReportSummary';
import { InvalidInputError, OEEError, StorageError, errorMessage } from '../domain/errors';
import { describeScope, renderRecordReport, renderRecordTable, renderSummaryReport } from '../utils/reportText';
import { parseWindowDays } from '../utils/filters';
import { logger } from '../utils/logger';
import { FlagValue, ParsedArgs, booleanFlag, parseArgs, requiredFlag, stringFlag } from './args';

export interface CliIO {
    out(line: string): void;
    err(line: string): void;
}

export interface CliContext {
    service: OEEService;
    models: SimulationModelRepository;
    now?: () => number;
}

type Flags = Record<string, FlagValue>;

export const DEFAULT_MODEL_NAME = 'Simulation Model';

export const USAGE = [
    'Usage: oee-sim <command> [options]',
    '',
    'Commands:',
    '  calculate   --planned-time <min> --downtime <min> --actual-cycle-time <min>',
    '              --ideal-cycle-time <min> --total-simulations <n> --failed-simulations <n>',
    '              [--model-name <name>] [--notes <text>] [--save]',
    '  report      --model-name <name> [--days <n|all>]',
    '  list        [--model-name <name|all>] [--days <n|all>] [--limit <n>]',
    '  models      [add <name> [--description <text>] | remove <name>]',
    '  export      --format <json|csv|xlsx> --out <file> [--model-name <name|all>] [--days <n|all>]'
].join('\n');

function parseLimit(raw: string | undefined, fallback: number): number {
    if (raw === undefined) return fallback;
    const limit = Number(raw);
    if (!Number.isInteger(limit) || limit <= 0) {
        throw new InvalidInputError('limit must be a positive integer', 'limit');
    }
    return limit;
}

async function calculate(flags: Flags, io: CliIO, ctx: CliContext): Promise<void> {
    const input = OEEFactory.parseInput({
        modelName: stringFlag(flags, 'model-name') ?? DEFAULT_MODEL_NAME,
        notes: stringFlag(flags, 'notes'),
        plannedTime: requiredFlag(flags, 'planned-time'),
        downtime: requiredFlag(flags, 'downtime'),
        actualCycleTime: requiredFlag(flags, 'actual-cycle-time'),
        idealCycleTime: requiredFlag(flags, 'ideal-cycle-time'),
        totalSimulations: requiredFlag(flags, 'total-simulations'),
        failedSimulations: requiredFlag(flags, 'failed-simulations')
    });

    const now = ctx.now ?? Date.now;
    const record = booleanFlag(flags, 'save') ? await ctx.service.record(input) : ctx.service.calculate(input);
    io.out(renderRecordReport(record, now()));

    if (booleanFlag(flags, 'save')) {
        io.out('');
        io.out(`Record saved: ${record.id}`);
    }
}

async function report(flags: Flags, io: CliIO, ctx: CliContext): Promise<void> {
    const modelName = requiredFlag(flags, 'model-name');
    const windowDays = parseWindowDays(stringFlag(flags, 'days'), ctx.service.reportConfig.defaultWindowDays);

    const summary = await ctx.service.summarize({ modelName, windowDays });
    io.out(renderSummaryReport(summary));
}

async function list(flags: Flags, io: CliIO, ctx: CliContext): Promise<void> {
    const modelName = stringFlag(flags, 'model-name') ?? ALL_MODELS;
    const windowDays = parseWindowDays(stringFlag(flags, 'days'), ctx.service.reportConfig.defaultWindowDays);
    const limit = parseLimit(stringFlag(flags, 'limit'), ctx.service.reportConfig.listLimit);

    const records = await ctx.service.history(modelName, windowDays, limit);
    const scope = describeScope(modelName, windowDays);

    if (records.length === 0) {
        io.out(`No simulation data found for ${scope}.`);
        return;
    }

    io.out(`Recent simulations for ${scope}:`);
    io.out(renderRecordTable(records));
}

async function models(args: ParsedArgs, io: CliIO, ctx: CliContext): Promise<void> {
    const [action, name] = args.positionals;

    if (action === 'add') {
        if (!name) throw new InvalidInputError('usage: models add <name> [--description <text>]', 'name');
        const model = await ctx.models.create({ name, description: stringFlag(args.flags, 'description') });
        io.out(`Model added: ${model.name}`);
        return;
    }

    if (action === 'remove') {
        if (!name) throw new InvalidInputError('usage: models remove <name>', 'name');
        if (!(await ctx.models.delete(name))) {
            throw new InvalidInputError(`model not found: ${name}`, 'name');
        }
        io.out(`Model removed: ${name}`);
        return;
    }

    if (action !== undefined) {
        throw new InvalidInputError(`unknown models action: ${action}`);
    }

    const registered = await ctx.models.list();
    const recorded = await ctx.service.modelNames();

    io.out('Registered models:');
    if (registered.length === 0) io.out('  (none)');
    for (const m of registered) {
        io.out(m.description ? `  - ${m.name}: ${m.description}` : `  - ${m.name}`);
    }

    io.out('Models with records:');
    if (recorded.length === 0) io.out('  (none)');
    for (const n of recorded) {
        io.out(`  - ${n}`);
    }
}

async function exportCommand(flags: Flags, io: CliIO, ctx: CliContext): Promise<void> {
    const format = parseExportFormat(requiredFlag(flags, 'format'));
    const outFile = requiredFlag(flags, 'out');
    const modelName = stringFlag(flags, 'model-name') ?? ALL_MODELS;
    const windowDays = parseWindowDays(stringFlag(flags, 'days'), null);

    const records = await ctx.service.history(modelName, windowDays, null);
    const result = exportRecords(records, { format, outFile });
    io.out(`Exported ${result.count} records to ${result.outFile}`);
}

/**
 * Runs one command and returns the process exit code (0 ok, 1 error).
 */
export async function runCli(argv: readonly string[], io: CliIO, ctx: CliContext): Promise<number> {
    const args = parseArgs(argv);

    if (!args.command || args.command === 'help' || booleanFlag(args.flags, 'help')) {
        io.out(USAGE);
        return 0;
    }

    try {
        switch (args.command) {
            case 'calculate':
                await calculate(args.flags, io, ctx);
                break;
            case 'report':
                await report(args.flags, io, ctx);
                break;
            case 'list':
                await list(args.flags, io, ctx);
                break;
            case 'models':
                await models(args, io, ctx);
                break;
            case 'export':
                await exportCommand(args.flags, io, ctx);
                break;
            default:
                io.err(`Unknown command: ${args.command}`);
                io.err(USAGE);
                return 1;
        }
        return 0;
    } catch (error) {
        if (!(error instanceof OEEError) || error instanceof StorageError) {
            logger().error({ err: error }, `[CLI] ${args.command} failed`);
        }
        io.err(`Error: ${errorMessage(error)}`);
        return 1;
    }
}
