// src/domain/factories/OEEFactory.ts

import { randomUUID } from 'crypto';
import { InvalidInputError } from '../errors';
import {
    NUMERIC_RUN_FIELDS,
    OEEMetrics,
    RUN_FIELD_LABELS,
    SimulationRecord,
    SimulationRunInput
} from '../models/SimulationRecord';

export interface OEEFactoryOptions {
    now?: () => number;
    generateId?: () => string;
}

export class OEEFactory {
    private readonly now: () => number;
    private readonly generateId: () => string;

    constructor(options: OEEFactoryOptions = {}) {
        this.now = options.now ?? Date.now;
        this.generateId = options.generateId ?? randomUUID;
    }

    /**
     * Validates the run parameters and builds an immutable record with its metrics.
     * Nothing is persisted here.
     */
    public compute(input: SimulationRunInput): SimulationRecord {
        OEEFactory.validate(input);
        const metrics = OEEFactory.calculateMetrics(input);

        return Object.freeze({
            id: this.generateId(),
            modelName: input.modelName.trim(),
            timestamp: this.now(),
            plannedTime: input.plannedTime,
            downtime: input.downtime,
            actualCycleTime: input.actualCycleTime,
            idealCycleTime: input.idealCycleTime,
            totalSimulations: input.totalSimulations,
            failedSimulations: input.failedSimulations,
            notes: input.notes ?? '',
            ...metrics
        });
    }

    // Fórmulas sem clamp: downtime > plannedTime gera availability (e OEE) negativa
    public static calculateMetrics(input: SimulationRunInput): OEEMetrics {
        const availability = (input.plannedTime - input.downtime) / input.plannedTime;
        const performance = input.idealCycleTime / input.actualCycleTime;
        const quality = (input.totalSimulations - input.failedSimulations) / input.totalSimulations;
        const oee = availability * performance * quality;

        return {
            availability,
            performance,
            quality,
            // -0 (availability negativa × performance 0) vira 0, como o banco devolve
            oee: oee === 0 ? 0 : oee
        };
    }

    public static validate(input: SimulationRunInput): void {
        if (input.modelName.trim().length === 0) {
            throw new InvalidInputError('model_name must not be empty', 'modelName');
        }

        for (const field of NUMERIC_RUN_FIELDS) {
            if (!Number.isFinite(input[field])) {
                throw new InvalidInputError(`${RUN_FIELD_LABELS[field]} must be a finite number`, field);
            }
        }

        if (input.plannedTime <= 0) {
            throw new InvalidInputError('planned_time must be positive', 'plannedTime');
        }
        if (input.downtime < 0) {
            throw new InvalidInputError('downtime cannot be negative', 'downtime');
        }
        if (input.actualCycleTime <= 0) {
            throw new InvalidInputError('actual_cycle_time must be positive', 'actualCycleTime');
        }
        if (input.idealCycleTime < 0) {
            throw new InvalidInputError('ideal_cycle_time cannot be negative', 'idealCycleTime');
        }
        for (const field of ['totalSimulations', 'failedSimulations'] as const) {
            if (!Number.isInteger(input[field])) {
                throw new InvalidInputError(`${RUN_FIELD_LABELS[field]} must be an integer`, field);
            }
        }
        if (input.totalSimulations <= 0) {
            throw new InvalidInputError('total_simulations must be positive', 'totalSimulations');
        }
        if (input.failedSimulations < 0) {
            throw new InvalidInputError('failed_simulations cannot be negative', 'failedSimulations');
        }
        if (input.failedSimulations > input.totalSimulations) {
            throw new InvalidInputError('failed_simulations cannot exceed total_simulations', 'failedSimulations');
        }
    }

    /**
     * Builds a run input from an untyped payload (JSON body, CLI flags).
     * Numeric strings are accepted; anything else ends up failing `validate`.
     */
    public static parseInput(raw: unknown): SimulationRunInput {
        if (typeof raw !== 'object' || raw === null) {
            throw new InvalidInputError('Request body must be an object');
        }
        const source: Record<string, unknown> = { ...raw };

        const modelName = source.modelName;
        if (typeof modelName !== 'string') {
            throw new InvalidInputError('model_name must not be empty', 'modelName');
        }

        const notes = source.notes;
        if (notes !== undefined && typeof notes !== 'string') {
            throw new InvalidInputError('notes must be a string', 'notes');
        }

        return {
            modelName,
            notes,
            plannedTime: toNumber(source.plannedTime),
            downtime: toNumber(source.downtime),
            actualCycleTime: toNumber(source.actualCycleTime),
            idealCycleTime: toNumber(source.idealCycleTime),
            totalSimulations: toNumber(source.totalSimulations),
            failedSimulations: toNumber(source.failedSimulations)
        };
    }
}

function toNumber(value: unknown): number {
    if (typeof value === 'number') return value;
    if (typeof value === 'string' && value.trim() !== '') return Number(value);
    return Number.NaN;
}
