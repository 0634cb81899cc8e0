// src/domain/models/SimulationRecord.ts

// Parâmetros informados pelo usuário para uma rodada de simulação (tempos em minutos)
export interface SimulationRunInput {
    modelName: string;
    plannedTime: number;
    downtime: number;
    actualCycleTime: number;
    idealCycleTime: number;
    totalSimulations: number;
    failedSimulations: number;
    notes?: string;
}

export type NumericRunField = Exclude<keyof SimulationRunInput, 'modelName' | 'notes'>;

export interface OEEMetrics {
    availability: number;
    performance: number;
    quality: number;
    oee: number;
}

/**
 * One measured run. Created once by the engine, never mutated afterwards:
 * corrections are new records.
 */
export interface SimulationRecord extends Readonly<Required<SimulationRunInput>>, Readonly<OEEMetrics> {
    readonly id: string;
    readonly timestamp: number;   // epoch ms
}

export const RUN_FIELD_LABELS = {
    plannedTime: 'planned_time',
    downtime: 'downtime',
    actualCycleTime: 'actual_cycle_time',
    idealCycleTime: 'ideal_cycle_time',
    totalSimulations: 'total_simulations',
    failedSimulations: 'failed_simulations'
} as const satisfies Record<NumericRunField, string>;

export const NUMERIC_RUN_FIELDS: readonly NumericRunField[] = [
    'plannedTime',
    'downtime',
    'actualCycleTime',
    'idealCycleTime',
    'totalSimulations',
    'failedSimulations'
];
