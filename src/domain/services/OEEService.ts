// src/domain/services/OEEService.ts

import { OEEFactory } from "../factories/OEEFactory";
import { ReportFactory } from "../factories/ReportFactory";
import { SimulationRecord, SimulationRunInput } from "../models/SimulationRecord";
import { ALL_MODELS, ReportFilter, ReportSummary } from "../models/ReportSummary";
import { RecordStore } from "../ports/RecordStore";
import { ReportConfig } from "../../config/report-config";
import { PaginatedResult, PaginationParams } from "../../utils/shared";
import { logger } from "../../utils/logger";

export interface OEEServiceOptions {
    store: RecordStore;
    config: ReportConfig;
    oeeFactory?: OEEFactory;
    now?: () => number;
}

/**
 * Engine + aggregator over an explicit record store. No global store handle:
 * every caller (HTTP server, CLI, tests) passes its own.
 */
export class OEEService {
    private readonly store: RecordStore;
    private readonly config: ReportConfig;
    private readonly oeeFactory: OEEFactory;
    private readonly reportFactory: ReportFactory;
    private readonly now: () => number;

    constructor(options: OEEServiceOptions) {
        this.store = options.store;
        this.config = options.config;
        this.now = options.now ?? Date.now;
        this.oeeFactory = options.oeeFactory ?? new OEEFactory({ now: this.now });
        this.reportFactory = new ReportFactory({ trendDeadband: options.config.trendDeadband });
    }

    public get reportConfig(): ReportConfig {
        return this.config;
    }

    // Só calcula; nada é persistido
    public calculate(input: SimulationRunInput): SimulationRecord {
        return this.oeeFactory.compute(input);
    }

    public async record(input: SimulationRunInput): Promise<SimulationRecord> {
        const record = this.oeeFactory.compute(input);
        const stored = await this.store.append(record);
        logger().debug({ id: stored.id, model: stored.modelName, oee: stored.oee }, '[OEE] Record saved');
        return stored;
    }

    public async summarize(filter: ReportFilter): Promise<ReportSummary> {
        ReportFactory.validateFilter(filter);
        const now = this.now();
        const records = await this.store.query({ ...filter, now });
        return this.reportFactory.summarize(records, filter, now);
    }

    public latest(modelName: string): Promise<SimulationRecord | null> {
        return this.store.findLatest(modelName);
    }

    /**
     * Newest first. `limit` defaults to the configured list limit; `null` lifts it.
     */
    public history(modelName: string = ALL_MODELS, windowDays: number | null = null, limit?: number | null): Promise<SimulationRecord[]> {
        const cap = limit === undefined ? this.config.listLimit : limit ?? undefined;
        return this.store.findRecent({ modelName, windowDays, limit: cap, now: this.now() });
    }

    public browse(filter: ReportFilter, pagination: PaginationParams): Promise<PaginatedResult<SimulationRecord>> {
        return this.store.findPage({ ...filter, now: this.now() }, pagination);
    }

    public find(id: string): Promise<SimulationRecord | null> {
        return this.store.findById(id);
    }

    public modelNames(): Promise<string[]> {
        return this.store.listModelNames();
    }
}
