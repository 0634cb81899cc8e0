// src/app/context.ts

import {
    DatabaseProvider,
    IDatabase,
    SimulationModelRepository,
    SimulationRecordRepository,
    openDatabase
} from '../adapters/database';
import { OEEService } from '../domain/services/OEEService';
import { ReportConfig, getReportConfig } from '../config/report-config';

export interface AppContext {
    service: OEEService;
    models: SimulationModelRepository;
    dbProvider: DatabaseProvider;
    close(): Promise<void>;
}

export interface AppContextOptions {
    dbProvider?: DatabaseProvider;
    config?: ReportConfig;
    now?: () => number;
}

/**
 * Wires repositories and service around one database handle.
 * Without a provider the database from the environment is opened on first use;
 * `close` disconnects only a database the context opened itself.
 */
export function createAppContext(options: AppContextOptions = {}): AppContext {
    let opened: Promise<IDatabase> | null = null;

    const openOnce: DatabaseProvider = () => {
        if (!opened) {
            opened = openDatabase().catch((error: unknown) => {
                opened = null;
                throw error;
            });
        }
        return opened;
    };

    const dbProvider = options.dbProvider ?? openOnce;

    return {
        service: new OEEService({
            store: new SimulationRecordRepository(dbProvider),
            config: options.config ?? getReportConfig(),
            now: options.now
        }),
        models: new SimulationModelRepository(dbProvider),
        dbProvider,
        close: async () => {
            if (!opened) return;
            const db = await opened;
            opened = null;
            await db.disconnect();
        }
    };
}
