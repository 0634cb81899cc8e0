// src/domain/factories/ReportFactory.ts

import { InvalidFilterError } from '../errors';
import { OEEMetrics, SimulationRecord } from '../models/SimulationRecord';
import { ALL_MODELS, OEEExtremum, ReportFilter, ReportSummary, TrendDirection } from '../models/ReportSummary';
import { convertTime } from '../../utils/clock';

export interface ReportFactoryOptions {
    trendDeadband: number;
}

export class ReportFactory {
    private readonly trendDeadband: number;

    constructor(options: ReportFactoryOptions) {
        this.trendDeadband = options.trendDeadband;
    }

    /**
     * Summary over the records matching the filter within [now - window, now].
     * An empty selection is a valid result (count 0, no averages), not an error.
     */
    public summarize(records: readonly SimulationRecord[], filter: ReportFilter, now: number = Date.now()): ReportSummary {
        ReportFactory.validateFilter(filter);

        const from = ReportFactory.windowStart(filter, now);
        const selected = records
            .filter(r => ReportFactory.matches(r, filter, from, now))
            .sort((a, b) => a.timestamp - b.timestamp);

        const base = {
            modelName: filter.modelName,
            windowDays: filter.windowDays,
            from,
            to: now,
            count: selected.length
        };

        if (selected.length === 0) {
            return { ...base, averages: null, best: null, worst: null, trend: null };
        }

        return {
            ...base,
            averages: ReportFactory.averages(selected),
            best: ReportFactory.extremum(selected, (candidate, current) => candidate > current),
            worst: ReportFactory.extremum(selected, (candidate, current) => candidate < current),
            trend: this.trend(selected)
        };
    }

    public static validateFilter(filter: ReportFilter): void {
        if (filter.modelName === '') {
            throw new InvalidFilterError('model_name filter must not be empty');
        }
        if (filter.windowDays !== null && !(Number.isFinite(filter.windowDays) && filter.windowDays >= 0)) {
            throw new InvalidFilterError('time window must be a non-negative number of days');
        }
    }

    // Início da janela em epoch ms (null = sem limite inferior)
    public static windowStart(filter: ReportFilter, now: number): number | null {
        if (filter.windowDays === null) return null;
        return now - convertTime(filter.windowDays, 'd', 'ms');
    }

    private static matches(record: SimulationRecord, filter: ReportFilter, from: number | null, to: number): boolean {
        if (filter.modelName !== ALL_MODELS && record.modelName !== filter.modelName) return false;
        if (from !== null && record.timestamp < from) return false;
        return record.timestamp <= to;
    }

    private static averages(records: readonly SimulationRecord[]): OEEMetrics {
        const totals = { availability: 0, performance: 0, quality: 0, oee: 0 };
        for (const r of records) {
            totals.availability += r.availability;
            totals.performance += r.performance;
            totals.quality += r.quality;
            totals.oee += r.oee;
        }

        const n = records.length;
        return {
            availability: totals.availability / n,
            performance: totals.performance / n,
            quality: totals.quality / n,
            oee: totals.oee / n
        };
    }

    // O primeiro registro (mais antigo) vence em caso de empate
    private static extremum(
        records: readonly SimulationRecord[],
        replaces: (candidate: number, current: number) => boolean
    ): OEEExtremum {
        let pick = records[0];
        for (const r of records) {
            if (replaces(r.oee, pick.oee)) pick = r;
        }
        return { recordId: pick.id, timestamp: pick.timestamp, oee: pick.oee };
    }

    /**
     * Compares the mean OEE of the first half against the second half of the
     * time-ordered selection. The middle record of an odd count belongs to neither.
     */
    private trend(records: readonly SimulationRecord[]): TrendDirection {
        const half = Math.floor(records.length / 2);
        if (half === 0) return 'flat';

        const meanOEE = (slice: readonly SimulationRecord[]) =>
            slice.reduce((sum, r) => sum + r.oee, 0) / slice.length;

        const diff = meanOEE(records.slice(records.length - half)) - meanOEE(records.slice(0, half));
        if (diff > this.trendDeadband) return 'improving';
        if (diff < -this.trendDeadband) return 'declining';
        return 'flat';
    }
}
