// src/adapters/http/controllers/RecordsController.ts

import { Request, Response } from 'express';
import { OEEService } from '../../../domain/services/OEEService';
import { OEEFactory } from '../../../domain/factories/OEEFactory';
import { InvalidInputError } from '../../../domain/errors';
import { parsePaginationParams, formatRecordPage } from '../../../utils/pagination';
import { renderRecordReport } from '../../../utils/reportText';
import { EXPORT_CONTENT_TYPES, parseExportFormat, renderRecords } from '../../export/RecordExporter';
import { parseReportFilter, queryString } from './queryParams';
import { sendError, sendNotFound } from './respond';

export class RecordsController {
    constructor(private readonly service: OEEService) {}

    // POST /api/records/calculate - calcula sem persistir
    public async calculate(req: Request, res: Response): Promise<void> {
        try {
            const record = this.service.calculate(OEEFactory.parseInput(req.body));
            res.json({ success: true, data: record });
        } catch (error) {
            sendError(res, error, 'calculate');
        }
    }

    // POST /api/records
    public async create(req: Request, res: Response): Promise<void> {
        try {
            const record = await this.service.record(OEEFactory.parseInput(req.body));
            res.status(201).json({ success: true, data: record });
        } catch (error) {
            sendError(res, error, 'create record');
        }
    }

    // GET /api/records - mais recentes primeiro, com paginação
    public async getAll(req: Request, res: Response): Promise<void> {
        try {
            const filter = parseReportFilter(req.query, null);
            const pagination = parsePaginationParams(req.query);
            const result = await this.service.browse(filter, pagination);
            res.json(formatRecordPage(result));
        } catch (error) {
            sendError(res, error, 'list records');
        }
    }

    // GET /api/records/latest?model=
    public async getLatest(req: Request, res: Response): Promise<void> {
        try {
            const model = queryString(req.query.model);
            if (!model) {
                throw new InvalidInputError('model query parameter is required', 'model');
            }

            const record = await this.service.latest(model);
            if (!record) {
                sendNotFound(res, `No records for model '${model}'`);
                return;
            }
            res.json({ success: true, data: record });
        } catch (error) {
            sendError(res, error, 'latest record');
        }
    }

    // GET /api/records/export?format=json|csv|xlsx
    public async exportAll(req: Request, res: Response): Promise<void> {
        try {
            const format = parseExportFormat(queryString(req.query.format) ?? 'json');
            const filter = parseReportFilter(req.query, null);
            const records = await this.service.history(filter.modelName, filter.windowDays, null);

            res.setHeader('Content-Type', EXPORT_CONTENT_TYPES[format]);
            res.setHeader('Content-Disposition', `attachment; filename="oee-records.${format}"`);
            res.send(renderRecords(records, format));
        } catch (error) {
            sendError(res, error, 'export records');
        }
    }

    // GET /api/records/:id
    public async getById(req: Request, res: Response): Promise<void> {
        try {
            const record = await this.service.find(req.params.id);
            if (!record) {
                sendNotFound(res, 'Record not found');
                return;
            }
            res.json({ success: true, data: record });
        } catch (error) {
            sendError(res, error, 'get record');
        }
    }

    // GET /api/records/:id/report - relatório em texto
    public async getReport(req: Request, res: Response): Promise<void> {
        try {
            const record = await this.service.find(req.params.id);
            if (!record) {
                sendNotFound(res, 'Record not found');
                return;
            }
            res.type('text/plain').send(renderRecordReport(record));
        } catch (error) {
            sendError(res, error, 'record report');
        }
    }
}
