// src/adapters/http/controllers/ReportsController.ts

import { Request, Response } from 'express';
import { OEEService } from '../../../domain/services/OEEService';
import { renderSummaryReport } from '../../../utils/reportText';
import { parseReportFilter, queryString } from './queryParams';
import { sendError } from './respond';

export class ReportsController {
    constructor(private readonly service: OEEService) {}

    // GET /api/reports/summary?model=all&days=30[&format=text]
    public async summary(req: Request, res: Response): Promise<void> {
        try {
            const filter = parseReportFilter(req.query, this.service.reportConfig.defaultWindowDays);
            const summary = await this.service.summarize(filter);

            if (queryString(req.query.format) === 'text') {
                res.type('text/plain').send(renderSummaryReport(summary));
                return;
            }
            res.json({ success: true, data: summary });
        } catch (error) {
            sendError(res, error, 'summary report');
        }
    }
}
