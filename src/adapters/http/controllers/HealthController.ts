// src/adapters/http/controllers/HealthController.ts

import { Request, Response } from 'express';
import { DatabaseProvider } from '../../database/IDatabase';
import { errorMessage } from '../../../domain/errors';
import { logger } from '../../../utils/logger';

export interface HealthStatus {
    status: 'healthy' | 'unhealthy';
    serverTimestamp: number;
    serverTimeString: string;
    uptime: number;
    database: 'connected' | 'disconnected';
    version: string;
}

export const APP_VERSION = process.env.npm_package_version || '1.0.0';

export class HealthController {
    private readonly startTime: number;

    constructor(private readonly dbProvider: DatabaseProvider) {
        this.startTime = Date.now();
    }

    // GET /api/health
    public async handle(req: Request, res: Response): Promise<void> {
        const now = Date.now();

        // Verificar conexão do banco
        let database: HealthStatus['database'] = 'disconnected';
        try {
            const db = await this.dbProvider();
            database = db.isConnected() ? 'connected' : 'disconnected';
        } catch (error) {
            logger().warn({ err: errorMessage(error) }, '[HTTP] Health check could not reach the database');
        }

        const health: HealthStatus = {
            status: database === 'connected' ? 'healthy' : 'unhealthy',
            serverTimestamp: now,
            serverTimeString: new Date(now).toISOString(),
            uptime: now - this.startTime,
            database,
            version: APP_VERSION
        };

        res.status(health.status === 'healthy' ? 200 : 503).json({ success: health.status === 'healthy', data: health });
    }
}
