// src/adapters/http/router/router.ts

import express from 'express';

import {
    ControllerRoot,
    HealthController,
    RecordsController,
    ReportsController,
    ModelsController
} from '../controllers';
import { authMiddleware } from '../middleware';
import { OEEService } from '../../../domain/services/OEEService';
import { SimulationModelRepository } from '../../database/repositories/SimulationModelRepository';
import { DatabaseProvider } from '../../database/IDatabase';

export interface RouterDeps {
    service: OEEService;
    models: SimulationModelRepository;
    dbProvider: DatabaseProvider;
}

class AppRouter {
    router: express.Router;
    private readonly health: HealthController;
    private readonly records: RecordsController;
    private readonly reports: ReportsController;
    private readonly models: ModelsController;

    constructor(deps: RouterDeps) {
        this.router = express.Router();
        this.health = new HealthController(deps.dbProvider);
        this.records = new RecordsController(deps.service);
        this.reports = new ReportsController(deps.service);
        this.models = new ModelsController(deps.models, deps.service);
        this.initializeRoutes();
    }

    initializeRoutes() {
        const { health, records, reports, models } = this;

        // Root
        this.router.get('/', ControllerRoot.handle);

        // Health API - No auth required
        this.router.get('/api/health', (req, res) => void health.handle(req, res));

        // Records API - sem rota de update: correções são novos registros
        // Note: Static routes must be before :id routes to avoid route conflict
        this.router.post('/api/records/calculate', (req, res) => void records.calculate(req, res));
        this.router.get('/api/records/latest', (req, res) => void records.getLatest(req, res));
        this.router.get('/api/records/export', (req, res) => void records.exportAll(req, res));
        this.router.get('/api/records', (req, res) => void records.getAll(req, res));
        this.router.get('/api/records/:id/report', (req, res) => void records.getReport(req, res));
        this.router.get('/api/records/:id', (req, res) => void records.getById(req, res));
        // Write routes require auth
        this.router.post('/api/records', authMiddleware, (req, res) => void records.create(req, res));

        // Reports API
        this.router.get('/api/reports/summary', (req, res) => void reports.summary(req, res));

        // Models API
        this.router.get('/api/models/recorded', (req, res) => void models.getRecorded(req, res));
        this.router.get('/api/models', (req, res) => void models.getAll(req, res));
        this.router.post('/api/models', authMiddleware, (req, res) => void models.create(req, res));
        this.router.delete('/api/models/:name', authMiddleware, (req, res) => void models.delete(req, res));
    }
}

export function createRouter(deps: RouterDeps): express.Router {
    return new AppRouter(deps).router;
}
