// src/adapters/http/controllers/ModelsController.ts

import { Request, Response } from 'express';
import { SimulationModelRepository } from '../../database/repositories/SimulationModelRepository';
import { OEEService } from '../../../domain/services/OEEService';
import { InvalidInputError } from '../../../domain/errors';
import { sendError, sendNotFound } from './respond';

export class ModelsController {
    constructor(
        private readonly models: SimulationModelRepository,
        private readonly service: OEEService
    ) {}

    // GET /api/models
    public async getAll(req: Request, res: Response): Promise<void> {
        try {
            const data = await this.models.list();
            res.json({ success: true, data, count: data.length });
        } catch (error) {
            sendError(res, error, 'list models');
        }
    }

    // GET /api/models/recorded - nomes que já possuem registros
    public async getRecorded(req: Request, res: Response): Promise<void> {
        try {
            const data = await this.service.modelNames();
            res.json({ success: true, data, count: data.length });
        } catch (error) {
            sendError(res, error, 'recorded models');
        }
    }

    // POST /api/models
    public async create(req: Request, res: Response): Promise<void> {
        try {
            const body: unknown = req.body;
            if (typeof body !== 'object' || body === null) {
                throw new InvalidInputError('Request body must be an object');
            }
            const { name, description }: Record<string, unknown> = { ...body };
            if (typeof name !== 'string') {
                throw new InvalidInputError('model name must not be empty', 'name');
            }
            if (description !== undefined && typeof description !== 'string') {
                throw new InvalidInputError('description must be a string', 'description');
            }

            const model = await this.models.create({ name, description });
            res.status(201).json({ success: true, data: model });
        } catch (error) {
            sendError(res, error, 'create model');
        }
    }

    // DELETE /api/models/:name - os registros do modelo permanecem
    public async delete(req: Request, res: Response): Promise<void> {
        try {
            const deleted = await this.models.delete(req.params.name);
            if (!deleted) {
                sendNotFound(res, 'Model not found');
                return;
            }
            res.json({ success: true, message: 'Model deleted' });
        } catch (error) {
            sendError(res, error, 'delete model');
        }
    }
}
