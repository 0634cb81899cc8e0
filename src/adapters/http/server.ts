// src/adapters/http/server.ts

import express, { Request, Response, NextFunction } from 'express';
import { createServer, Server as HttpServer } from 'http';
import * as fs from 'fs';
import * as path from 'path';
import compression from 'compression';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import yaml from 'js-yaml';
import swaggerUi from 'swagger-ui-express';
import { createRouter, RouterDeps } from './router/router';
import { logger } from '../../utils/logger';

// docs/ fica na raiz do projeto, tanto a partir de src/ quanto de dist/
const SWAGGER_PATH = path.resolve(__dirname, '../../../docs/swagger.yaml');

export interface ServerOptions {
    port?: number | string;
    corsOrigins?: string[];
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class Server {
    private app: express.Application;
    private httpServer: HttpServer;
    private port: number | string;

    constructor(private readonly deps: RouterDeps, options: ServerOptions = {}) {
        this.app = express();
        this.httpServer = createServer(this.app);
        this.port = options.port ?? (process.env.PORT || 3001);
        this.initializeMiddlewares(options.corsOrigins);
        this.initializeSwagger();
        this.initializeRoutes();
    }

    private initializeMiddlewares(corsOrigins?: string[]) {
        this.app.use(cors({
            origin: corsOrigins ?? ['http://localhost:3000', 'http://localhost:3001'],
            methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
            allowedHeaders: ['Content-Type', 'Authorization']
        }));

        // Compression - compress responses > 1KB with level 6
        this.app.use(compression({
            level: 6,
            threshold: 1024,
            filter: (req: express.Request, res: express.Response) => {
                if (req.headers['x-no-compression']) {
                    return false;
                }
                return compression.filter(req, res);
            }
        }));

        // Rate limiting - Global: 100 requests per minute
        const globalLimiter = rateLimit({
            windowMs: 60 * 1000,
            max: 100,
            standardHeaders: true,
            legacyHeaders: false,
            message: { success: false, error: 'Too many requests, please try again later.' },
            skip: (req: Request) => req.path.startsWith('/health')
        });

        // Rate limiting - Write operations: 30 requests per minute
        const writeLimiter = rateLimit({
            windowMs: 60 * 1000,
            max: 30,
            standardHeaders: true,
            legacyHeaders: false,
            message: { success: false, error: 'Too many write requests, please try again later.' }
        });

        this.app.use('/api', globalLimiter);

        // Apply write limiter to mutation endpoints
        this.app.use('/api', (req: Request, res: Response, next: NextFunction) => {
            if (['POST', 'DELETE'].includes(req.method)) {
                return writeLimiter(req, res, next);
            }
            next();
        });

        // Body parsers
        this.app.use(express.json({ limit: '1mb' }));
        this.app.use(express.urlencoded({ extended: true, limit: '1mb' }));
    }

    private initializeSwagger() {
        // Carrega o arquivo swagger.yaml manualmente
        if (!fs.existsSync(SWAGGER_PATH)) {
            logger().warn(`[SERVER] ${SWAGGER_PATH} not found - /api-docs disabled`);
            return;
        }
        const swaggerSpec: unknown = yaml.load(fs.readFileSync(SWAGGER_PATH, 'utf8'));
        if (!isJsonObject(swaggerSpec)) {
            logger().warn('[SERVER] swagger.yaml is not an object - /api-docs disabled');
            return;
        }
        this.app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec));
    }

    private initializeRoutes() {
        this.app.use(createRouter(this.deps));

        // JSON malformado no body cai aqui
        this.app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
            if (res.headersSent) {
                next(err);
                return;
            }
            if (err instanceof SyntaxError) {
                res.status(400).json({ success: false, error: 'Malformed JSON body' });
                return;
            }
            logger().error({ err }, '[HTTP] Unhandled error');
            res.status(500).json({ success: false, error: 'Internal server error' });
        });
    }

    public getApp(): express.Application {
        return this.app;
    }

    public async listen(): Promise<void> {
        // Banco conectado antes de aceitar requisições
        await this.deps.dbProvider();

        return new Promise((resolve) => {
            this.httpServer.listen(this.port, () => {
                logger().info(`[SERVER] HTTP Server running on port ${this.port}`);
                logger().info(`[SERVER] API available at http://localhost:${this.port}/api`);
                logger().info(`[SERVER] Docs available at http://localhost:${this.port}/api-docs`);
                resolve();
            });
        });
    }

    public async close(): Promise<void> {
        return new Promise((resolve, reject) => {
            this.httpServer.close((err) => {
                if (err) {
                    reject(err);
                    return;
                }
                logger().info('[SERVER] Server closed');
                resolve();
            });
        });
    }
}
