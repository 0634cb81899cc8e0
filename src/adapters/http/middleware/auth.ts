// src/adapters/http/middleware/auth.ts

import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { logger } from '../../../utils/logger';

/**
 * HTTP Authentication Middleware
 * Validates the Bearer token (HS256, signed with AUTH_SECRET) on write routes.
 * Without AUTH_SECRET the tool runs single-user and the check is skipped.
 */
export function authMiddleware(req: Request, res: Response, next: NextFunction): void {
    const secret = process.env.AUTH_SECRET;
    if (!secret) {
        logger().debug('[AUTH] AUTH_SECRET not configured - skipping authentication');
        next();
        return;
    }

    const authHeader = req.headers.authorization;

    if (!authHeader?.startsWith('Bearer ')) {
        res.status(401).json({ success: false, error: 'Token não fornecido' });
        return;
    }

    const token = authHeader.substring(7); // Remove "Bearer "

    try {
        const decoded = jwt.verify(token, secret, { algorithms: ['HS256'] });
        if (typeof decoded === 'string' || typeof decoded.sub !== 'string') {
            res.status(401).json({ success: false, error: 'Token inválido' });
            return;
        }

        next();
    } catch (error) {
        if (error instanceof jwt.TokenExpiredError) {
            res.status(401).json({ success: false, error: 'Token expirado' });
            return;
        }
        if (error instanceof jwt.JsonWebTokenError) {
            res.status(401).json({ success: false, error: 'Token inválido' });
            return;
        }
        logger().error({ err: error }, '[AUTH] Token validation failed');
        res.status(500).json({ success: false, error: 'Erro ao validar token' });
    }
}
