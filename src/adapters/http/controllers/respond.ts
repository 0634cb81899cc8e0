// src/adapters/http/controllers/respond.ts

import { Response } from 'express';
import { OEEError, errorMessage } from '../../../domain/errors';
import { logger } from '../../../utils/logger';

export function statusFor(error: unknown): number {
    if (!(error instanceof OEEError)) return 500;
    switch (error.code) {
        case 'INVALID_INPUT':
        case 'INVALID_FILTER':
            return 400;
        case 'STORAGE_ERROR':
            return 500;
    }
}

/**
 * Single translation point from domain errors to the `{ success: false }` envelope.
 */
export function sendError(res: Response, error: unknown, context: string): void {
    const status = statusFor(error);
    if (status >= 500) {
        logger().error({ err: error }, `[HTTP] ${context} failed`);
    }

    const body: { success: false; error: string; code?: string } = {
        success: false,
        error: errorMessage(error)
    };
    if (error instanceof OEEError) body.code = error.code;

    res.status(status).json(body);
}

export function sendNotFound(res: Response, message: string): void {
    res.status(404).json({ success: false, error: message });
}
