import { Response } from 'express';
import { isAppError } from '../errors/app-error';
import { logger } from './logger';

// known failures get their own status; anything else is logged and becomes a 500
export function sendError(res: Response, error: unknown, fallbackMessage: string): void {
    if (isAppError(error)) {
        res.status(error.status).json({ error: error.message, kind: error.kind });
        return;
    }

    logger.error(fallbackMessage, { error });
    res.status(500).json({ error: fallbackMessage });
}
