import { NextFunction, Request, RequestHandler, Response } from 'express';
import { AppError, isAppError } from '../errors/app-error';
import { ClaimsUser } from '../models/database.models';
import { TokenVerifier } from '../services/token.service';
import { logger } from '../utils/logger';

/*
Authentication gate for every protected route.

Flow:
1. read "Authorization: Bearer <token>"
2. verify the token on its own (signature + expiry), no database lookup
3. hand the claims snapshot to the handler as its first argument
4. or answer 401 with only the failure kind
*/

export type AuthenticatedHandler = (user: ClaimsUser, req: Request, res: Response) => Promise<void>;
export type Authenticate = (handler: AuthenticatedHandler) => RequestHandler;

export function extractBearerToken(header: string | undefined): string | null {
    if (!header) return null;

    const [scheme, token, ...rest] = header.trim().split(/\s+/);
    if (scheme.toLowerCase() !== 'bearer' || !token || rest.length > 0) {
        return null;
    }
    return token;
}

export function createAuthMiddleware(verifier: TokenVerifier): Authenticate {
    return (handler) => (req: Request, res: Response, next: NextFunction): void => {
        let user: ClaimsUser;
        try {
            const token = extractBearerToken(req.headers.authorization);
            if (!token) {
                throw new AppError('TokenInvalid', 'Missing bearer token');
            }
            user = verifier.verify(token);
        } catch (error) {
            if (!isAppError(error)) {
                next(error);
                return;
            }
            // claim contents are never logged
            logger.warn('Authentication failed', { kind: error.kind, path: req.path });
            res.status(401).json({ error: 'Unauthorized', kind: error.kind });
            return;
        }

        handler(user, req, res).catch(next);
    };
}
