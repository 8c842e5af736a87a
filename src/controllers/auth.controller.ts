import { Request, Response } from 'express';
import { AuthService } from '../services/auth.service';
import { sendError } from '../utils/http-errors';
import { readBody } from '../utils/validators';

// public endpoints: no access token required

export class AuthController {
    constructor(private readonly authService: AuthService) {}

    // POST /api/auth/register
    async register(req: Request, res: Response): Promise<void> {
        try {
            const { username, password, study_lang, display_lang } = readBody(req.body);

            if (typeof username !== 'string' || typeof password !== 'string') {
                res.status(400).json({ error: 'Username and password are required' });
                return;
            }
            if (typeof study_lang !== 'string' || typeof display_lang !== 'string') {
                res.status(400).json({ error: 'study_lang and display_lang are required' });
                return;
            }

            const user = await this.authService.register({ username, password, study_lang, display_lang });
            res.status(201).json({ user });
        } catch (error) {
            sendError(res, error, 'Failed to register user');
        }
    }

    // POST /api/auth/login
    async login(req: Request, res: Response): Promise<void> {
        try {
            const { username, password } = readBody(req.body);

            if (typeof username !== 'string' || typeof password !== 'string') {
                res.status(400).json({ error: 'Username and password are required' });
                return;
            }

            const result = await this.authService.login(username, password);
            res.json(result);
        } catch (error) {
            sendError(res, error, 'Failed to log in');
        }
    }

    // POST /api/auth/refresh
    async refresh(req: Request, res: Response): Promise<void> {
        try {
            const { token, refresh_token } = readBody(req.body);

            if (typeof token !== 'string' || typeof refresh_token !== 'string') {
                res.status(400).json({ error: 'token and refresh_token are required' });
                return;
            }

            const result = await this.authService.refresh(token, refresh_token);
            res.json(result);
        } catch (error) {
            sendError(res, error, 'Failed to refresh token');
        }
    }
}
