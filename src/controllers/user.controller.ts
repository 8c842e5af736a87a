import { Request, Response } from 'express';
import { ClaimsUser } from '../models/database.models';
import { UpdateUserInput, UserService } from '../services/user.service';
import { sendError } from '../utils/http-errors';
import { parseBoundedInt, readBody } from '../utils/validators';

const UPDATABLE_FIELDS = ['username', 'password', 'study_lang', 'display_lang'] as const;

export class UserController {
    constructor(private readonly userService: UserService) {}

    // GET /api/users?offset=
    async getUsers(_user: ClaimsUser, req: Request, res: Response): Promise<void> {
        try {
            const offset = parseBoundedInt(req.query.offset, 0, { min: 0, max: Number.MAX_SAFE_INTEGER });
            const users = await this.userService.getUsers(offset);
            res.json({ users, count: users.length });
        } catch (error) {
            sendError(res, error, 'Failed to retrieve users');
        }
    }

    // PUT /api/users/me
    async updateUser(user: ClaimsUser, req: Request, res: Response): Promise<void> {
        try {
            const body = readBody(req.body);
            const changes: UpdateUserInput = {};

            for (const field of UPDATABLE_FIELDS) {
                const value: unknown = body[field];
                if (value === undefined) continue;
                if (typeof value !== 'string') {
                    res.status(400).json({ error: `${field} must be a string` });
                    return;
                }
                changes[field] = value;
            }

            if (Object.keys(changes).length === 0) {
                res.status(400).json({ error: 'Nothing to update' });
                return;
            }

            const updated = await this.userService.updateUser(user, changes);
            res.json({ user: updated });
        } catch (error) {
            sendError(res, error, 'Failed to update user');
        }
    }

    // DELETE /api/users/me
    async deleteUser(user: ClaimsUser, _req: Request, res: Response): Promise<void> {
        try {
            await this.userService.deleteUser(user);
            res.status(204).send();
        } catch (error) {
            sendError(res, error, 'Failed to delete user');
        }
    }
}
