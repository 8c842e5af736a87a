import { Router } from 'express';
import { UserController } from '../controllers/user.controller';
import { Authenticate } from '../middleware/auth.middleware';

export function createUserRoutes(controller: UserController, authenticate: Authenticate): Router {
    const router = Router();

    router.get('/', authenticate(controller.getUsers.bind(controller)));
    router.put('/me', authenticate(controller.updateUser.bind(controller)));
    router.delete('/me', authenticate(controller.deleteUser.bind(controller)));

    return router;
}
