import { Router } from 'express';
import { AuthController } from '../controllers/auth.controller';

/*
auth routes - the only endpoints reachable without an access token.
*/
export function createAuthRoutes(controller: AuthController): Router {
    const router = Router();

    router.post('/register', controller.register.bind(controller));
    router.post('/login', controller.login.bind(controller));
    router.post('/refresh', controller.refresh.bind(controller));

    return router;
}
