import express, { Application, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { AppConfig } from './config/app.config';
import { ArticleController } from './controllers/article.controller';
import { AuthController } from './controllers/auth.controller';
import { UserController } from './controllers/user.controller';
import { WordDataController } from './controllers/word-data.controller';
import { createAuthMiddleware } from './middleware/auth.middleware';
import { Store } from './repositories/store.interface';
import { createArticleRoutes } from './routes/article.routes';
import { createAuthRoutes } from './routes/auth.routes';
import { createUserRoutes } from './routes/user.routes';
import { createWordDataRoutes } from './routes/word-data.routes';
import { ArticleAssembler } from './services/article-assembler.service';
import { ArticleService } from './services/article.service';
import { AuthService } from './services/auth.service';
import { TokenService } from './services/token.service';
import { UserService } from './services/user.service';
import { WordDataService } from './services/word-data.service';
import { logger } from './utils/logger';
import { createBcryptHasher, PasswordHasher } from './utils/password';

export interface Services {
    tokens: TokenService;
    auth: AuthService;
    users: UserService;
    articles: ArticleService;
    words: WordDataService;
}

export function createServices(
    store: Store,
    config: AppConfig,
    hasher: PasswordHasher = createBcryptHasher(config.bcryptRounds)
): Services {
    const tokens = new TokenService(config.jwtSecret, config.accessTokenTtlSeconds);

    return {
        tokens,
        auth: new AuthService(store, hasher, tokens),
        users: new UserService(store, hasher),
        articles: new ArticleService(store, new ArticleAssembler(config.articlePageSize)),
        words: new WordDataService(store),
    };
}

export function createApp(store: Store, config: AppConfig, services: Services = createServices(store, config)): Application {
    const app: Application = express();
    const authenticate = createAuthMiddleware(services.tokens);

    app.use(cors({
        origin: config.corsOrigin,
        methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization']
    }));

    app.use(express.json({ limit: '10mb' }));

    app.use((req: Request, res: Response, next: NextFunction) => {
        logger.info('Incoming request', {
            method: req.method,
            path: req.path,
            ip: req.ip
        });
        next();
    });

    app.get('/health', async (req: Request, res: Response) => {
        try {
            await store.ping();
            res.json({
                status: 'healthy',
                timestamp: new Date().toISOString(),
                database: 'connected'
            });
        } catch (error) {
            logger.warn('Health check failed', { error });
            res.status(503).json({
                status: 'unhealthy',
                timestamp: new Date().toISOString(),
                database: 'disconnected'
            });
        }
    });

    app.use('/api/auth', createAuthRoutes(new AuthController(services.auth)));
    app.use('/api/users', createUserRoutes(new UserController(services.users), authenticate));
    app.use('/api/articles', createArticleRoutes(new ArticleController(services.articles), authenticate));
    app.use('/api/words', createWordDataRoutes(new WordDataController(services.words), authenticate));

    app.use((req: Request, res: Response) => {
        res.status(404).json({
            error: 'Not found',
            message: `Route ${req.method} ${req.path} does not exist`
        });
    });

    app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
        // body-parser marks malformed payloads with a 4xx status
        if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
            res.status(err.status).json({ error: 'Invalid request body' });
            return;
        }

        logger.error('Unhandled error', {
            error: err.message,
            stack: err.stack,
            path: req.path,
            method: req.method
        });

        res.status(500).json({
            error: 'Internal server error',
            message: config.isProduction ? 'Something went wrong' : err.message
        });
    });

    return app;
}
