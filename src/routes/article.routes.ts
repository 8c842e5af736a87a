import { Router } from 'express';
import { ArticleController } from '../controllers/article.controller';
import { Authenticate } from '../middleware/auth.middleware';

/*
article routes. /user must be registered before /:id or it would be read as an id.
*/
export function createArticleRoutes(controller: ArticleController, authenticate: Authenticate): Router {
    const router = Router();

    router.get('/', authenticate(controller.getArticles.bind(controller)));
    router.get('/user', authenticate(controller.getUserArticles.bind(controller)));
    router.get('/:id', authenticate(controller.getFullArticle.bind(controller)));
    router.post('/', authenticate(controller.newArticle.bind(controller)));

    return router;
}
