import { Router } from 'express';
import { WordDataController } from '../controllers/word-data.controller';
import { Authenticate } from '../middleware/auth.middleware';

export function createWordDataRoutes(controller: WordDataController, authenticate: Authenticate): Router {
    const router = Router();

    router.get('/', authenticate(controller.getWordData.bind(controller)));
    router.put('/status', authenticate(controller.updateWordStatus.bind(controller)));
    router.put('/status/batch', authenticate(controller.batchUpdateWordStatus.bind(controller)));
    router.put('/definition', authenticate(controller.updateWordDefinition.bind(controller)));

    return router;
}
