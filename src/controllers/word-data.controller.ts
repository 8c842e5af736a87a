import { Request, Response } from 'express';
import { ClaimsUser } from '../models/database.models';
import { WordDataService } from '../services/word-data.service';
import { sendError } from '../utils/http-errors';
import { isStringArray, readBody } from '../utils/validators';

export class WordDataController {
    constructor(private readonly wordDataService: WordDataService) {}

    // GET /api/words?lang=
    async getWordData(user: ClaimsUser, req: Request, res: Response): Promise<void> {
        try {
            const { lang } = req.query;
            if (typeof lang !== 'string') {
                res.status(400).json({ error: 'lang is required' });
                return;
            }

            const data = await this.wordDataService.getWordData(user, lang);
            res.json({ data });
        } catch (error) {
            sendError(res, error, 'Failed to retrieve word data');
        }
    }

    // PUT /api/words/status
    async updateWordStatus(user: ClaimsUser, req: Request, res: Response): Promise<void> {
        try {
            const { lang, word, status } = readBody(req.body);
            if (typeof lang !== 'string' || typeof word !== 'string' || typeof status !== 'string') {
                res.status(400).json({ error: 'lang, word and status are required' });
                return;
            }

            await this.wordDataService.updateWordStatus(user, lang, word, status);
            res.json({ success: true });
        } catch (error) {
            sendError(res, error, 'Failed to update word status');
        }
    }

    // PUT /api/words/status/batch
    async batchUpdateWordStatus(user: ClaimsUser, req: Request, res: Response): Promise<void> {
        try {
            const { lang, words, status } = readBody(req.body);
            if (typeof lang !== 'string' || typeof status !== 'string') {
                res.status(400).json({ error: 'lang and status are required' });
                return;
            }
            if (!isStringArray(words)) {
                res.status(400).json({ error: 'words must be an array of strings' });
                return;
            }

            await this.wordDataService.batchUpdateWordStatus(user, lang, words, status);
            res.json({ success: true });
        } catch (error) {
            sendError(res, error, 'Failed to update word statuses');
        }
    }

    // PUT /api/words/definition
    async updateWordDefinition(user: ClaimsUser, req: Request, res: Response): Promise<void> {
        try {
            const { lang, word, definition } = readBody(req.body);
            if (typeof lang !== 'string' || typeof word !== 'string' || typeof definition !== 'string') {
                res.status(400).json({ error: 'lang, word and definition are required' });
                return;
            }

            await this.wordDataService.updateWordDefinition(user, lang, word, definition);
            res.json({ success: true });
        } catch (error) {
            sendError(res, error, 'Failed to update word definition');
        }
    }
}
