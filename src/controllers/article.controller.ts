import { Request, Response } from 'express';
import { AppError } from '../errors/app-error';
import { ClaimsUser, LanguageCode } from '../models/database.models';
import { ArticleListParams, ArticleService } from '../services/article.service';
import { sendError } from '../utils/http-errors';
import { isStringArray, parseBoundedInt, parseRowId, readBody, requireLanguage } from '../utils/validators';

export const DEFAULT_ARTICLE_LIMIT = 20;
export const MAX_ARTICLE_LIMIT = 100;

function parseLanguageFilter(raw: unknown): LanguageCode | undefined {
    if (raw === undefined) return undefined;
    if (typeof raw !== 'string') {
        throw new AppError('InvalidInput', 'lang must be given once');
    }
    return requireLanguage(raw);
}

function parseListParams(query: Request['query']): ArticleListParams {
    const search = typeof query.search === 'string' ? query.search.trim() : '';
    return {
        limit: parseBoundedInt(query.limit, DEFAULT_ARTICLE_LIMIT, { min: 1, max: MAX_ARTICLE_LIMIT }),
        offset: parseBoundedInt(query.offset, 0, { min: 0, max: Number.MAX_SAFE_INTEGER }),
        lang: parseLanguageFilter(query.lang),
        search: search.length > 0 ? search : undefined,
    };
}

export class ArticleController {
    constructor(private readonly articleService: ArticleService) {}

    // GET /api/articles - public article list
    async getArticles(_user: ClaimsUser, req: Request, res: Response): Promise<void> {
        try {
            const articles = await this.articleService.getArticles(parseListParams(req.query));
            res.json({ articles, count: articles.length });
        } catch (error) {
            sendError(res, error, 'Failed to retrieve articles');
        }
    }

    // GET /api/articles/user?user_id= - uploads of one user (default: caller)
    async getUserArticles(user: ClaimsUser, req: Request, res: Response): Promise<void> {
        try {
            let userId: number | undefined;
            if (req.query.user_id !== undefined) {
                const parsed = parseRowId(req.query.user_id);
                if (parsed === null) {
                    res.status(400).json({ error: 'Invalid user ID' });
                    return;
                }
                userId = parsed;
            }

            const articles = await this.articleService.getUserArticles(user, {
                ...parseListParams(req.query),
                user_id: userId,
            });
            res.json({ articles, count: articles.length });
        } catch (error) {
            sendError(res, error, 'Failed to retrieve articles');
        }
    }

    // GET /api/articles/:id
    async getFullArticle(user: ClaimsUser, req: Request, res: Response): Promise<void> {
        try {
            const articleId = parseRowId(req.params.id);
            if (articleId === null) {
                res.status(400).json({ error: 'Invalid article ID' });
                return;
            }

            const article = await this.articleService.getFullArticle(user, articleId);
            res.json({ article });
        } catch (error) {
            sendError(res, error, 'Failed to retrieve article');
        }
    }

    // POST /api/articles
    async newArticle(user: ClaimsUser, req: Request, res: Response): Promise<void> {
        try {
            const { title, author, content, language, tags, is_private } = readBody(req.body);

            if (typeof title !== 'string' || typeof content !== 'string' || typeof language !== 'string') {
                res.status(400).json({ error: 'title, content and language are required' });
                return;
            }
            if (author !== undefined && author !== null && typeof author !== 'string') {
                res.status(400).json({ error: 'author must be a string' });
                return;
            }
            if (tags !== undefined && !isStringArray(tags)) {
                res.status(400).json({ error: 'tags must be an array of strings' });
                return;
            }
            if (typeof is_private !== 'boolean') {
                res.status(400).json({ error: 'is_private must be a boolean' });
                return;
            }

            const article = await this.articleService.newArticle(user, {
                title,
                author,
                content,
                language,
                tags,
                is_private,
            });
            res.status(201).json({ article });
        } catch (error) {
            sendError(res, error, 'Failed to create article');
        }
    }
}
