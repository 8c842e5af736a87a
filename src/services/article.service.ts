import { AppError } from '../errors/app-error';
import { Article, ClaimsUser, LanguageCode, SimpleArticle } from '../models/database.models';
import { Store } from '../repositories/store.interface';
import { logger } from '../utils/logger';
import { ArticleAssembler, NewArticleInput } from './article-assembler.service';

export interface ArticleListParams {
    limit: number;
    offset: number;
    lang?: LanguageCode;
    search?: string;
}

export interface UserArticleListParams extends ArticleListParams {
    user_id?: number;
}

export class ArticleService {
    constructor(
        private readonly store: Store,
        private readonly assembler: ArticleAssembler
    ) {}

    async newArticle(claims: ClaimsUser, input: NewArticleInput): Promise<Article> {
        const draft = this.assembler.assemble(input, claims.id);
        const article = await this.store.saveArticle(draft);

        logger.info('Article created', {
            articleId: article.id,
            uploaderId: claims.id,
            lang: article.lang,
            tokens: article.words.length,
        });
        return article;
    }

    // system (public) articles only
    async getArticles(params: ArticleListParams): Promise<SimpleArticle[]> {
        return this.store.listArticles({ ...params, includePrivate: false });
    }

    // another user's private uploads stay hidden
    async getUserArticles(claims: ClaimsUser, params: UserArticleListParams): Promise<SimpleArticle[]> {
        const { user_id, ...rest } = params;
        const uploaderId = user_id ?? claims.id;

        return this.store.listArticles({
            ...rest,
            uploaderId,
            includePrivate: uploaderId === claims.id,
        });
    }

    async getFullArticle(claims: ClaimsUser, articleId: number): Promise<Article> {
        const article = await this.store.loadArticle(articleId);

        // same answer as a missing article, so private ids cannot be probed
        if (!article.is_system && article.uploader_id !== claims.id) {
            throw new AppError('NotFound', 'Article not found');
        }
        return article;
    }
}
