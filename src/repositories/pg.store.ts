import { Pool, QueryResult, QueryResultRow } from 'pg';
import { AppError } from '../errors/app-error';
import {
    Article,
    ArticleDraft,
    ArticleQuery,
    LanguageCode,
    NewUser,
    SimpleArticle,
    SimpleUser,
    TokenRange,
    User,
    UserWordData,
    UserWordDataPatch,
    WordStatus,
} from '../models/database.models';
import { logger } from '../utils/logger';
import { Store } from './store.interface';

type UserRow = {
    id: number;
    username: string;
    pass: string;
    created_on: Date;
    study_lang: LanguageCode;
    display_lang: LanguageCode;
    refresh_token: string;
};

type ArticleRow = {
    id: number;
    title: string;
    author: string | null;
    content: string;
    content_length: number;
    words: string[];
    sentences: TokenRange[];
    unique_words: Record<string, true>;
    page_data: TokenRange[];
    created_on: Date;
    is_system: boolean;
    uploader_id: number;
    lang: LanguageCode;
    tags: string[];
};

type SimpleArticleRow = Omit<ArticleRow, 'content' | 'words' | 'sentences' | 'unique_words' | 'page_data' | 'uploader_id'>;

type WordDataRow = {
    word_status_data: Record<string, WordStatus>;
    word_definition_data: Record<string, string>;
};

const USER_COLUMNS = 'id, username, pass, created_on, study_lang, display_lang, refresh_token';
const SIMPLE_ARTICLE_COLUMNS = 'id, title, author, content_length, created_on, is_system, lang, tags';

const UNIQUE_VIOLATION = '23505';

function pgErrorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

// escape LIKE wildcards so a search for "50%" matches literally
export function likePattern(search: string): string {
    return `%${search.replace(/[\\%_]/g, '\\$&')}%`;
}

/*
PostgreSQL-backed store. Driver errors never leave this class as-is: they are logged here
and surface as StoreUnavailable so callers only ever see "not found" or "unavailable".
*/
export class PgStore implements Store {
    constructor(private readonly pool: Pool) {}

    private async run<T extends QueryResultRow>(
        operation: string,
        text: string,
        values: unknown[] = []
    ): Promise<QueryResult<T>> {
        try {
            return await this.pool.query<T>(text, values);
        } catch (error) {
            if (pgErrorCode(error) === UNIQUE_VIOLATION) {
                throw new AppError('UsernameTaken', 'Username is already taken');
            }
            logger.error('Database operation failed', { operation, error });
            throw new AppError('StoreUnavailable', 'Storage is unavailable', { cause: error });
        }
    }

    private mapRowToUser(row: UserRow): User {
        return {
            id: row.id,
            username: row.username,
            pass: row.pass,
            created_on: row.created_on,
            study_lang: row.study_lang,
            display_lang: row.display_lang,
            refresh_token: row.refresh_token,
        };
    }

    private mapRowToArticle(row: ArticleRow): Article {
        return {
            id: row.id,
            title: row.title,
            author: row.author,
            content: row.content,
            content_length: row.content_length,
            words: row.words,
            sentences: row.sentences,
            unique_words: row.unique_words,
            page_data: row.page_data,
            created_on: row.created_on,
            is_system: row.is_system,
            uploader_id: row.uploader_id,
            lang: row.lang,
            tags: row.tags,
        };
    }

    private mapRowToSimpleArticle(row: SimpleArticleRow): SimpleArticle {
        return {
            id: row.id,
            title: row.title,
            author: row.author,
            content_length: row.content_length,
            created_on: row.created_on,
            is_system: row.is_system,
            lang: row.lang,
            tags: row.tags,
        };
    }

    async createUser(user: NewUser): Promise<User> {
        const result = await this.run<UserRow>(
            'createUser',
            `INSERT INTO users (username, pass, study_lang, display_lang, refresh_token)
            VALUES ($1, $2, $3, $4, $5)
            RETURNING ${USER_COLUMNS}`,
            [user.username, user.pass, user.study_lang, user.display_lang, user.refresh_token]
        );
        return this.mapRowToUser(result.rows[0]);
    }

    async loadUser(id: number): Promise<User> {
        const result = await this.run<UserRow>(
            'loadUser',
            `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
            [id]
        );

        if (result.rows.length === 0) {
            throw new AppError('NotFound', 'User not found');
        }
        return this.mapRowToUser(result.rows[0]);
    }

    async findUserByUsername(username: string): Promise<User | null> {
        const result = await this.run<UserRow>(
            'findUserByUsername',
            `SELECT ${USER_COLUMNS} FROM users WHERE username = $1`,
            [username]
        );

        if (result.rows.length === 0) return null;
        return this.mapRowToUser(result.rows[0]);
    }

    async saveUser(user: User): Promise<void> {
        const result = await this.run(
            'saveUser',
            `UPDATE users
            SET username = $1, pass = $2, study_lang = $3, display_lang = $4, refresh_token = $5
            WHERE id = $6`,
            [user.username, user.pass, user.study_lang, user.display_lang, user.refresh_token, user.id]
        );

        if (result.rowCount === 0) {
            throw new AppError('NotFound', 'User not found');
        }
    }

    async listUsers(limit: number, offset: number): Promise<SimpleUser[]> {
        const result = await this.run<{ id: number; username: string }>(
            'listUsers',
            'SELECT id, username FROM users ORDER BY id LIMIT $1 OFFSET $2',
            [limit, offset]
        );
        return result.rows.map(row => ({ id: row.id, username: row.username }));
    }

    async deleteUser(id: number): Promise<void> {
        // word data and uploads go with the user (ON DELETE CASCADE)
        const result = await this.run('deleteUser', 'DELETE FROM users WHERE id = $1', [id]);

        if (result.rowCount === 0) {
            throw new AppError('NotFound', 'User not found');
        }
    }

    async saveArticle(draft: ArticleDraft): Promise<Article> {
        const result = await this.run<ArticleRow>(
            'saveArticle',
            `INSERT INTO articles
            (title, author, content, content_length, words, sentences, unique_words, page_data,
            created_on, is_system, uploader_id, lang, tags)
            VALUES ($1, $2, $3, $4, $5, $6::jsonb, $7::jsonb, $8::jsonb, $9, $10, $11, $12, $13)
            RETURNING *`,
            [
                draft.title,
                draft.author,
                draft.content,
                draft.content_length,
                draft.words,
                JSON.stringify(draft.sentences),
                JSON.stringify(draft.unique_words),
                JSON.stringify(draft.page_data),
                draft.created_on,
                draft.is_system,
                draft.uploader_id,
                draft.lang,
                draft.tags,
            ]
        );
        return this.mapRowToArticle(result.rows[0]);
    }

    async loadArticle(id: number): Promise<Article> {
        const result = await this.run<ArticleRow>(
            'loadArticle',
            'SELECT * FROM articles WHERE id = $1',
            [id]
        );

        if (result.rows.length === 0) {
            throw new AppError('NotFound', 'Article not found');
        }
        return this.mapRowToArticle(result.rows[0]);
    }

    async listArticles(query: ArticleQuery): Promise<SimpleArticle[]> {
        const conditions: string[] = [];
        const params: unknown[] = [];

        if (query.uploaderId !== undefined) {
            params.push(query.uploaderId);
            conditions.push(`uploader_id = $${params.length}`);
        }
        if (!query.includePrivate) {
            conditions.push('is_system = TRUE');
        }
        if (query.lang) {
            params.push(query.lang);
            conditions.push(`lang = $${params.length}`);
        }
        if (query.search) {
            params.push(likePattern(query.search));
            conditions.push(`title ILIKE $${params.length}`);
        }

        let sql = `SELECT ${SIMPLE_ARTICLE_COLUMNS} FROM articles`;
        if (conditions.length > 0) {
            sql += ` WHERE ${conditions.join(' AND ')}`;
        }

        params.push(query.limit);
        sql += ` ORDER BY created_on DESC, id DESC LIMIT $${params.length}`;
        params.push(query.offset);
        sql += ` OFFSET $${params.length}`;

        const result = await this.run<SimpleArticleRow>('listArticles', sql, params);
        return result.rows.map(row => this.mapRowToSimpleArticle(row));
    }

    async loadUserWordData(userId: number, lang: LanguageCode): Promise<UserWordData> {
        const result = await this.run<WordDataRow>(
            'loadUserWordData',
            `SELECT word_status_data, word_definition_data
            FROM user_word_data
            WHERE user_id = $1 AND lang = $2`,
            [userId, lang]
        );

        if (result.rows.length === 0) {
            return { word_status_data: {}, word_definition_data: {} };
        }
        return {
            word_status_data: result.rows[0].word_status_data,
            word_definition_data: result.rows[0].word_definition_data,
        };
    }

    async saveUserWordData(userId: number, lang: LanguageCode, patch: UserWordDataPatch): Promise<UserWordData> {
        // one statement, so a batch lands all at once; jsonb || merges per word
        const result = await this.run<WordDataRow>(
            'saveUserWordData',
            `INSERT INTO user_word_data (user_id, lang, word_status_data, word_definition_data)
            VALUES ($1, $2, $3::jsonb, $4::jsonb)
            ON CONFLICT (user_id, lang) DO UPDATE SET
                word_status_data = user_word_data.word_status_data || EXCLUDED.word_status_data,
                word_definition_data = user_word_data.word_definition_data || EXCLUDED.word_definition_data
            RETURNING word_status_data, word_definition_data`,
            [
                userId,
                lang,
                JSON.stringify(patch.word_status_data ?? {}),
                JSON.stringify(patch.word_definition_data ?? {}),
            ]
        );
        return {
            word_status_data: result.rows[0].word_status_data,
            word_definition_data: result.rows[0].word_definition_data,
        };
    }

    async ping(): Promise<void> {
        await this.run('ping', 'SELECT 1');
    }
}
