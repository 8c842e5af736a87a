export const SUPPORTED_LANGUAGES = ['en', 'zh'] as const;
export type LanguageCode = typeof SUPPORTED_LANGUAGES[number];

export const WORD_STATUSES = ['unknown', 'learning', 'known'] as const;
export type WordStatus = typeof WORD_STATUSES[number];

export function isLanguageCode(value: unknown): value is LanguageCode {
    return typeof value === 'string' && (SUPPORTED_LANGUAGES as readonly string[]).includes(value);
}

export function isWordStatus(value: unknown): value is WordStatus {
    return typeof value === 'string' && (WORD_STATUSES as readonly string[]).includes(value);
}

export interface User {
    id: number;
    username: string;
    pass: string;
    created_on: Date;
    study_lang: LanguageCode;
    display_lang: LanguageCode;
    refresh_token: string;
}

export type NewUser = Omit<User, 'id' | 'created_on'>;

export interface SimpleUser {
    id: number;
    username: string;
}

export function toSimpleUser(user: User): SimpleUser {
    return { id: user.id, username: user.username };
}

// half-open range [start, end) over an article's token list
export interface TokenRange {
    start: number;
    end: number;
}

export interface Article {
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
}

export type ArticleDraft = Omit<Article, 'id'>;

// list view: no content, token data or uploader
export type SimpleArticle = Omit<
    Article,
    'content' | 'words' | 'sentences' | 'unique_words' | 'page_data' | 'uploader_id'
>;

export function toSimpleArticle(article: Article): SimpleArticle {
    return {
        id: article.id,
        title: article.title,
        author: article.author,
        content_length: article.content_length,
        created_on: article.created_on,
        is_system: article.is_system,
        lang: article.lang,
        tags: article.tags,
    };
}

export interface ArticleQuery {
    limit: number;
    offset: number;
    lang?: LanguageCode;
    search?: string;
    uploaderId?: number;
    includePrivate: boolean;
}

export interface UserWordData {
    word_status_data: Record<string, WordStatus>;
    word_definition_data: Record<string, string>;
}

export type UserWordDataPatch = Partial<UserWordData>;

export function emptyWordData(): UserWordData {
    return { word_status_data: {}, word_definition_data: {} };
}

export interface ClaimsUser {
    id: number;
    username: string;
    created_on: string;
    study_lang: LanguageCode;
    display_lang: LanguageCode;
}

export interface TokenClaims {
    user: ClaimsUser;
    exp: number;
    iat: number;
}

export function toClaimsUser(user: User): ClaimsUser {
    return {
        id: user.id,
        username: user.username,
        created_on: user.created_on.toISOString(),
        study_lang: user.study_lang,
        display_lang: user.display_lang,
    };
}
