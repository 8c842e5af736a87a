import {
    Article,
    ArticleDraft,
    ArticleQuery,
    LanguageCode,
    NewUser,
    SimpleArticle,
    SimpleUser,
    User,
    UserWordData,
    UserWordDataPatch,
} from '../models/database.models';

/*
Persistence boundary. Every method may fail with an AppError of kind
NotFound or StoreUnavailable (UsernameTaken for user writes); nothing else leaks out.
*/
export interface Store {
    createUser(user: NewUser): Promise<User>;
    loadUser(id: number): Promise<User>;
    findUserByUsername(username: string): Promise<User | null>;
    saveUser(user: User): Promise<void>;
    listUsers(limit: number, offset: number): Promise<SimpleUser[]>;
    // also removes the user's word data
    deleteUser(id: number): Promise<void>;

    saveArticle(draft: ArticleDraft): Promise<Article>;
    loadArticle(id: number): Promise<Article>;
    listArticles(query: ArticleQuery): Promise<SimpleArticle[]>;

    // empty maps when the user never wrote anything for this language
    loadUserWordData(userId: number, lang: LanguageCode): Promise<UserWordData>;
    // merges the patch per word (last write wins) and returns the stored result
    saveUserWordData(userId: number, lang: LanguageCode, patch: UserWordDataPatch): Promise<UserWordData>;

    ping(): Promise<void>;
}
