import { AppError } from '../errors/app-error';
import { ClaimsUser, UserWordData, WordStatus } from '../models/database.models';
import { Store } from '../repositories/store.interface';
import { logger } from '../utils/logger';
import { requireLanguage, requireWordStatus } from '../utils/validators';
import { foldCase } from './text/lexical-indexer';

export const MAX_BATCH_WORDS = 5000;

// same folding as an article's unique words, so lookups line up
export function normalizeWord(word: string): string {
    const folded = foldCase(word.trim());
    if (folded.length === 0) {
        throw new AppError('InvalidInput', 'Word must not be empty');
    }
    return folded;
}

export class WordDataService {
    constructor(private readonly store: Store) {}

    async getWordData(claims: ClaimsUser, lang: string): Promise<UserWordData> {
        return this.store.loadUserWordData(claims.id, requireLanguage(lang));
    }

    async updateWordStatus(claims: ClaimsUser, lang: string, word: string, status: string): Promise<void> {
        await this.batchUpdateWordStatus(claims, lang, [word], status);
    }

    /*
    All-or-nothing: every word is validated before anything is written, and the write
    is a single store call. Case variants collapse onto one entry.
    */
    async batchUpdateWordStatus(claims: ClaimsUser, lang: string, words: string[], status: string): Promise<void> {
        const language = requireLanguage(lang);
        const wordStatus = requireWordStatus(status);

        if (words.length === 0) {
            throw new AppError('InvalidInput', 'At least one word is required');
        }
        if (words.length > MAX_BATCH_WORDS) {
            throw new AppError('InvalidInput', `At most ${MAX_BATCH_WORDS} words per batch`);
        }

        const entries = new Map<string, WordStatus>();
        for (const word of words) {
            entries.set(normalizeWord(word), wordStatus);
        }

        await this.store.saveUserWordData(claims.id, language, {
            word_status_data: Object.fromEntries(entries),
        });

        logger.info('Word statuses updated', {
            userId: claims.id,
            lang: language,
            status: wordStatus,
            count: entries.size,
        });
    }

    async updateWordDefinition(claims: ClaimsUser, lang: string, word: string, definition: string): Promise<void> {
        const language = requireLanguage(lang);
        const key = normalizeWord(word);

        await this.store.saveUserWordData(claims.id, language, {
            word_definition_data: { [key]: definition },
        });

        logger.info('Word definition updated', { userId: claims.id, lang: language });
    }
}
