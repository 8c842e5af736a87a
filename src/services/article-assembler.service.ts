import { AppError } from '../errors/app-error';
import { ArticleDraft, LanguageCode } from '../models/database.models';
import { requireLanguage } from '../utils/validators';
import { segment } from './text/segmenter';
import { DEFAULT_PAGE_SIZE, index } from './text/lexical-indexer';

/*
Turns a raw article submission into the record that gets persisted:
content -> segmenter -> lexical indexer -> draft. Nothing here touches storage.
*/

export interface NewArticleInput {
    title: string;
    author?: string | null;
    content: string;
    language: string;
    tags?: string[];
    is_private: boolean;
}

export class ArticleAssembler {
    constructor(
        private readonly pageSize: number = DEFAULT_PAGE_SIZE,
        private readonly now: () => Date = () => new Date()
    ) {}

    assemble(input: NewArticleInput, uploaderId: number): ArticleDraft {
        const title = input.title.trim();
        if (title.length === 0) {
            throw new AppError('InvalidInput', 'Title is required');
        }

        // whitespace-only bodies are rejected rather than stored as zero-token articles
        if (input.content.trim().length === 0) {
            throw new AppError('EmptyContent', 'Article content is empty');
        }

        const { lang, words } = this.tokenize(input.content, input.language);
        const { sentences, unique_words, pages } = index(words, this.pageSize);
        const author = input.author?.trim();

        return {
            title,
            author: author ? author : null,
            content: input.content,
            content_length: Array.from(input.content).length,
            words,
            sentences,
            unique_words,
            page_data: pages,
            created_on: this.now(),
            is_system: !input.is_private,
            uploader_id: uploaderId,
            lang,
            tags: normalizeTags(input.tags ?? []),
        };
    }

    private tokenize(content: string, language: string): { lang: LanguageCode; words: string[] } {
        try {
            const lang = requireLanguage(language);
            return { lang, words: segment(content, lang) };
        } catch (error) {
            throw new AppError('SegmentationFailed', `Could not segment article text (${language})`, { cause: error });
        }
    }
}

// trimmed, non-empty, first occurrence wins
export function normalizeTags(tags: string[]): string[] {
    const seen = new Set<string>();
    for (const tag of tags) {
        const trimmed = tag.trim();
        if (trimmed.length > 0) seen.add(trimmed);
    }
    return Array.from(seen);
}
