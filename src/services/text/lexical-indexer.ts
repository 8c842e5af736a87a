import { AppError } from '../../errors/app-error';
import { TokenRange } from '../../models/database.models';

export const DEFAULT_PAGE_SIZE = 250;

const WORD_CHARACTER = /[\p{L}\p{N}]/u;
const SENTENCE_FINAL = /^[.!?…。！？；]+$/u;
const CLOSING_MARK = /^["'”’)\]}）」』》]+$/u;
const WHITESPACE = /^\s+$/u;

export interface LexicalIndex {
    sentences: TokenRange[];
    unique_words: Record<string, true>;
    pages: TokenRange[];
}

// a token is a word when it carries at least one letter or digit
export function isWordToken(token: string): boolean {
    return WORD_CHARACTER.test(token);
}

// locale independent, so the same word folds the same way on every host
export function foldCase(word: string): string {
    return word.toLowerCase();
}

/*
A sentence ends after a run of sentence-final punctuation. Closing quotes/brackets and the
whitespace that follow it still belong to the sentence, so the next one starts on its first
word. Whatever is left without terminal punctuation forms the last sentence.
*/
export function splitSentences(tokens: string[]): TokenRange[] {
    const sentences: TokenRange[] = [];
    let start = 0;
    let i = 0;

    while (i < tokens.length) {
        if (!SENTENCE_FINAL.test(tokens[i])) {
            i++;
            continue;
        }

        let end = i + 1;
        while (end < tokens.length && SENTENCE_FINAL.test(tokens[end])) end++;
        while (end < tokens.length && CLOSING_MARK.test(tokens[end])) end++;
        while (end < tokens.length && WHITESPACE.test(tokens[end])) end++;

        sentences.push({ start, end });
        start = end;
        i = end;
    }

    if (start < tokens.length) {
        sentences.push({ start, end: tokens.length });
    }

    return sentences;
}

export function collectUniqueWords(tokens: string[]): Record<string, true> {
    const words = new Set<string>();
    for (const token of tokens) {
        if (isWordToken(token)) {
            words.add(foldCase(token));
        }
    }
    // sorted so equal sets serialize identically
    return Object.fromEntries(
        Array.from(words).sort().map((word): [string, true] => [word, true])
    );
}

// empty input gives zero pages
export function paginate(tokenCount: number, pageSize: number = DEFAULT_PAGE_SIZE): TokenRange[] {
    if (!Number.isInteger(pageSize) || pageSize < 1) {
        throw new AppError('InvalidInput', `Page size must be a positive integer, got ${pageSize}`);
    }

    const pages: TokenRange[] = [];
    for (let start = 0; start < tokenCount; start += pageSize) {
        pages.push({ start, end: Math.min(start + pageSize, tokenCount) });
    }
    return pages;
}

export function index(tokens: string[], pageSize: number = DEFAULT_PAGE_SIZE): LexicalIndex {
    return {
        sentences: splitSentences(tokens),
        unique_words: collectUniqueWords(tokens),
        pages: paginate(tokens.length, pageSize),
    };
}
