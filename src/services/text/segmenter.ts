import { load, cut } from '@node-rs/jieba';
import { AppError } from '../../errors/app-error';
import { isLanguageCode, LanguageCode } from '../../models/database.models';
import { logger } from '../../utils/logger';

/*
Segmenter: raw text + language code -> ordered tokens.

Segmentation is boundary preserving, not word filtering: punctuation and whitespace come back as
tokens of their own, so joining the output always gives back the input. Deciding what counts as
a word is left to the lexical indexer.
*/

const wordBoundarySegmenter = new Intl.Segmenter('en', { granularity: 'word' });

// the jieba dictionary is loaded once per process and only read afterwards
let chineseModelLoaded = false;

function ensureChineseModel(): void {
    if (chineseModelLoaded) return;
    const startedAt = Date.now();
    load();
    chineseModelLoaded = true;
    logger.info('Chinese segmentation dictionary loaded', { ms: Date.now() - startedAt });
}

// unicode word boundaries (UAX #29)
function segmentByWordBoundaries(text: string): string[] {
    return Array.from(wordBoundarySegmenter.segment(text), (part) => part.segment);
}

function segmentChinese(text: string): string[] {
    ensureChineseModel();
    return alignPieces(text, cut(text, false));
}

/*
Lay model output back over the source text. Any stretch of text the pieces do not cover comes
back as a token of its own, so the result reconstructs the input exactly.
*/
export function alignPieces(text: string, pieces: string[]): string[] {
    const tokens: string[] = [];
    let cursor = 0;

    for (const piece of pieces) {
        if (piece.length === 0) continue;

        const at = text.indexOf(piece, cursor);
        if (at === -1) continue;

        if (at > cursor) {
            tokens.push(text.slice(cursor, at));
        }
        tokens.push(piece);
        cursor = at + piece.length;
    }

    if (cursor < text.length) {
        tokens.push(text.slice(cursor));
    }

    return tokens;
}

const SEGMENTERS: Record<LanguageCode, (text: string) => string[]> = {
    en: segmentByWordBoundaries,
    zh: segmentChinese,
};

export function segment(text: string, language: string): string[] {
    if (!isLanguageCode(language)) {
        throw new AppError('UnsupportedLanguage', `Unsupported language: ${language}`);
    }

    if (text.length === 0) return [];

    return SEGMENTERS[language](text);
}
