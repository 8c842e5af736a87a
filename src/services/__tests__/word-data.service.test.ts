import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ClaimsUser } from '../../models/database.models';
import { normalizeWord, WordDataService } from '../word-data.service';
import { MemoryStore } from '../../__tests__/helpers/memory-store';
import { captureError, errorKind } from '../../__tests__/helpers/fixtures';

const reader: ClaimsUser = {
    id: 1,
    username: 'reader',
    created_on: '2024-01-01T00:00:00.000Z',
    study_lang: 'en',
    display_lang: 'en',
};

describe('WordDataService', () => {
    let store: MemoryStore;
    let words: WordDataService;

    beforeEach(() => {
        store = new MemoryStore();
        words = new WordDataService(store);
    });

    it('returns empty maps before anything was written', async () => {
        expect(await words.getWordData(reader, 'en')).toEqual({
            word_status_data: {},
            word_definition_data: {},
        });
    });

    it('collapses case variants in a batch', async () => {
        await words.batchUpdateWordStatus(reader, 'en', ['Cat', 'cat', 'DOG'], 'known');

        const data = await words.getWordData(reader, 'en');
        expect(data.word_status_data).toEqual({ cat: 'known', dog: 'known' });
        expect(Object.keys(data.word_status_data)).toHaveLength(2);
    });

    it('trims and folds single updates, and the latest write wins', async () => {
        await words.updateWordStatus(reader, 'en', ' Hello ', 'learning');
        await words.updateWordStatus(reader, 'en', 'world', 'unknown');
        await words.updateWordStatus(reader, 'en', 'HELLO', 'known');

        expect((await words.getWordData(reader, 'en')).word_status_data).toEqual({
            hello: 'known',
            world: 'unknown',
        });
    });

    it('keeps definitions apart from statuses', async () => {
        await words.updateWordStatus(reader, 'en', 'cat', 'learning');
        await words.updateWordDefinition(reader, 'en', 'Cat', 'a small feline');

        expect(await words.getWordData(reader, 'en')).toEqual({
            word_status_data: { cat: 'learning' },
            word_definition_data: { cat: 'a small feline' },
        });
    });

    it('keeps languages and users apart', async () => {
        await words.updateWordStatus(reader, 'zh', '你好', 'known');
        await words.updateWordStatus({ ...reader, id: 2 }, 'en', 'hello', 'known');

        expect((await words.getWordData(reader, 'en')).word_status_data).toEqual({});
        expect((await words.getWordData(reader, 'zh')).word_status_data).toEqual({ '你好': 'known' });
    });

    it('writes nothing when any word in a batch is invalid', async () => {
        const save = vi.spyOn(store, 'saveUserWordData');

        await expect(words.batchUpdateWordStatus(reader, 'en', ['fine', '   '], 'known'))
            .rejects.toMatchObject({ kind: 'InvalidInput' });

        expect(save).not.toHaveBeenCalled();
        expect((await words.getWordData(reader, 'en')).word_status_data).toEqual({});
    });

    it('writes a whole batch in one store call', async () => {
        const save = vi.spyOn(store, 'saveUserWordData');

        await words.batchUpdateWordStatus(reader, 'en', ['one', 'two', 'three'], 'learning');

        expect(save).toHaveBeenCalledTimes(1);
        expect(save).toHaveBeenCalledWith(1, 'en', {
            word_status_data: { one: 'learning', two: 'learning', three: 'learning' },
        });
    });

    it.each([
        [['word'], 'mastered', 'en', 'InvalidInput'],
        [[], 'known', 'en', 'InvalidInput'],
        [['word'], 'known', 'fr', 'UnsupportedLanguage'],
    ])('rejects words=%j status=%s lang=%s', async (list, status, lang, kind) => {
        await expect(words.batchUpdateWordStatus(reader, lang, list, status)).rejects.toMatchObject({ kind });
    });

    it('rejects oversized batches', async () => {
        const list = Array.from({ length: 5001 }, (_, i) => `word${i}`);

        await expect(words.batchUpdateWordStatus(reader, 'en', list, 'known')).rejects.toMatchObject({ kind: 'InvalidInput' });
    });

    it('rejects an empty word for a definition', async () => {
        await expect(words.updateWordDefinition(reader, 'en', '', 'nothing')).rejects.toMatchObject({ kind: 'InvalidInput' });
    });

    it('rejects reads for unsupported languages', async () => {
        await expect(words.getWordData(reader, 'xx')).rejects.toMatchObject({ kind: 'UnsupportedLanguage' });
    });
});

describe('normalizeWord', () => {
    it('folds the same way as article unique words', () => {
        expect(normalizeWord('  Über ')).toBe('über');
    });

    it('rejects blank words', () => {
        expect(errorKind(captureError(() => normalizeWord(' \t')))).toBe('InvalidInput');
    });
});
