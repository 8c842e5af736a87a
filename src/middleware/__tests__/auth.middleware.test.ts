import { describe, expect, it } from 'vitest';
import { extractBearerToken } from '../auth.middleware';

describe('extractBearerToken', () => {
    it('reads the token from a bearer header', () => {
        expect(extractBearerToken('Bearer abc.def.ghi')).toBe('abc.def.ghi');
    });

    it('accepts any casing of the scheme and extra spacing', () => {
        expect(extractBearerToken('  bearer   abc  ')).toBe('abc');
    });

    it.each([undefined, '', 'Bearer', 'Basic abc', 'Bearer a b', 'abc'])('returns null for %j', (header) => {
        expect(extractBearerToken(header)).toBeNull();
    });
});
