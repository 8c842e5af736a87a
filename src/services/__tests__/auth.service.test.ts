import { beforeEach, describe, expect, it, vi } from 'vitest';
import { toClaimsUser } from '../../models/database.models';
import { createBcryptHasher } from '../../utils/password';
import { AuthService, generateRefreshToken } from '../auth.service';
import { TokenService } from '../token.service';
import { UserService } from '../user.service';
import { MemoryStore } from '../../__tests__/helpers/memory-store';
import { captureError, errorKind, plainHasher } from '../../__tests__/helpers/fixtures';

const START = Date.parse('2024-03-01T12:00:00.000Z');
const TTL_SECONDS = 900;

describe('AuthService', () => {
    let now: number;
    let store: MemoryStore;
    let tokens: TokenService;
    let auth: AuthService;
    let issued: number;

    beforeEach(async () => {
        now = START;
        issued = 0;
        store = new MemoryStore(() => new Date('2024-02-01T00:00:00.000Z'));
        tokens = new TokenService('test-secret', TTL_SECONDS, () => now);
        auth = new AuthService(store, plainHasher, tokens, () => `refresh-${++issued}`);

        await auth.register({ username: 'reader', password: 'password-1', study_lang: 'zh', display_lang: 'en' });
    });

    describe('register', () => {
        it('stores a hashed password and no refresh token', async () => {
            const user = await store.loadUser(1);

            expect(user.username).toBe('reader');
            expect(user.pass).toBe('hashed:password-1');
            expect(user.refresh_token).toBe('');
        });

        it('returns only the public projection', async () => {
            const created = await auth.register({
                username: 'second',
                password: 'password-2',
                study_lang: 'en',
                display_lang: 'zh',
            });

            expect(created).toEqual({ id: 2, username: 'second' });
        });

        it('rejects a taken username', async () => {
            await expect(auth.register({
                username: 'reader',
                password: 'password-9',
                study_lang: 'en',
                display_lang: 'en',
            })).rejects.toMatchObject({ kind: 'UsernameTaken' });
        });

        it.each([
            [{ username: 'ab' }, 'InvalidInput'],
            [{ username: 'has space' }, 'InvalidInput'],
            [{ password: 'short' }, 'InvalidInput'],
            [{ study_lang: 'fr' }, 'UnsupportedLanguage'],
            [{ display_lang: 'de' }, 'UnsupportedLanguage'],
        ])('rejects %j with %s', async (override, kind) => {
            await expect(auth.register({
                username: 'newcomer',
                password: 'long-enough',
                study_lang: 'en',
                display_lang: 'en',
                ...override,
            })).rejects.toMatchObject({ kind });
        });
    });

    describe('login', () => {
        it('issues an access token carrying the user snapshot', async () => {
            const result = await auth.login('reader', 'password-1');

            expect(result.refresh_token).toBe('refresh-1');
            expect(tokens.verify(result.token)).toEqual({
                id: 1,
                username: 'reader',
                created_on: '2024-02-01T00:00:00.000Z',
                study_lang: 'zh',
                display_lang: 'en',
            });
        });

        it('stores the new refresh token as the only valid one', async () => {
            await auth.login('reader', 'password-1');

            expect((await store.loadUser(1)).refresh_token).toBe('refresh-1');
        });

        it('fails the same way for a wrong password and an unknown user', async () => {
            const wrongPassword = await auth.login('reader', 'nope-nope').catch((error: unknown) => error);
            const unknownUser = await auth.login('ghost', 'password-1').catch((error: unknown) => error);

            expect(wrongPassword).toMatchObject({ kind: 'InvalidCredentials', message: 'Invalid username or password' });
            expect(unknownUser).toMatchObject({ kind: 'InvalidCredentials', message: 'Invalid username or password' });
        });

        it('still compares a password when the user does not exist', async () => {
            const verify = vi.spyOn(plainHasher, 'verify');

            await expect(auth.login('ghost', 'password-1')).rejects.toMatchObject({ kind: 'InvalidCredentials' });
            expect(verify).toHaveBeenCalledTimes(1);

            verify.mockRestore();
        });

        it('does not touch the stored refresh token on failure', async () => {
            await auth.login('reader', 'password-1');
            await expect(auth.login('reader', 'wrong-password')).rejects.toMatchObject({ kind: 'InvalidCredentials' });

            expect((await store.loadUser(1)).refresh_token).toBe('refresh-1');
        });
    });

    describe('refresh', () => {
        it('renews an expired access token', async () => {
            const { token, refresh_token } = await auth.login('reader', 'password-1');
            now = START + (TTL_SECONDS + 60) * 1000;

            expect(errorKind(captureError(() => tokens.verify(token)))).toBe('TokenExpired');

            const renewed = await auth.refresh(token, refresh_token);
            expect(tokens.verify(renewed.token).id).toBe(1);
            expect(tokens.decodeIgnoringExpiry(renewed.token).exp).toBe(now / 1000 + TTL_SECONDS);
        });

        it('keeps the refresh token in place', async () => {
            const { token, refresh_token } = await auth.login('reader', 'password-1');
            await auth.refresh(token, refresh_token);
            await auth.refresh(token, refresh_token);

            expect((await store.loadUser(1)).refresh_token).toBe('refresh-1');
        });

        it('builds the new claims from the stored user, not the old token', async () => {
            const { token, refresh_token } = await auth.login('reader', 'password-1');
            const users = new UserService(store, plainHasher);
            await users.updateUser(tokens.verify(token), { username: 'renamed', study_lang: 'en' });

            // the old token still carries the login-time snapshot
            expect(tokens.verify(token)).toMatchObject({ username: 'reader', study_lang: 'zh' });

            const renewed = await auth.refresh(token, refresh_token);
            expect(tokens.verify(renewed.token)).toMatchObject({ id: 1, username: 'renamed', study_lang: 'en' });
        });

        it('rejects a refresh token replaced by a later login', async () => {
            const first = await auth.login('reader', 'password-1');
            const second = await auth.login('reader', 'password-1');

            await expect(auth.refresh(second.token, first.refresh_token)).rejects.toMatchObject({ kind: 'RefreshMismatch' });
            await expect(auth.refresh(first.token, second.refresh_token)).resolves.toHaveProperty('token');
        });

        it('rejects any refresh before the first login', async () => {
            const user = await store.loadUser(1);
            const token = tokens.issue(toClaimsUser(user));

            await expect(auth.refresh(token, '')).rejects.toMatchObject({ kind: 'RefreshMismatch' });
        });

        it('rejects a refresh for a deleted user', async () => {
            const { token, refresh_token } = await auth.login('reader', 'password-1');
            await store.deleteUser(1);

            await expect(auth.refresh(token, refresh_token)).rejects.toMatchObject({ kind: 'RefreshMismatch' });
        });

        it('rejects an access token that cannot be decoded', async () => {
            const { refresh_token } = await auth.login('reader', 'password-1');

            await expect(auth.refresh('garbage', refresh_token)).rejects.toMatchObject({ kind: 'TokenInvalid' });
        });

        it('rejects an access token signed with another secret', async () => {
            const { refresh_token } = await auth.login('reader', 'password-1');
            const forger = new TokenService('other-secret', TTL_SECONDS, () => now);
            const forged = forger.issue(toClaimsUser(await store.loadUser(1)));

            await expect(auth.refresh(forged, refresh_token)).rejects.toMatchObject({ kind: 'TokenInvalid' });
        });

        it('surfaces storage outages as they are', async () => {
            const { token, refresh_token } = await auth.login('reader', 'password-1');
            store.available = false;

            await expect(auth.refresh(token, refresh_token)).rejects.toMatchObject({ kind: 'StoreUnavailable' });
        });
    });

    it('works with bcrypt hashing', async () => {
        const bcryptAuth = new AuthService(new MemoryStore(), createBcryptHasher(4), tokens);
        await bcryptAuth.register({ username: 'hashed', password: 'correct-horse', study_lang: 'en', display_lang: 'en' });

        const result = await bcryptAuth.login('hashed', 'correct-horse');
        expect(tokens.verify(result.token).username).toBe('hashed');
        await expect(bcryptAuth.login('hashed', 'wrong-horse')).rejects.toMatchObject({ kind: 'InvalidCredentials' });
    });
});

describe('generateRefreshToken', () => {
    it('returns a different opaque value every time', () => {
        const values = new Set(Array.from({ length: 50 }, () => generateRefreshToken()));

        expect(values.size).toBe(50);
        values.forEach(value => expect(value).toMatch(/^[0-9a-f-]{36}$/));
    });
});
