import { timingSafeEqual } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { AppError, isAppError } from '../errors/app-error';
import { SimpleUser, toClaimsUser, toSimpleUser, User } from '../models/database.models';
import { Store } from '../repositories/store.interface';
import { logger } from '../utils/logger';
import { PasswordHasher } from '../utils/password';
import { requireLanguage, requirePassword, requireUsername } from '../utils/validators';
import { TokenService } from './token.service';

/*
Auth state per user:
anonymous -> login -> (access, refresh) -> access expires -> refresh -> (new access, same refresh)
and any later login replaces the stored refresh token, which kills every older one.
*/

export interface RegisterInput {
    username: string;
    password: string;
    study_lang: string;
    display_lang: string;
}

export interface LoginResult {
    token: string;
    refresh_token: string;
}

export function generateRefreshToken(): string {
    return uuidv4();
}

function sameSecret(expected: string, given: string): boolean {
    const a = Buffer.from(expected);
    const b = Buffer.from(given);
    return a.length === b.length && timingSafeEqual(a, b);
}

export class AuthService {
    private dummyHash: Promise<string> | null = null;

    constructor(
        private readonly store: Store,
        private readonly hasher: PasswordHasher,
        private readonly tokens: TokenService,
        private readonly newRefreshToken: () => string = generateRefreshToken
    ) {}

    // compared against when the username does not exist, so both failures cost the same
    private getDummyHash(): Promise<string> {
        if (!this.dummyHash) {
            this.dummyHash = this.hasher.hash('not-a-real-password');
        }
        return this.dummyHash;
    }

    async register(input: RegisterInput): Promise<SimpleUser> {
        const username = requireUsername(input.username);
        const password = requirePassword(input.password);
        const studyLang = requireLanguage(input.study_lang);
        const displayLang = requireLanguage(input.display_lang);

        const user = await this.store.createUser({
            username,
            pass: await this.hasher.hash(password),
            study_lang: studyLang,
            display_lang: displayLang,
            // empty until the first login, so nothing can be refreshed before it
            refresh_token: '',
        });

        logger.info('User registered', { userId: user.id });
        return toSimpleUser(user);
    }

    async login(username: string, password: string): Promise<LoginResult> {
        const user = await this.store.findUserByUsername(username);

        if (!user) {
            await this.hasher.verify(password, await this.getDummyHash());
            throw new AppError('InvalidCredentials', 'Invalid username or password');
        }

        const matches = await this.hasher.verify(password, user.pass);
        if (!matches) {
            throw new AppError('InvalidCredentials', 'Invalid username or password');
        }

        const refreshToken = this.newRefreshToken();
        await this.store.saveUser({ ...user, refresh_token: refreshToken });

        logger.info('User logged in', { userId: user.id });
        return {
            token: this.tokens.issue(toClaimsUser(user)),
            refresh_token: refreshToken,
        };
    }

    // the old token may be expired but must be genuine; the refresh token itself is kept
    async refresh(token: string, refreshToken: string): Promise<{ token: string }> {
        const claims = this.tokens.decodeIgnoringExpiry(token);

        let user: User;
        try {
            user = await this.store.loadUser(claims.user.id);
        } catch (error) {
            if (isAppError(error) && error.kind === 'NotFound') {
                throw new AppError('RefreshMismatch', 'Refresh token is not valid');
            }
            throw error;
        }

        if (user.refresh_token.length === 0 || !sameSecret(user.refresh_token, refreshToken)) {
            throw new AppError('RefreshMismatch', 'Refresh token is not valid');
        }

        // claims come from the stored user, not from the old token
        logger.info('Access token refreshed', { userId: user.id });
        return { token: this.tokens.issue(toClaimsUser(user)) };
    }
}
