import jwt, { JwtPayload, TokenExpiredError } from 'jsonwebtoken';
import { AppError } from '../errors/app-error';
import { ClaimsUser, isLanguageCode, TokenClaims } from '../models/database.models';
import { isRecord } from '../utils/validators';

/*
Access tokens are HS256 JWTs carrying a snapshot of the user taken at issuance.
Verification never reads storage: whatever the token says is what the request sees
until the next refresh or login.
*/

export interface TokenVerifier {
    verify(token: string): ClaimsUser;
}

function parseClaimsUser(value: unknown): ClaimsUser | null {
    if (!isRecord(value)) return null;

    const { id, username, created_on, study_lang, display_lang } = value;
    if (
        typeof id !== 'number' || !Number.isInteger(id) ||
        typeof username !== 'string' ||
        typeof created_on !== 'string' ||
        !isLanguageCode(study_lang) ||
        !isLanguageCode(display_lang)
    ) {
        return null;
    }

    return { id, username, created_on, study_lang, display_lang };
}

function parseTokenClaims(payload: string | JwtPayload): TokenClaims | null {
    if (typeof payload === 'string') return null;

    const user = parseClaimsUser(payload.user);
    if (!user || typeof payload.exp !== 'number' || typeof payload.iat !== 'number') {
        return null;
    }

    return { user, exp: payload.exp, iat: payload.iat };
}

export class TokenService implements TokenVerifier {
    constructor(
        private readonly secret: string,
        private readonly ttlSeconds: number,
        private readonly clock: () => number = Date.now
    ) {}

    private nowSeconds(): number {
        return Math.floor(this.clock() / 1000);
    }

    issue(user: ClaimsUser): string {
        const iat = this.nowSeconds();
        const claims: TokenClaims = { user, iat, exp: iat + this.ttlSeconds };
        return jwt.sign(claims, this.secret, { algorithm: 'HS256' });
    }

    verify(token: string): ClaimsUser {
        return this.decode(token, false).user;
    }

    // signature is still checked; only the expiry is not
    decodeIgnoringExpiry(token: string): TokenClaims {
        return this.decode(token, true);
    }

    private decode(token: string, ignoreExpiration: boolean): TokenClaims {
        let payload: string | JwtPayload;
        try {
            payload = jwt.verify(token, this.secret, {
                algorithms: ['HS256'],
                ignoreExpiration,
                clockTimestamp: this.nowSeconds(),
            });
        } catch (error) {
            if (error instanceof TokenExpiredError) {
                throw new AppError('TokenExpired', 'Access token has expired');
            }
            throw new AppError('TokenInvalid', 'Access token is invalid');
        }

        const claims = parseTokenClaims(payload);
        if (!claims) {
            throw new AppError('TokenInvalid', 'Access token is invalid');
        }
        return claims;
    }
}
