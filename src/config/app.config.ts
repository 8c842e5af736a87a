import dotenv from 'dotenv';

dotenv.config();

export interface AppConfig {
    port: number;
    databaseUrl?: string;
    jwtSecret: string;
    accessTokenTtlSeconds: number;
    articlePageSize: number;
    bcryptRounds: number;
    corsOrigin: string;
    isProduction: boolean;
}

const DEV_JWT_SECRET = 'dev-secret';

function readInt(
    env: NodeJS.ProcessEnv,
    name: string,
    fallback: number,
    range: { min: number; max: number }
): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;

    const value = Number(raw);
    if (!Number.isInteger(value) || value < range.min || value > range.max) {
        throw new Error(`${name} must be an integer between ${range.min} and ${range.max}, got "${raw}"`);
    }
    return value;
}

// read and validate settings once at start-up; bad values stop the process early
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const isProduction = env.NODE_ENV === 'production';
    const jwtSecret = env.JWT_SECRET || (isProduction ? undefined : DEV_JWT_SECRET);

    if (!jwtSecret) {
        throw new Error('JWT_SECRET is required in production');
    }

    return {
        port: readInt(env, 'PORT', 3000, { min: 1, max: 65535 }),
        databaseUrl: env.DATABASE_URL || undefined,
        jwtSecret,
        accessTokenTtlSeconds: readInt(env, 'ACCESS_TOKEN_TTL_SECONDS', 3600, { min: 1, max: 60 * 60 * 24 * 7 }),
        articlePageSize: readInt(env, 'ARTICLE_PAGE_SIZE', 250, { min: 1, max: 100000 }),
        bcryptRounds: readInt(env, 'BCRYPT_ROUNDS', 10, { min: 4, max: 15 }),
        corsOrigin: env.CORS_ORIGIN || '*',
        isProduction,
    };
}
