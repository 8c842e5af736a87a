import { AppError } from '../errors/app-error';
import { isLanguageCode, isWordStatus, LanguageCode, WordStatus } from '../models/database.models';

const USERNAME_PATTERN = /^[A-Za-z0-9_.-]{3,32}$/;
export const MIN_PASSWORD_LENGTH = 8;
// largest value a postgres INTEGER column holds
export const MAX_ROW_ID = 2147483647;

export function requireLanguage(value: unknown): LanguageCode {
    if (!isLanguageCode(value)) {
        throw new AppError('UnsupportedLanguage', `Unsupported language: ${String(value)}`);
    }
    return value;
}

export function requireWordStatus(value: unknown): WordStatus {
    if (!isWordStatus(value)) {
        throw new AppError('InvalidInput', `Invalid word status: ${String(value)}`);
    }
    return value;
}

export function requireUsername(value: string): string {
    if (!USERNAME_PATTERN.test(value)) {
        throw new AppError('InvalidInput', 'Username must be 3-32 letters, digits, "_", "." or "-"');
    }
    return value;
}

export function requirePassword(value: string): string {
    if (value.length < MIN_PASSWORD_LENGTH) {
        throw new AppError('InvalidInput', `Password must be at least ${MIN_PASSWORD_LENGTH} characters`);
    }
    return value;
}

export function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

// query-string integer with a default and a clamp; garbage falls back to the default
export function parseBoundedInt(
    raw: unknown,
    fallback: number,
    range: { min: number; max: number }
): number {
    const parsed = typeof raw === 'string' ? parseInt(raw, 10) : NaN;
    if (isNaN(parsed)) return fallback;
    return Math.min(Math.max(parsed, range.min), range.max);
}

// path/query ids: plain digits within the INTEGER range, anything else is null
export function parseRowId(raw: unknown): number | null {
    if (typeof raw !== 'string' || !/^\d+$/.test(raw)) return null;
    const id = Number(raw);
    return id >= 1 && id <= MAX_ROW_ID ? id : null;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// request bodies are untrusted; anything that is not a JSON object reads as empty
export function readBody(body: unknown): Record<string, unknown> {
    return isRecord(body) ? body : {};
}
