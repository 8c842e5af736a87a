/*
Every failure the core can produce has exactly one kind, and every kind maps to exactly one
HTTP status. Controllers never invent statuses of their own for these.
*/

export type ErrorKind =
    | 'UnsupportedLanguage'
    | 'SegmentationFailed'
    | 'EmptyContent'
    | 'InvalidInput'
    | 'InvalidCredentials'
    | 'TokenInvalid'
    | 'TokenExpired'
    | 'RefreshMismatch'
    | 'UsernameTaken'
    | 'NotFound'
    | 'StoreUnavailable';

const STATUS_BY_KIND: Record<ErrorKind, number> = {
    UnsupportedLanguage: 400,
    EmptyContent: 400,
    InvalidInput: 400,
    InvalidCredentials: 401,
    TokenInvalid: 401,
    TokenExpired: 401,
    RefreshMismatch: 401,
    NotFound: 404,
    UsernameTaken: 409,
    SegmentationFailed: 422,
    StoreUnavailable: 503,
};

export class AppError extends Error {
    readonly kind: ErrorKind;
    readonly status: number;

    constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'AppError';
        this.kind = kind;
        this.status = STATUS_BY_KIND[kind];
    }
}

export function isAppError(error: unknown): error is AppError {
    return error instanceof AppError;
}
