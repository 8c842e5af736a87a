import bcrypt from 'bcryptjs';

export interface PasswordHasher {
    hash(plain: string): Promise<string>;
    verify(plain: string, hash: string): Promise<boolean>;
}

export function createBcryptHasher(rounds: number): PasswordHasher {
    return {
        hash: (plain) => bcrypt.hash(plain, rounds),
        verify: (plain, hash) => bcrypt.compare(plain, hash),
    };
}
