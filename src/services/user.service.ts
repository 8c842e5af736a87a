import { ClaimsUser, SimpleUser, toSimpleUser } from '../models/database.models';
import { Store } from '../repositories/store.interface';
import { logger } from '../utils/logger';
import { PasswordHasher } from '../utils/password';
import { requireLanguage, requirePassword, requireUsername } from '../utils/validators';

export const USERS_PAGE_SIZE = 50;

export interface UpdateUserInput {
    username?: string;
    password?: string;
    study_lang?: string;
    display_lang?: string;
}

export class UserService {
    constructor(
        private readonly store: Store,
        private readonly hasher: PasswordHasher
    ) {}

    async getUsers(offset: number): Promise<SimpleUser[]> {
        return this.store.listUsers(USERS_PAGE_SIZE, offset);
    }

    // outstanding access tokens keep the old snapshot until the next refresh
    async updateUser(claims: ClaimsUser, changes: UpdateUserInput): Promise<SimpleUser> {
        const user = await this.store.loadUser(claims.id);

        if (changes.username !== undefined) {
            user.username = requireUsername(changes.username);
        }
        if (changes.password !== undefined) {
            user.pass = await this.hasher.hash(requirePassword(changes.password));
        }
        if (changes.study_lang !== undefined) {
            user.study_lang = requireLanguage(changes.study_lang);
        }
        if (changes.display_lang !== undefined) {
            user.display_lang = requireLanguage(changes.display_lang);
        }

        await this.store.saveUser(user);
        logger.info('User updated', { userId: user.id, fields: Object.keys(changes) });
        return toSimpleUser(user);
    }

    async deleteUser(claims: ClaimsUser): Promise<void> {
        await this.store.deleteUser(claims.id);
        logger.info('User deleted', { userId: claims.id });
    }
}
