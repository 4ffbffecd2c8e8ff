import { User } from './models';

/**
 * Repository interface for user persistence.
 */
export interface IUserRepository {
    /**
     * Inserts or overwrites the user keyed by its id (last write wins).
     * Returns the stored value.
     */
    save(user: User): User;

    /**
     * Returns the stored user, or undefined on a miss. Never throws for an unknown id.
     */
    getById(id: string): User | undefined;
}
