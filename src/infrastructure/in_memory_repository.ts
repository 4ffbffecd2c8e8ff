import { User } from '../domain/models';
import { IUserRepository } from '../domain/repository';
import { ILogger } from '../domain/logger';

/**
 * Process-local store. Each instance owns its own map; values go in and
 * come out as copies so callers cannot reach the stored record.
 */
export class InMemoryUserRepository implements IUserRepository {
    private users: Map<string, User> = new Map();

    constructor(private readonly logger: ILogger) { }

    save(user: User): User {
        this.logger.info(`Saving user ${user.name} (${user.id}) to in-memory store...`);
        this.users.set(user.id, { ...user });
        return { ...user };
    }

    getById(id: string): User | undefined {
        this.logger.info(`Getting user by ID: ${id} from in-memory store.`);
        const user = this.users.get(id);
        return user ? { ...user } : undefined;
    }
}
