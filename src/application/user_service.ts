import { User } from '../domain/models';
import { IUserRepository } from '../domain/repository';
import { IUserValidator } from '../domain/user_validator';
import { NotFoundError } from '../domain/errors';
import { parseUserFormat } from '../domain/formats';
import { IUserPresenter } from '../presentation/user_presenter';
import { ILogger } from '../domain/logger';

/**
 * Sequences the user workflows. Validation, storage and formatting are
 * delegated; the service holds no user state of its own.
 */
export class UserService {
    constructor(
        private readonly repository: IUserRepository,
        private readonly validator: IUserValidator,
        private readonly presenter: IUserPresenter,
        private readonly logger: ILogger
    ) { }

    /**
     * New users start active.
     * @throws ValidationError before anything is stored.
     */
    createUser(id: string, name: string, email: string): User {
        const user: User = { id, name, email, isActive: true };

        this.validator.validate(user);

        const saved = this.repository.save(user);
        this.logger.info(`Created user ${saved.id}`);
        return saved;
    }

    /**
     * The lookup runs before the format check, so an unknown id wins over an unknown format.
     * @throws NotFoundError
     * @throws UnsupportedFormatError
     */
    getFormattedUserDetails(id: string, format: string = 'console'): string {
        const user = this.requireUser(id);
        return this.presenter.format(user, parseUserFormat(format));
    }

    /**
     * Idempotent: activating an active user re-saves it unchanged.
     * @throws NotFoundError
     */
    activateUser(id: string): User {
        const user = this.requireUser(id);
        const updated = this.repository.save({ ...user, isActive: true });
        this.logger.info(`Activated user ${updated.id}`);
        return updated;
    }

    private requireUser(id: string): User {
        const user = this.repository.getById(id);
        if (!user) {
            this.logger.warn(`User ${id} NOT FOUND`);
            throw new NotFoundError('User', id);
        }
        return user;
    }
}
