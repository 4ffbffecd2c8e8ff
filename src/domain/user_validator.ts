import { User } from './models';
import { ValidationError } from './errors';
import { ILogger } from './logger';

export interface IUserValidator {
    /**
     * @throws ValidationError on the first rule the user breaks.
     */
    validate(user: User): void;
    isValid(user: User): boolean;
}

/**
 * Two rules, checked in order: non-blank name, then an email holding both '@' and '.'.
 */
export class UserValidator implements IUserValidator {
    constructor(private readonly logger: ILogger) { }

    validate(user: User): void {
        this.logger.info(`Validating user ${user.name} (${user.id})...`);

        if (!user.name.trim()) {
            throw new ValidationError('Validation Error: User name cannot be blank.', 'name');
        }
        if (!user.email.includes('@') || !user.email.includes('.')) {
            throw new ValidationError(`Validation Error: Invalid email format for ${user.email}.`, 'email');
        }

        this.logger.info('Validation successful.');
    }

    isValid(user: User): boolean {
        try {
            this.validate(user);
            return true;
        } catch (error) {
            if (error instanceof ValidationError) {
                return false;
            }
            throw error;
        }
    }
}
