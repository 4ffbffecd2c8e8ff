import { User, UserFormat } from '../domain/models';
import { assertNever } from '../domain/formats';
import { ILogger } from '../domain/logger';

export interface IUserPresenter {
    formatForConsole(user: User): string;
    formatForJson(user: User): string;
    format(user: User, format: UserFormat): string;
}

export class UserPresenter implements IUserPresenter {
    constructor(private readonly logger: ILogger) { }

    formatForConsole(user: User): string {
        this.logger.info(`Formatting user ${user.name} (${user.id}) for console display...`);
        const status = user.isActive ? 'Active' : 'Inactive';
        return `User ID: ${user.id}\nName: ${user.name}\nEmail: ${user.email}\nStatus: ${status}`;
    }

    formatForJson(user: User): string {
        this.logger.info(`Formatting user ${user.name} (${user.id}) for JSON display...`);
        // Only the four record fields, in this order.
        const { id, name, email, isActive } = user;
        return JSON.stringify({ id, name, email, isActive }, null, 2);
    }

    format(user: User, format: UserFormat): string {
        switch (format) {
            case UserFormat.CONSOLE:
                return this.formatForConsole(user);
            case UserFormat.JSON:
                return this.formatForJson(user);
            default:
                return assertNever(format);
        }
    }
}
