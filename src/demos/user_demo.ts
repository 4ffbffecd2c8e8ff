import { BadUser } from '../monolith/bad_user';
import { UserService } from '../application/user_service';
import { UserValidator } from '../domain/user_validator';
import { describeError } from '../domain/errors';
import { InMemoryUserRepository } from '../infrastructure/in_memory_repository';
import { createLogger } from '../infrastructure/logger';
import { UserPresenter } from '../presentation/user_presenter';

export function runBadUserExample(): void {
    console.log('--- Bad User Example ---');
    const badUser = new BadUser('u123', 'Alice Smith', 'alice@example.com');

    if (badUser.isValid()) {
        badUser.saveToDatabase();
    } else {
        console.log('User is invalid, cannot save.');
    }

    console.log(`\nDisplaying user info:\n${badUser.formatForDisplay()}`);
}

export function createUserService(trace: boolean): UserService {
    return new UserService(
        new InMemoryUserRepository(createLogger('UserRepository', trace)),
        new UserValidator(createLogger('UserValidator', trace)),
        new UserPresenter(createLogger('UserPresenter', trace)),
        createLogger('UserService', trace)
    );
}

export function runGoodUserExample(trace: boolean): void {
    console.log('\n--- Good User Example ---');
    const userService = createUserService(trace);

    try {
        const alice = userService.createUser('u123', 'Alice Wonderland', 'alice@example.com');
        console.log(`Created: ${alice.name}`);

        const bob = userService.createUser('u124', 'Bob The Builder', 'bob@example.net');
        console.log(`Created: ${bob.name}`);

        console.log(`\nFormatted for console:\n${userService.getFormattedUserDetails('u123')}`);
        console.log(`\nFormatted for JSON:\n${userService.getFormattedUserDetails('u124', 'json')}`);

        try {
            userService.createUser('u125', '', 'invalid');
        } catch (error) {
            console.log(`\nError creating user: ${describeError(error)}`);
        }

        const updatedBob = userService.activateUser('u124');
        console.log(`\nUpdated Bob: ${updatedBob.name} (Active: ${updatedBob.isActive})`);
    } catch (error) {
        console.log(`An unexpected error occurred: ${describeError(error)}`);
    }
}
