import { ILogger } from '../domain/logger';

/**
 * Writes `[Tag] message` lines to the console.
 */
export class ConsoleLogger implements ILogger {
    constructor(private readonly tag: string) { }

    info(message: string): void {
        console.log(this.prefix(message));
    }

    warn(message: string): void {
        console.warn(this.prefix(message));
    }

    error(message: string): void {
        console.error(this.prefix(message));
    }

    private prefix(message: string): string {
        return `[${this.tag}] ${message}`;
    }
}

export class SilentLogger implements ILogger {
    info(_message: string): void { }
    warn(_message: string): void { }
    error(_message: string): void { }
}

export function createLogger(tag: string, trace: boolean): ILogger {
    return trace ? new ConsoleLogger(tag) : new SilentLogger();
}
