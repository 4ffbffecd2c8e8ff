export type ErrorCode =
    | 'VALIDATION_FAILED'
    | 'NOT_FOUND'
    | 'UNSUPPORTED_FORMAT'
    | 'INVALID_CONFIG';

export class DomainError extends Error {
    constructor(message: string, public readonly code: ErrorCode) {
        super(message);
        this.name = 'DomainError';
    }
}

export type ValidatedField = 'name' | 'email';

export class ValidationError extends DomainError {
    constructor(message: string, public readonly field: ValidatedField) {
        super(message, 'VALIDATION_FAILED');
        this.name = 'ValidationError';
    }
}

export class NotFoundError extends DomainError {
    constructor(public readonly entity: string, public readonly id: string) {
        super(`${entity} with ID ${id} not found.`, 'NOT_FOUND');
        this.name = 'NotFoundError';
    }
}

export class UnsupportedFormatError extends DomainError {
    constructor(public readonly format: string) {
        super(`Unsupported format: ${format}`, 'UNSUPPORTED_FORMAT');
        this.name = 'UnsupportedFormatError';
    }
}

export class ConfigError extends DomainError {
    constructor(message: string, public readonly key: string) {
        super(message, 'INVALID_CONFIG');
        this.name = 'ConfigError';
    }
}

/**
 * Extracts a printable message from anything thrown.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
