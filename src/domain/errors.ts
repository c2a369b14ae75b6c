export class IntakeError extends Error {
    code: string;

    constructor(message: string, code: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'IntakeError';
        this.code = code;
    }
}

/** Bad user input. Always recovered by re-prompting the same state. */
export class ValidationError extends IntakeError {
    constructor(message: string, readonly reason: string = 'invalid') {
        super(message, 'VALIDATION');
        this.name = 'ValidationError';
    }
}

export class StoreUnavailableError extends IntakeError {
    constructor(message: string, cause?: unknown) {
        super(message, 'STORE_UNAVAILABLE', { cause });
        this.name = 'StoreUnavailableError';
    }
}

/** Raised by the repository when an assigned code collides with an existing one. */
export class DuplicateCodeError extends IntakeError {
    constructor(readonly assignedCode: string) {
        super(`Assigned code ${assignedCode} already exists`, 'DUPLICATE_CODE');
        this.name = 'DuplicateCodeError';
    }
}

export class UnauthorizedError extends IntakeError {
    constructor(readonly identity: string) {
        super('Action not allowed', 'UNAUTHORIZED');
        this.name = 'UnauthorizedError';
    }
}

export class ConfigError extends IntakeError {
    constructor(readonly missing: string[], message?: string) {
        super(message ?? `Missing required configuration: ${missing.join(', ')}`, 'CONFIG');
        this.name = 'ConfigError';
    }
}
