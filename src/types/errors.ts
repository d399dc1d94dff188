export type AutograderErrorCode = 'DOCUMENT_READ' | 'CONFIG' | 'USAGE';

export class AutograderError extends Error {
    readonly code: AutograderErrorCode;

    constructor(code: AutograderErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * Raised when a PDF cannot be opened, parsed or decoded. Always names the path.
 */
export class DocumentReadError extends AutograderError {
    readonly path: string;

    constructor(path: string, reason: string, cause?: unknown) {
        super('DOCUMENT_READ', `Failed to read PDF "${path}": ${reason}`, { cause });
        this.path = path;
    }
}

export class ConfigError extends AutograderError {
    constructor(message: string) {
        super('CONFIG', message);
    }
}

export class UsageError extends AutograderError {
    constructor(message: string) {
        super('USAGE', message);
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
