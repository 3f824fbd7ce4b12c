export class MailMergeError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

// Template references a field the record does not have
export class MissingFieldError extends MailMergeError {
    constructor(public readonly field: string) {
        super(`Missing field '${field}' in recipient record`);
    }
}

// Template cannot be parsed
export class RenderError extends MailMergeError {}

export class NoAddressFoundError extends MailMergeError {
    constructor(public readonly value: string) {
        super(`No email address found in '${value}'`);
    }
}

// Any failure coming back from the mail provider
export class ProviderCallError extends MailMergeError {
    constructor(public readonly operation: string, cause: unknown) {
        super(`${operation} failed: ${describeError(cause)}`, { cause });
    }
}

export class LabelingFailure extends MailMergeError {}

export class BackupEmailFailure extends MailMergeError {}

// Input file missing, unsupported or unreadable
export class FileReadError extends MailMergeError {}

export class ConfigError extends MailMergeError {}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
