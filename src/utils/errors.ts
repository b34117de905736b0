import type { ConfigIssue } from '../config/env-validator.js';

/** A required setting is missing or malformed. Fatal at startup. */
export class ConfigError extends Error {
    readonly issues: ConfigIssue[];

    constructor(issues: ConfigIssue[]) {
        super(`Configuration invalid: ${issues.map((issue) => issue.message).join(' | ')}`);
        this.name = 'ConfigError';
        this.issues = issues;
    }
}

/** Authentication or resource fetch against the Pi-hole API failed. */
export class ApiError extends Error {
    readonly status: number | null;
    readonly endpoint: string | null;

    constructor(message: string, options: { status?: number; endpoint?: string; cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = 'ApiError';
        this.status = options.status ?? null;
        this.endpoint = options.endpoint ?? null;
    }
}

/** The follow-up command could not be launched. */
export class ActionError extends Error {
    readonly command: string;

    constructor(command: string, cause: unknown) {
        super(`Failed to run follow-up command: ${describeError(cause)}`, { cause });
        this.name = 'ActionError';
        this.command = command;
    }
}

/** A coalesced callback threw or rejected. */
export class CallbackError extends Error {
    constructor(cause: unknown) {
        super(`Debounced callback failed: ${describeError(cause)}`, { cause });
        this.name = 'CallbackError';
    }
}

export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
