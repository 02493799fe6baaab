/**
 * Error types for hub-tags
 * @fileoverview Failures raised by the Hub client, the parser and the grouping core
 */

export type ErrorCode =
    | 'validation_error'
    | 'hub_request_failed'
    | 'hub_parse_failed'
    | 'invariant_violation';

/**
 * Base error for everything this tool raises on purpose
 */
export class HubTagsError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'HubTagsError';
        this.code = code;
    }
}

/**
 * Invalid user input (repository name, command-line option)
 */
export class ValidationError extends HubTagsError {
    constructor(message: string, options?: ErrorOptions) {
        super('validation_error', message, options);
        this.name = 'ValidationError';
    }
}

/**
 * Docker Hub request failure, with the HTTP status when one was received
 */
export class HubRequestError extends HubTagsError {
    readonly url: string;
    readonly statusCode?: number;

    constructor(message: string, url: string, options?: ErrorOptions & { statusCode?: number }) {
        super('hub_request_failed', message, options);
        this.name = 'HubRequestError';
        this.url = url;
        if (options?.statusCode !== undefined) {
            this.statusCode = options.statusCode;
        }
    }
}

/**
 * Response body that does not have the shape of a Hub tags page
 */
export class HubParseError extends HubTagsError {
    constructor(message: string, options?: ErrorOptions) {
        super('hub_parse_failed', message, options);
        this.name = 'HubParseError';
    }
}

/**
 * Internal contract broken, e.g. folding an image into a merged image with another key.
 * Not retryable.
 */
export class InvariantViolationError extends HubTagsError {
    readonly details: Record<string, unknown>;

    constructor(message: string, details: Record<string, unknown> = {}) {
        super('invariant_violation', message);
        this.name = 'InvariantViolationError';
        this.details = details;
    }
}

/**
 * Message of an unknown thrown value
 */
export function getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
