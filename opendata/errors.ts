/**
 * FMI Open Data — Error Taxonomy
 *
 * Every failure surfaced by the client is one of these classes. Callers can
 * branch with `instanceof` or on the stable `code` string.
 */

export type OpenDataErrorCode =
    | 'INVALID_QUERY'
    | 'UNSUPPORTED_QUERY'
    | 'TRANSPORT_ERROR'
    | 'EMPTY_RESPONSE'
    | 'MALFORMED_RESPONSE'
    | 'INVALID_PATTERN';

export abstract class OpenDataError extends Error {
    abstract readonly code: OpenDataErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Caller-supplied query parameters are structurally invalid. */
export class InvalidQueryError extends OpenDataError {
    readonly code = 'INVALID_QUERY';
}

/** No stored query exists for the requested domain/mode combination. */
export class UnsupportedQueryError extends OpenDataError {
    readonly code = 'UNSUPPORTED_QUERY';
}

export interface TransportErrorDetails {
    status?: number;
    statusText?: string;
    body?: string;
    cause?: unknown;
}

/**
 * The transport failed to produce a document: network failure, timeout,
 * non-2xx status, or a service exception report.
 */
export class TransportError extends OpenDataError {
    readonly code = 'TRANSPORT_ERROR';
    readonly status?: number;
    readonly statusText?: string;
    readonly body?: string;

    constructor(message: string, details: TransportErrorDetails = {}) {
        super(message, { cause: details.cause });
        this.status = details.status;
        this.statusText = details.statusText;
        this.body = details.body;
    }
}

/** Well-formed response without data records. Only raised in strict mode. */
export class EmptyResponseError extends OpenDataError {
    readonly code = 'EMPTY_RESPONSE';
}

/** The response violates the expected document structure. */
export class MalformedResponseError extends OpenDataError {
    readonly code = 'MALFORMED_RESPONSE';
}

/** A catalog search expression is not a valid regular expression. */
export class InvalidPatternError extends OpenDataError {
    readonly code = 'INVALID_PATTERN';
}
