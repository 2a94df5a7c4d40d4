/**
 * FMI Open Data — Transport
 *
 * The only place that talks to the network. Query construction and decoding
 * treat a transport as a function from (endpoint, parameters) to a document;
 * timeouts and retries live here and nowhere else.
 */

import { getMaxRetries, getRequestTimeoutMs } from './config';
import { TransportError } from './errors';
import type { QueryParams } from './types';

// =============================================================================
// Transport Interface
// =============================================================================

export interface Transport {
    /** Fetch a document. Rejects with TransportError. */
    fetch(endpoint: string, params: QueryParams): Promise<string>;
}

// =============================================================================
// HTTP Transport
// =============================================================================

export interface HttpTransportOptions {
    timeoutMs?: number;
    /** Retries after a network failure. HTTP status errors are never retried. */
    maxRetries?: number;
    fetchImpl?: typeof fetch;
}

function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.name === 'AbortError' ? 'request timed out' : error.message;
    }
    return String(error);
}

export class HttpTransport implements Transport {
    private readonly timeoutMs: number;
    private readonly maxRetries: number;
    private readonly fetchImpl: typeof fetch;

    constructor(options: HttpTransportOptions = {}) {
        this.timeoutMs = options.timeoutMs ?? getRequestTimeoutMs();
        this.maxRetries = options.maxRetries ?? getMaxRetries();
        this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    }

    async fetch(endpoint: string, params: QueryParams): Promise<string> {
        const url = new URL(endpoint);
        for (const [key, value] of Object.entries(params)) {
            url.searchParams.set(key, value);
        }

        for (let attempt = 0; ; attempt++) {
            let response: Response;
            let body: string;
            try {
                response = await this.fetchWithTimeout(url.toString());
                body = await response.text();
            } catch (error) {
                if (attempt < this.maxRetries) {
                    console.warn(
                        `[opendata] request failed (${describeError(error)}), retrying ${attempt + 1}/${this.maxRetries}`
                    );
                    continue;
                }
                throw new TransportError(
                    `Request to ${url.origin}${url.pathname} failed: ${describeError(error)}`,
                    { cause: error }
                );
            }

            if (!response.ok) {
                const contentType = response.headers.get('content-type') ?? '';
                throw new TransportError(`HTTP ${response.status}: ${response.statusText}`, {
                    status: response.status,
                    statusText: response.statusText,
                    body: contentType.includes('xml') ? body : undefined
                });
            }
            return body;
        }
    }

    private async fetchWithTimeout(url: string): Promise<Response> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

        try {
            return await this.fetchImpl(url, { signal: controller.signal });
        } finally {
            clearTimeout(timeoutId);
        }
    }
}

/**
 * Transport used when the caller does not supply one.
 */
export function defaultTransport(): Transport {
    return new HttpTransport();
}

// =============================================================================
// In-Memory Transport (for testing)
// =============================================================================

export interface TransportCall {
    endpoint: string;
    params: QueryParams;
}

export type TransportResponder = (call: TransportCall) => string | Promise<string>;

/**
 * Serves canned documents without touching the network.
 *
 * A response is registered under a key; a call is answered by the first
 * registration whose key equals one of the call's parameter values
 * (a stored query id, a request name such as `describeStoredQueries`,
 * or an observable property kind).
 */
export class MemoryTransport implements Transport {
    readonly calls: TransportCall[] = [];
    private readonly routes: { key: string; response: string | TransportResponder }[] = [];

    respond(key: string, response: string | TransportResponder): this {
        this.routes.push({ key, response });
        return this;
    }

    async fetch(endpoint: string, params: QueryParams): Promise<string> {
        const call: TransportCall = { endpoint, params: { ...params } };
        this.calls.push(call);

        const values = Object.values(params);
        const route = this.routes.find((r) => values.includes(r.key));
        if (!route) {
            throw new TransportError(`No response registered for ${JSON.stringify(params)}`, {
                status: 404,
                statusText: 'Not Found'
            });
        }
        return typeof route.response === 'string' ? route.response : route.response(call);
    }

    /** Clear recorded calls */
    reset(): void {
        this.calls.length = 0;
    }
}
