/**
 * Centralized configuration for the FMI Open Data client.
 *
 * All environment-dependent values should be accessed through this module.
 * Values are read when a getter is called, never at import time.
 */

const DEFAULT_WFS_URL = 'https://opendata.fmi.fi/wfs';
const DEFAULT_META_URL = 'https://opendata.fmi.fi/meta';
const DEFAULT_TIMEOUT_SECONDS = 120;
const DEFAULT_MAX_RETRIES = 3;
// The service allows 600 requests per 5 minutes.
const DEFAULT_CHUNK_DELAY_MS = 1000;

function readEnv(name: string): string | undefined {
    if (typeof process === 'undefined') return undefined;
    const raw = process.env?.[name];
    const value = typeof raw === 'string' ? raw.trim() : '';
    return value ? value : undefined;
}

function readNonNegativeInt(name: string, fallback: number): number {
    const raw = readEnv(name);
    if (raw === undefined) return fallback;
    const n = Number(raw);
    return Number.isInteger(n) && n >= 0 ? n : fallback;
}

/**
 * Download (WFS) service endpoint.
 */
export function getWfsUrl(): string {
    return readEnv('FMI_OPENDATA_WFS_URL') ?? DEFAULT_WFS_URL;
}

/**
 * Metadata service endpoint (observable properties).
 */
export function getMetaUrl(): string {
    return readEnv('FMI_OPENDATA_META_URL') ?? DEFAULT_META_URL;
}

export function getRequestTimeoutMs(): number {
    const seconds = readNonNegativeInt('FMI_OPENDATA_TIMEOUT', DEFAULT_TIMEOUT_SECONDS);
    return (seconds > 0 ? seconds : DEFAULT_TIMEOUT_SECONDS) * 1000;
}

export function getMaxRetries(): number {
    return readNonNegativeInt('FMI_OPENDATA_MAX_RETRIES', DEFAULT_MAX_RETRIES);
}

export function getChunkDelayMs(): number {
    return readNonNegativeInt('FMI_OPENDATA_CHUNK_DELAY_MS', DEFAULT_CHUNK_DELAY_MS);
}

export function isDebugEnabled(): boolean {
    const raw = (readEnv('FMI_OPENDATA_DEBUG') ?? '').toLowerCase();
    return raw === '1' || raw === 'true' || raw === 'yes';
}

export function logDebug(message: string, data?: Record<string, unknown>): void {
    if (!isDebugEnabled()) return;
    if (data) {
        console.info(`[opendata] ${message}`, data);
    } else {
        console.info(`[opendata] ${message}`);
    }
}
