/**
 * FMI Open Data — Main Entry Point
 *
 * Re-exports all public APIs.
 */

// Core types and errors
export * from './types';
export * from './errors';

// Configuration
export { getWfsUrl, getMetaUrl, getRequestTimeoutMs, getMaxRetries, getChunkDelayMs } from './config';
export { DEFAULT_STATIONS, DEFAULT_RESOLUTION_MINUTES, DEFAULT_WINDOW_HOURS } from './defaults';

// Transport
export * from './transport';

// Query building
export { normalizeQuery, encodeQuery } from './query/normalize';
export type { QueryInput, QueryConstraints } from './query/normalize';
export { ROUTES, resolveRoute, buildRequest, dispatch } from './query/dispatch';
export type { QueryRoute } from './query/dispatch';

// Response decoding
export { decodeTupleBlock, MISSING_VALUE_TOKENS } from './decode/tuples';
export type { Separators, TupleBlock } from './decode/tuples';
export { decodeMultipointCoverage } from './decode/multipoint';
export { decodeSimpleFeatures } from './decode/simple';

// Data queries
export { fetchTimeSeries } from './fetch/stored-query';
export type { TimeSeriesOptions } from './fetch/stored-query';
export * from './fetch/weather';
export * from './fetch/radiation';
export * from './fetch/airquality';
export * from './fetch/capabilities';

// Metadata catalogs
export * from './catalog/stations';
export * from './catalog/stored-queries';
export * from './catalog/observable-properties';
export type { SearchPattern } from './catalog/pattern';
