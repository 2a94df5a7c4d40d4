/**
 * FMI Open Data — Core Type Definitions
 *
 * Request and record types shared by the query builder, the response
 * decoders and the metadata catalogs.
 */

// =============================================================================
// Routing
// =============================================================================

export type Domain = 'weather' | 'radiation' | 'airquality';

export type Mode = 'observation' | 'forecast';

export const DOMAINS: readonly Domain[] = ['weather', 'radiation', 'airquality'];
export const MODES: readonly Mode[] = ['observation', 'forecast'];

/**
 * Response encodings of the stored queries.
 * - `multipointcoverage`: one tuple-encoded data block per member
 * - `simple`: one feature per (time, parameter) pair
 */
export type OutputFormat = 'simple' | 'multipointcoverage' | 'timevaluepair' | 'grid' | 'other';

/**
 * How the members of a multipoint coverage are located:
 * observation stations by fmisid, forecast grid points by coordinate.
 */
export type LocationKind = 'fmisid' | 'point';

// =============================================================================
// Queries
// =============================================================================

/**
 * A validated, fully resolved time-series query.
 * Invariant: startTime <= endTime, resolutionMinutes > 0.
 */
export interface NormalizedQuery {
    fmisid: number;
    startTime: Date;
    endTime: Date;
    resolutionMinutes: number;
    /** Ordered, de-duplicated. Empty means "service default set". */
    parameters: string[];
}

/** Stored-query parameters in the service's encoding. */
export type QueryParams = Record<string, string>;

export interface RequestDescriptor {
    storedQueryId: string;
    params: QueryParams;
}

// =============================================================================
// Records
// =============================================================================

/**
 * One decoded value. `value` is null when the service reported the
 * value as missing (`NaN`).
 */
export interface Observation {
    time: Date;
    parameter: string;
    value: number | null;
}

export interface GeoPoint {
    lat: number;
    lon: number;
    /** Coordinate reference system of the point (e.g. EPSG:4258 URI) */
    srsName?: string;
}

/**
 * Observation as it appears in a feature response, still tied to the
 * location it was reported for. Observation routes resolve the location
 * to a station id; forecast routes keep the model grid point.
 */
export interface LocatedObservation extends Observation {
    point?: GeoPoint;
    fmisid?: number;
}
