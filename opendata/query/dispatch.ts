/**
 * FMI Open Data — Stored-Query Dispatcher
 *
 * Fixed routing table from (domain, mode) to a stored query, plus request
 * assembly. The table is checked for completeness at compile time; callers
 * that arrive with untyped strings go through resolveRoute().
 */

import { getWfsUrl } from '../config';
import { UnsupportedQueryError } from '../errors';
import type { Transport } from '../transport';
import { DOMAINS, MODES } from '../types';
import type { Domain, LocationKind, Mode, NormalizedQuery, QueryParams, RequestDescriptor } from '../types';
import { encodeQuery } from './normalize';

// =============================================================================
// Routing Table
// =============================================================================

export type QueryRoute =
    | {
          storedQueryId: string;
          format: 'multipointcoverage';
          locations: LocationKind;
          minResolutionMinutes: number;
      }
    | {
          storedQueryId: string;
          format: 'simple';
          minResolutionMinutes: number;
      };

// Weather and radiation forecasts come from the same MEPS model run; the
// parameter list decides which properties come back.
const MEPS_POINT_FORECAST: QueryRoute = {
    storedQueryId: 'fmi::forecast::meps::surface::point::multipointcoverage',
    format: 'multipointcoverage',
    locations: 'point',
    minResolutionMinutes: 1
};

export const ROUTES = {
    weather: {
        observation: {
            storedQueryId: 'fmi::observations::weather::multipointcoverage',
            format: 'multipointcoverage',
            locations: 'fmisid',
            minResolutionMinutes: 1
        },
        forecast: MEPS_POINT_FORECAST
    },
    radiation: {
        observation: {
            storedQueryId: 'fmi::observations::radiation::simple',
            format: 'simple',
            minResolutionMinutes: 1
        },
        forecast: MEPS_POINT_FORECAST
    },
    airquality: {
        observation: {
            storedQueryId: 'urban::observations::airquality::hourly::simple',
            format: 'simple',
            minResolutionMinutes: 60
        },
        forecast: {
            storedQueryId: 'fmi::forecast::silam::airquality::surface::point::simple',
            format: 'simple',
            minResolutionMinutes: 1
        }
    }
} as const satisfies Record<Domain, Record<Mode, QueryRoute>>;

function isDomain(value: string): value is Domain {
    const known: readonly string[] = DOMAINS;
    return known.includes(value);
}

function isMode(value: string): value is Mode {
    const known: readonly string[] = MODES;
    return known.includes(value);
}

export function resolveRoute(domain: string, mode: string): QueryRoute {
    if (!isDomain(domain) || !isMode(mode)) {
        throw new UnsupportedQueryError(`No stored query for ${domain} ${mode}`);
    }
    const route: QueryRoute = ROUTES[domain][mode];
    return route;
}

// =============================================================================
// Request Assembly
// =============================================================================

const WFS_PARAMS: QueryParams = { service: 'WFS', version: '2.0.0' };

/**
 * Base parameters of a getFeature request for any stored query.
 */
export function featureRequest(storedQueryId: string, params: QueryParams = {}): RequestDescriptor {
    return {
        storedQueryId,
        params: {
            ...WFS_PARAMS,
            request: 'getFeature',
            storedquery_id: storedQueryId,
            ...params
        }
    };
}

/**
 * Build the full request for a normalized time-series query.
 */
export function buildRequest(route: QueryRoute, query: NormalizedQuery): RequestDescriptor {
    return featureRequest(route.storedQueryId, encodeQuery(query));
}

/**
 * Parameters for WFS operations other than getFeature
 * (getCapabilities, describeStoredQueries).
 */
export function wfsOperation(request: string): QueryParams {
    return { ...WFS_PARAMS, request };
}

/**
 * Issue exactly one request. Retries are the transport's business.
 */
export function dispatch(
    request: RequestDescriptor,
    transport: Transport,
    endpoint: string = getWfsUrl()
): Promise<string> {
    return transport.fetch(endpoint, request.params);
}
