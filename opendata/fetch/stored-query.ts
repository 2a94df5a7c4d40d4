/**
 * FMI Open Data — Time-Series Fetching
 *
 * Shared path of every public query function:
 * normalize → route → (chunk) → dispatch → decode.
 * All validation happens before the first request is issued.
 */

import { getChunkDelayMs, logDebug } from '../config';
import { DEFAULT_STATIONS } from '../defaults';
import { decodeMultipointCoverage } from '../decode/multipoint';
import { decodeSimpleFeatures } from '../decode/simple';
import { EmptyResponseError } from '../errors';
import { buildRequest, dispatch, resolveRoute, type QueryRoute } from '../query/dispatch';
import { normalizeQuery } from '../query/normalize';
import { expectedSteps, formatServiceTime, sleep, splitTimeRange } from '../time';
import { defaultTransport, type Transport } from '../transport';
import type { Domain, LocatedObservation, Mode, Observation } from '../types';

export interface TimeSeriesOptions {
    /** Station id; each domain has its own default station */
    fmisid?: number;
    startTime?: Date;
    endTime?: Date;
    /** Timestep in whole minutes (default: 60) */
    resolutionMinutes?: number;
    /** Omit for the service default set */
    parameters?: readonly string[];
    /** Throw EmptyResponseError instead of returning an empty list */
    strict?: boolean;
    transport?: Transport;
    /**
     * For testing/determinism, override clock.
     * Default time windows are resolved against this instant.
     */
    now?: Date;
    /** Pause between chunked requests */
    chunkDelayMs?: number;
}

/**
 * Decode a feature response according to the route's output format.
 */
export function decodeFeatures(route: QueryRoute, xml: string): LocatedObservation[] {
    return route.format === 'simple'
        ? decodeSimpleFeatures(xml)
        : decodeMultipointCoverage(xml, route.locations);
}

function toObservation({ time, parameter, value }: LocatedObservation): Observation {
    return { time, parameter, value };
}

function warnIfIncomplete(observations: Observation[], start: Date, end: Date, resolutionMinutes: number): void {
    const expected = expectedSteps(start, end, resolutionMinutes);
    const received = new Set(observations.map((o) => o.time.getTime())).size;
    if (received < expected) {
        console.warn(`[opendata] queried for values for ${expected} timestamps but got ${received}`);
    }
}

/**
 * Fetch one domain/mode time series. Long ranges are split into chunks of
 * at most 168 timesteps; each chunk is one request.
 */
export async function fetchTimeSeries(
    domain: Domain,
    mode: Mode,
    options: TimeSeriesOptions = {}
): Promise<Observation[]> {
    const route = resolveRoute(domain, mode);
    const query = normalizeQuery(
        {
            fmisid: options.fmisid ?? DEFAULT_STATIONS[domain],
            startTime: options.startTime,
            endTime: options.endTime,
            resolutionMinutes: options.resolutionMinutes,
            parameters: options.parameters
        },
        { mode, minResolutionMinutes: route.minResolutionMinutes, now: options.now }
    );
    const transport = options.transport ?? defaultTransport();
    const delayMs = options.chunkDelayMs ?? getChunkDelayMs();
    const windows = splitTimeRange(query.startTime, query.endTime, query.resolutionMinutes);

    const observations: Observation[] = [];
    for (const [i, chunk] of windows.entries()) {
        if (i > 0 && delayMs > 0) {
            await sleep(delayMs);
        }
        logDebug(`querying ${route.storedQueryId}`, {
            start: formatServiceTime(chunk.start),
            end: formatServiceTime(chunk.end)
        });
        const request = buildRequest(route, { ...query, startTime: chunk.start, endTime: chunk.end });
        const xml = await dispatch(request, transport);
        for (const located of decodeFeatures(route, xml)) {
            observations.push(toObservation(located));
        }
    }

    if (observations.length === 0) {
        if (options.strict) {
            throw new EmptyResponseError(
                `${route.storedQueryId} returned no data for station ${query.fmisid}`
            );
        }
        return observations;
    }

    warnIfIncomplete(observations, query.startTime, query.endTime, query.resolutionMinutes);
    return observations;
}
