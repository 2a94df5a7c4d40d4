/**
 * FMI Open Data — Query Normalizer
 *
 * Validates caller input and resolves defaults into a NormalizedQuery, then
 * serializes it into stored-query parameters. Pure: the clock is an input.
 */

import { DEFAULT_RESOLUTION_MINUTES, DEFAULT_WINDOW_HOURS } from '../defaults';
import { InvalidQueryError } from '../errors';
import { addMinutes, floorToBucketUtc, formatServiceTime } from '../time';
import type { Mode, NormalizedQuery, QueryParams } from '../types';

export interface QueryInput {
    fmisid: number;
    startTime?: Date;
    endTime?: Date;
    resolutionMinutes?: number;
    /** Omit for the service default set. An explicitly empty list is an error. */
    parameters?: readonly string[];
}

export interface QueryConstraints {
    mode: Mode;
    /** Finest timestep the stored query supports */
    minResolutionMinutes: number;
    /** Clock override; defaults to the current time */
    now?: Date;
}

const HOUR_MINUTES = 60;
const DAY_MINUTES = 24 * 60;

export function validateStationId(fmisid: number): number {
    if (!Number.isSafeInteger(fmisid) || fmisid <= 0) {
        throw new InvalidQueryError(`Invalid station id: ${fmisid}`);
    }
    return fmisid;
}

/**
 * Sub-hour steps must divide the hour, longer steps must divide the day,
 * so that every chunk boundary falls on the same grid.
 */
export function validateResolution(resolutionMinutes: number, minResolutionMinutes: number): number {
    if (!Number.isInteger(resolutionMinutes) || resolutionMinutes <= 0) {
        throw new InvalidQueryError(
            `Resolution must be a positive whole number of minutes, got ${resolutionMinutes}`
        );
    }
    if (resolutionMinutes < minResolutionMinutes) {
        throw new InvalidQueryError(
            `Resolution of ${resolutionMinutes} min is finer than the supported ${minResolutionMinutes} min`
        );
    }
    if (resolutionMinutes < HOUR_MINUTES && HOUR_MINUTES % resolutionMinutes !== 0) {
        throw new InvalidQueryError(`Resolution of ${resolutionMinutes} min must divide the hour evenly`);
    }
    if (resolutionMinutes > HOUR_MINUTES && DAY_MINUTES % resolutionMinutes !== 0) {
        throw new InvalidQueryError(`Resolution of ${resolutionMinutes} min must divide 24 hours evenly`);
    }
    return resolutionMinutes;
}

export function normalizeParameters(parameters: readonly string[] | undefined): string[] {
    if (parameters === undefined) return [];

    const seen = new Set<string>();
    const result: string[] = [];
    for (const raw of parameters) {
        const name = raw.trim();
        if (!name) {
            throw new InvalidQueryError('Parameter names must not be blank');
        }
        if (name.includes(',')) {
            throw new InvalidQueryError(`Invalid parameter name: ${name}`);
        }
        if (!seen.has(name)) {
            seen.add(name);
            result.push(name);
        }
    }
    if (result.length === 0) {
        throw new InvalidQueryError('Parameter list is empty');
    }
    return result;
}

function requireValidDate(date: Date, label: string): Date {
    if (Number.isNaN(date.getTime())) {
        throw new InvalidQueryError(`Invalid ${label}`);
    }
    return date;
}

/**
 * Resolve missing bounds from the mode's default window around `now`
 * (floored to the resolution), then check ordering.
 */
export function resolveTimeRange(
    startTime: Date | undefined,
    endTime: Date | undefined,
    resolutionMinutes: number,
    mode: Mode,
    now: Date
): { startTime: Date; endTime: Date } {
    const anchor = floorToBucketUtc(now, resolutionMinutes);
    const windowMinutes = DEFAULT_WINDOW_HOURS[mode] * HOUR_MINUTES;

    const defaultStart = mode === 'forecast' ? anchor : addMinutes(anchor, -windowMinutes);
    const defaultEnd = mode === 'forecast' ? addMinutes(anchor, windowMinutes) : anchor;

    const start = startTime ? requireValidDate(startTime, 'start time') : defaultStart;
    const end = endTime ? requireValidDate(endTime, 'end time') : defaultEnd;

    if (start.getTime() > end.getTime()) {
        throw new InvalidQueryError(
            `Start time ${start.toISOString()} is after end time ${end.toISOString()}`
        );
    }
    return { startTime: start, endTime: end };
}

export function normalizeQuery(input: QueryInput, constraints: QueryConstraints): NormalizedQuery {
    const fmisid = validateStationId(input.fmisid);
    const resolutionMinutes = validateResolution(
        input.resolutionMinutes ?? DEFAULT_RESOLUTION_MINUTES,
        constraints.minResolutionMinutes
    );
    const parameters = normalizeParameters(input.parameters);
    const { startTime, endTime } = resolveTimeRange(
        input.startTime,
        input.endTime,
        resolutionMinutes,
        constraints.mode,
        constraints.now ?? new Date()
    );

    return { fmisid, startTime, endTime, resolutionMinutes, parameters };
}

/**
 * Serialize a normalized query into the stored-query parameter encoding.
 */
export function encodeQuery(query: NormalizedQuery): QueryParams {
    const params: QueryParams = {
        fmisid: String(query.fmisid),
        starttime: formatServiceTime(query.startTime),
        endtime: formatServiceTime(query.endTime),
        timestep: String(query.resolutionMinutes)
    };
    if (query.parameters.length > 0) {
        params.parameters = query.parameters.join(',');
    }
    return params;
}
