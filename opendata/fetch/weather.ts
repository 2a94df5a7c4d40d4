/**
 * Weather observations and forecasts.
 */

import { DEFAULT_STATIONS } from '../defaults';
import { decodeMultipointCoverage } from '../decode/multipoint';
import { EmptyResponseError, InvalidQueryError } from '../errors';
import { dispatch, featureRequest } from '../query/dispatch';
import { validateStationId } from '../query/normalize';
import { defaultTransport, type Transport } from '../transport';
import type { Observation, QueryParams } from '../types';
import { fetchTimeSeries, type TimeSeriesOptions } from './stored-query';

export const NORMAL_PERIOD_QUERY = 'fmi::observations::weather::monthly::30year::multipointcoverage';

/**
 * Weather observations (hourly by default). The resolution may be finer,
 * e.g. 10 minutes, as long as it divides the hour.
 */
export function getWeather(options: TimeSeriesOptions = {}): Promise<Observation[]> {
    return fetchTimeSeries('weather', 'observation', options);
}

/**
 * Weather forecast from the MEPS (Harmonie) model.
 *
 * Shares its stored query with getRadiationForecast(), so without a
 * parameter list both return the same values. A weather-only selection
 * could be e.g. Temperature, Humidity, WindSpeedMS, PrecipitationAmount,
 * TotalCloudCover.
 */
export function getWeatherForecast(options: TimeSeriesOptions = {}): Promise<Observation[]> {
    return fetchTimeSeries('weather', 'forecast', options);
}

export interface NormalPeriodOptions {
    fmisid?: number;
    /** First year of the desired normal period, e.g. 1991 */
    startYear?: number;
    endYear?: number;
    strict?: boolean;
    transport?: Transport;
}

function yearStart(year: number, label: string): string {
    if (!Number.isInteger(year) || year < 1800 || year > 9999) {
        throw new InvalidQueryError(`Invalid ${label}: ${year}`);
    }
    return `${year}-01-01T00:00:00Z`;
}

/**
 * Monthly values of the 30-year normal period. Timestamps fall on the
 * first year of the period (1991 with the service defaults).
 */
export async function getWeather30Year(options: NormalPeriodOptions = {}): Promise<Observation[]> {
    const fmisid = validateStationId(options.fmisid ?? DEFAULT_STATIONS.weather);
    const params: QueryParams = { fmisid: String(fmisid) };
    if (options.startYear !== undefined) params.starttime = yearStart(options.startYear, 'start year');
    if (options.endYear !== undefined) params.endtime = yearStart(options.endYear, 'end year');
    if (options.startYear !== undefined && options.endYear !== undefined && options.startYear > options.endYear) {
        throw new InvalidQueryError(`Start year ${options.startYear} is after end year ${options.endYear}`);
    }

    const xml = await dispatch(featureRequest(NORMAL_PERIOD_QUERY, params), options.transport ?? defaultTransport());
    const observations = decodeMultipointCoverage(xml, 'fmisid').map(({ time, parameter, value }) => ({
        time,
        parameter,
        value
    }));
    if (observations.length === 0 && options.strict) {
        throw new EmptyResponseError(`${NORMAL_PERIOD_QUERY} returned no data for station ${fmisid}`);
    }
    return observations;
}
