/**
 * Air quality observations and forecasts.
 */

import type { Observation } from '../types';
import { fetchTimeSeries, type TimeSeriesOptions } from './stored-query';

/**
 * Hourly air quality observations. The resolution must be at least one
 * hour and divide 24 hours.
 */
export function getAirquality(options: TimeSeriesOptions = {}): Promise<Observation[]> {
    return fetchTimeSeries('airquality', 'observation', options);
}

/** SILAM air quality forecast. */
export function getAirqualityForecast(options: TimeSeriesOptions = {}): Promise<Observation[]> {
    return fetchTimeSeries('airquality', 'forecast', options);
}
