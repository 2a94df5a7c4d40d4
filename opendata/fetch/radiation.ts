/**
 * Solar radiation observations and forecasts.
 */

import type { Observation } from '../types';
import { fetchTimeSeries, type TimeSeriesOptions } from './stored-query';

/**
 * Solar radiation observations (hourly by default, down to 1 minute).
 */
export function getRadiation(options: TimeSeriesOptions = {}): Promise<Observation[]> {
    return fetchTimeSeries('radiation', 'observation', options);
}

/**
 * Solar radiation forecast from the MEPS (Harmonie) model.
 *
 * Same stored query as getWeatherForecast(); pass e.g.
 * RadiationGlobal, RadiationLW, RadiationSW to get radiation only.
 */
export function getRadiationForecast(options: TimeSeriesOptions = {}): Promise<Observation[]> {
    return fetchTimeSeries('radiation', 'forecast', options);
}
