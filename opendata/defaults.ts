/**
 * Default stations and time windows used when a caller leaves them out.
 */

import type { Domain, Mode } from './types';

export const DEFAULT_STATIONS: Record<Domain, number> = {
    // Helsinki Kaisaniemi
    weather: 100971,
    // Helsinki Kumpula
    radiation: 101004,
    // Helsinki Kallio 2
    airquality: 100662
};

export const DEFAULT_RESOLUTION_MINUTES = 60;

/** Observations: how far back from now. Forecasts: how far ahead. */
export const DEFAULT_WINDOW_HOURS: Record<Mode, number> = {
    observation: 12,
    forecast: 48
};
