/**
 * FMI Open Data — Time Utilities
 */

const MINUTE_MS = 60_000;

/** At most this many timesteps are requested at once. */
export const MAX_STEPS_PER_CHUNK = 168;
const MAX_CHUNK_MINUTES = 7 * 24 * 60;

/**
 * Floor a date to the start of a bucket.
 *
 * @param date The date to floor (or ISO string)
 * @param bucketMinutes The duration of the bucket in minutes (e.g., 60)
 * @returns A new Date object floored to the bucket boundary (UTC)
 */
export function floorToBucketUtc(date: Date | string, bucketMinutes: number): Date {
    const d = typeof date === 'string' ? new Date(date) : date;
    const ms = d.getTime();
    const bucketMs = bucketMinutes * MINUTE_MS;
    return new Date(Math.floor(ms / bucketMs) * bucketMs);
}

/**
 * Format an instant the way the service expects: UTC, second precision.
 * e.g. 2025-01-02T01:00:00Z
 */
export function formatServiceTime(date: Date): string {
    return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function addMinutes(date: Date, minutes: number): Date {
    return new Date(date.getTime() + minutes * MINUTE_MS);
}

export interface TimeWindow {
    start: Date;
    end: Date;
}

/**
 * Split [start, end] into consecutive windows of at most 168 timesteps
 * (and at most one week). Both ends are inclusive, so the next window
 * starts one timestep after the previous one ends.
 */
export function splitTimeRange(start: Date, end: Date, resolutionMinutes: number): TimeWindow[] {
    const steps = Math.min(Math.floor(MAX_CHUNK_MINUTES / resolutionMinutes), MAX_STEPS_PER_CHUNK);
    const spanMinutes = Math.max(steps, 1) * resolutionMinutes;
    const windows: TimeWindow[] = [];
    let cursor = start;
    while (cursor.getTime() <= end.getTime()) {
        const candidate = addMinutes(cursor, spanMinutes);
        const windowEnd = candidate.getTime() < end.getTime() ? candidate : end;
        windows.push({ start: cursor, end: windowEnd });
        cursor = addMinutes(windowEnd, resolutionMinutes);
    }
    return windows;
}

/**
 * Number of timesteps an inclusive range covers at the given resolution.
 */
export function expectedSteps(start: Date, end: Date, resolutionMinutes: number): number {
    const spanMinutes = (end.getTime() - start.getTime()) / MINUTE_MS;
    return Math.floor(spanMinutes / resolutionMinutes) + 1;
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
