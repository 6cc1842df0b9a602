/**
 * Instant normalization and interval helpers.
 */

import { Temporal } from 'temporal-polyfill';
import { InvalidInstantError } from './errors.js';
import type { Instant, InstantInput, Interval } from './index.js';

/**
 * Normalize any accepted input to a `Temporal.Instant`.
 *
 * @example
 * ```typescript
 * toInstant('2022-06-10T12:23:45-07:00').toString();
 * // '2022-06-10T19:23:45Z'
 * ```
 */
export function toInstant(input: InstantInput): Instant {
	if (input instanceof Temporal.Instant) {
		return input;
	}

	if (input instanceof Temporal.ZonedDateTime) {
		return input.toInstant();
	}

	if (input instanceof Date) {
		const ms = input.getTime();
		if (Number.isNaN(ms)) {
			throw new InvalidInstantError(input);
		}
		return Temporal.Instant.fromEpochMilliseconds(ms);
	}

	try {
		return Temporal.Instant.from(input);
	} catch (error) {
		throw new InvalidInstantError(input, { cause: error });
	}
}

/**
 * Check if a closed interval contains a point in time.
 */
export function intervalContains(interval: Interval, time: InstantInput): boolean {
	const instant = toInstant(time);
	return (
		Temporal.Instant.compare(interval.start, instant) <= 0 &&
		Temporal.Instant.compare(instant, interval.end) <= 0
	);
}

/**
 * Get the span from an interval's start to its end, balanced up to hours.
 */
export function intervalDuration(interval: Interval): Temporal.Duration {
	return interval.start.until(interval.end, { largestUnit: 'hours' });
}
