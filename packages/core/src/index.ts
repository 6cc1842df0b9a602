/**
 * Timeslice Core
 *
 * Shared time primitives for Timeslice packages.
 * Every instant handed out is a UTC `Temporal.Instant`.
 */

import type { Temporal } from 'temporal-polyfill';

/**
 * An absolute point in time with nanosecond resolution.
 */
export type Instant = Temporal.Instant;

/**
 * Anything that identifies an absolute point in time.
 * Strings must be ISO 8601 and carry `Z` or a numeric UTC offset.
 */
export type InstantInput = Temporal.Instant | Temporal.ZonedDateTime | Date | string;

/**
 * A closed interval [start, end] of UTC instants.
 * Generated intervals end one precision step before the next one starts.
 */
export interface Interval {
	start: Instant;
	end: Instant;
}

export { toInstant, intervalContains, intervalDuration } from './instant.js';
export {
	TimesliceError,
	InvalidInstantError,
	InvalidRangeError,
	InvalidOffsetError,
	InvalidPrecisionError,
	OutOfRangeError,
} from './errors.js';
