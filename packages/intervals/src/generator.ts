/**
 * Interval generator: configuration and generation.
 */

import { InvalidPrecisionError, InvalidRangeError, OutOfRangeError, toInstant } from '@timeslice/core';
import { Temporal } from 'temporal-polyfill';
import { assertValidOffset, boundaryAtOrBefore, nextBoundary } from './grouping.js';
import type {
	GeneratorConfig,
	GeneratorOptions,
	Grouping,
	Instant,
	InstantInput,
	Interval,
	Precision,
} from './types.js';

// ============================================================================
// Configuration
// ============================================================================

const DEFAULT_PRECISION = Temporal.Duration.from({ milliseconds: 1 });

/**
 * Create a generator configuration.
 * Defaults: daily grouping, UTC alignment, 1 ms precision, both ends extended.
 *
 * @param options - Overrides applied on top of the defaults
 * @returns A frozen configuration
 * @throws InvalidPrecisionError when the precision uses months or years
 */
export function createGenerator(options: GeneratorOptions = {}): GeneratorConfig {
	const {
		grouping = 'day',
		offsetWestSecs = 0,
		precision = DEFAULT_PRECISION,
		extendBegin = true,
		extendEnd = true,
	} = options;

	assertValidOffset(offsetWestSecs);

	return Object.freeze({
		grouping,
		offsetWestSecs,
		precision: toFixedPrecision(precision),
		extendBegin,
		extendEnd,
	});
}

/**
 * Express a precision in hours and smaller units, counting a week as 7 days
 * and a day as 24 hours, so it can be subtracted from an instant.
 */
function toFixedPrecision(precision: Precision): Temporal.Duration {
	const duration = Temporal.Duration.from(precision);
	if (duration.years !== 0 || duration.months !== 0) {
		throw new InvalidPrecisionError(duration);
	}

	return Temporal.Duration.from({
		hours: (duration.weeks * 7 + duration.days) * 24 + duration.hours,
		minutes: duration.minutes,
		seconds: duration.seconds,
		milliseconds: duration.milliseconds,
		microseconds: duration.microseconds,
		nanoseconds: duration.nanoseconds,
	});
}

function update(config: GeneratorConfig, options: GeneratorOptions): GeneratorConfig {
	return createGenerator({ ...config, ...options });
}

export function withGrouping(config: GeneratorConfig, grouping: Grouping): GeneratorConfig {
	return update(config, { grouping });
}

/**
 * Align boundaries to the wall clock `seconds` west of UTC.
 * Positive values are behind UTC: 25200 aligns to UTC-07:00.
 */
export function withOffsetWestSecs(config: GeneratorConfig, seconds: number): GeneratorConfig {
	return update(config, { offsetWestSecs: seconds });
}

/**
 * Set the gap kept between consecutive intervals. The value is not checked
 * against the grouping; a precision of a day or more makes daily intervals
 * end before they start.
 */
export function withPrecision(config: GeneratorConfig, precision: Precision): GeneratorConfig {
	return update(config, { precision });
}

export function withoutExtendedBegin(config: GeneratorConfig): GeneratorConfig {
	return update(config, { extendBegin: false });
}

export function withoutExtendedEnd(config: GeneratorConfig): GeneratorConfig {
	return update(config, { extendEnd: false });
}

/**
 * Keep every interval within the requested range.
 */
export function withoutExtension(config: GeneratorConfig): GeneratorConfig {
	return update(config, { extendBegin: false, extendEnd: false });
}

// ============================================================================
// Generation
// ============================================================================

/**
 * Partition [begin, end] into consecutive calendar-aligned intervals.
 *
 * With `extendBegin` the first interval starts at the boundary at or before
 * `begin`, otherwise at the first boundary at or after it. With `extendEnd` the
 * last interval ends at or after `end`, otherwise strictly before it.
 *
 * @param config - Generator configuration
 * @param begin - Start of the requested range
 * @param end - End of the requested range
 * @returns Intervals ordered by start, all in UTC
 * @throws InvalidRangeError when `end` is before `begin`
 * @throws OutOfRangeError when a boundary cannot be represented
 *
 * @example
 * ```typescript
 * const config = createGenerator({ grouping: 'month', offsetWestSecs: 25200 });
 * getIntervals(config, '2022-06-10T12:23:45-07:00', '2022-08-26T12:23:45-07:00');
 * // Result: [
 * //   { start: 2022-06-01T07:00:00Z, end: 2022-07-01T06:59:59.999Z },
 * //   { start: 2022-07-01T07:00:00Z, end: 2022-08-01T06:59:59.999Z },
 * //   { start: 2022-08-01T07:00:00Z, end: 2022-09-01T06:59:59.999Z }
 * // ]
 * ```
 */
export function getIntervals(
	config: GeneratorConfig,
	begin: InstantInput,
	end: InstantInput
): Interval[] {
	const { grouping, offsetWestSecs, precision, extendBegin, extendEnd } = config;
	const rangeBegin = toInstant(begin);
	const rangeEnd = toInstant(end);

	const order = Temporal.Instant.compare(rangeBegin, rangeEnd);
	if (order > 0) {
		throw new InvalidRangeError(rangeBegin, rangeEnd);
	}
	if (order === 0) {
		return [];
	}

	let current = boundaryAtOrBefore(rangeBegin, grouping, offsetWestSecs);
	// A begin that already sits on a boundary needs no extension either way
	if (!extendBegin && Temporal.Instant.compare(current, rangeBegin) < 0) {
		current = nextBoundary(current, grouping, offsetWestSecs);
	}

	const intervals: Interval[] = [];

	for (;;) {
		const upper = nextBoundary(current, grouping, offsetWestSecs);
		const last = subtractPrecision(upper, precision);

		if (Temporal.Instant.compare(last, rangeEnd) >= 0) {
			if (extendEnd) {
				intervals.push({ start: current, end: last });
			}
			break;
		}

		intervals.push({ start: current, end: last });
		current = upper;
	}

	return intervals;
}

function subtractPrecision(boundary: Instant, precision: Temporal.Duration): Instant {
	try {
		return boundary.subtract(precision);
	} catch (error) {
		throw new OutOfRangeError(
			`${boundary.toString()} minus ${precision.toString()} is outside the representable range`,
			{ cause: error }
		);
	}
}

// ============================================================================
// Presets
// ============================================================================

const ADVERBS: Record<Grouping, string> = {
	hour: 'hourly',
	day: 'daily',
	week: 'weekly',
	month: 'monthly',
	quarter: 'quarterly',
	year: 'yearly',
};

/**
 * Default configurations for each grouping.
 */
export const generators = {
	hourly: createGenerator({ grouping: 'hour' }),
	daily: createGenerator({ grouping: 'day' }),
	weekly: createGenerator({ grouping: 'week' }),
	monthly: createGenerator({ grouping: 'month' }),
	quarterly: createGenerator({ grouping: 'quarter' }),
	yearly: createGenerator({ grouping: 'year' }),
} satisfies Record<string, GeneratorConfig>;

// ============================================================================
// Description
// ============================================================================

function describeOffset(offsetWestSecs: number): string {
	if (offsetWestSecs === 0) return 'UTC';

	// West of UTC is a negative UTC offset
	const sign = offsetWestSecs > 0 ? '-' : '+';
	const total = Math.abs(offsetWestSecs);
	const hours = String(Math.floor(total / 3600)).padStart(2, '0');
	const minutes = String(Math.floor((total % 3600) / 60)).padStart(2, '0');
	const seconds = total % 60;

	return seconds === 0
		? `UTC${sign}${hours}:${minutes}`
		: `UTC${sign}${hours}:${minutes}:${String(seconds).padStart(2, '0')}`;
}

const PRECISION_UNITS = [
	['hours', 'hour'],
	['minutes', 'minute'],
	['seconds', 'second'],
	['milliseconds', 'millisecond'],
	['microseconds', 'microsecond'],
	['nanoseconds', 'nanosecond'],
] as const;

function describePrecision(precision: Temporal.Duration): string {
	const parts: string[] = [];
	for (const [field, label] of PRECISION_UNITS) {
		const amount = precision[field];
		if (amount !== 0) parts.push(`${amount} ${label}${Math.abs(amount) !== 1 ? 's' : ''}`);
	}
	return parts.length > 0 ? parts.join(', ') : 'no';
}

/**
 * Human-readable description of a generator configuration.
 *
 * @example
 * ```typescript
 * describeGenerator(createGenerator({ grouping: 'month', offsetWestSecs: 25200 }));
 * // 'monthly intervals aligned to UTC-07:00 with a 1 millisecond gap'
 * ```
 */
export function describeGenerator(config: GeneratorConfig): string {
	const precision = describePrecision(config.precision);
	const gap = precision === 'no' ? 'no gap' : `a ${precision} gap`;
	let description = `${ADVERBS[config.grouping]} intervals aligned to ${describeOffset(config.offsetWestSecs)} with ${gap}`;

	if (!config.extendBegin && !config.extendEnd) {
		description += ', kept within the range';
	} else if (!config.extendBegin) {
		description += ', starting within the range';
	} else if (!config.extendEnd) {
		description += ', ending within the range';
	}

	return description;
}
