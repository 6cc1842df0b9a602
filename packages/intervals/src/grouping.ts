/**
 * Boundary calculation for calendar groupings.
 *
 * A boundary is computed on the wall clock `offsetWestSecs` behind UTC: the
 * instant is shifted west, truncated or advanced with date-fns in the UTC
 * frame, then shifted back east.
 */

import { UTCDate } from '@date-fns/utc';
import {
	addDays,
	addHours,
	addMonths,
	addQuarters,
	addWeeks,
	addYears,
	startOfDay,
	startOfHour,
	startOfMonth,
	startOfQuarter,
	startOfWeek,
	startOfYear,
} from 'date-fns';
import { InvalidOffsetError, OutOfRangeError } from '@timeslice/core';
import { Temporal } from 'temporal-polyfill';
import type { Grouping, Instant } from './types.js';

const MS_PER_SECOND = 1000;
const NS_PER_MS = 1_000_000n;
const SECONDS_PER_DAY = 86_400;

// ============================================================================
// Grouping Rules
// ============================================================================

interface GroupingRule {
	/** Start of the unit enclosing `date` */
	truncate: (date: UTCDate) => Date;
	/** Start of the unit following the one `date` starts */
	advance: (date: UTCDate) => Date;
}

const GROUPING_RULES: Record<Grouping, GroupingRule> = {
	hour: {
		truncate: (date) => startOfHour(date),
		advance: (date) => addHours(date, 1),
	},
	day: {
		truncate: (date) => startOfDay(date),
		advance: (date) => addDays(date, 1),
	},
	week: {
		truncate: (date) => startOfWeek(date, { weekStartsOn: 1 }), // Monday start
		advance: (date) => addWeeks(date, 1),
	},
	month: {
		truncate: (date) => startOfMonth(date),
		advance: (date) => addMonths(date, 1),
	},
	quarter: {
		truncate: (date) => startOfQuarter(date),
		advance: (date) => addQuarters(date, 1),
	},
	year: {
		truncate: (date) => startOfYear(date),
		advance: (date) => addYears(date, 1),
	},
};

// ============================================================================
// Offset Shifting
// ============================================================================

/**
 * Throw unless the offset is a whole number of seconds within one day of UTC.
 */
export function assertValidOffset(offsetWestSecs: number): void {
	if (!Number.isInteger(offsetWestSecs) || Math.abs(offsetWestSecs) >= SECONDS_PER_DAY) {
		throw new InvalidOffsetError(offsetWestSecs);
	}
}

/**
 * Floor to whole milliseconds. Boundaries sit on whole seconds, so flooring
 * never carries an instant across one.
 */
function epochMillisecondsFloor(instant: Instant): number {
	const ns = instant.epochNanoseconds;
	const ms = ns / NS_PER_MS;
	return Number(ns % NS_PER_MS < 0n ? ms - 1n : ms);
}

function toWallClock(instant: Instant, offsetWestSecs: number): UTCDate {
	return new UTCDate(epochMillisecondsFloor(instant) - offsetWestSecs * MS_PER_SECOND);
}

function fromWallClock(date: Date, offsetWestSecs: number, describe: () => string): Instant {
	const ms = date.getTime() + offsetWestSecs * MS_PER_SECOND;
	if (Number.isNaN(ms)) {
		throw new OutOfRangeError(`${describe()} is outside the representable range`);
	}

	try {
		return Temporal.Instant.fromEpochMilliseconds(ms);
	} catch (error) {
		throw new OutOfRangeError(`${describe()} is outside the representable range`, {
			cause: error,
		});
	}
}

// ============================================================================
// Boundary Operations
// ============================================================================

/**
 * Returns the grouping boundary at or before an instant.
 *
 * @param instant - Any instant
 * @param grouping - Calendar granularity
 * @param offsetWestSecs - Seconds west of UTC the boundaries align to
 * @returns The start of the enclosing unit, in UTC
 *
 * @example
 * ```typescript
 * boundaryAtOrBefore(toInstant('2022-06-10T19:23:45Z'), 'month', 25200).toString();
 * // '2022-06-01T07:00:00Z'
 * ```
 */
export function boundaryAtOrBefore(
	instant: Instant,
	grouping: Grouping,
	offsetWestSecs: number
): Instant {
	assertValidOffset(offsetWestSecs);
	const truncated = GROUPING_RULES[grouping].truncate(toWallClock(instant, offsetWestSecs));
	return fromWallClock(
		truncated,
		offsetWestSecs,
		() => `The ${grouping} boundary before ${instant.toString()}`
	);
}

/**
 * Returns the boundary one grouping unit after `boundary`.
 * `boundary` is expected to already lie on a boundary of the same grouping.
 */
export function nextBoundary(boundary: Instant, grouping: Grouping, offsetWestSecs: number): Instant {
	assertValidOffset(offsetWestSecs);
	const advanced = GROUPING_RULES[grouping].advance(toWallClock(boundary, offsetWestSecs));
	return fromWallClock(
		advanced,
		offsetWestSecs,
		() => `The ${grouping} boundary after ${boundary.toString()}`
	);
}
