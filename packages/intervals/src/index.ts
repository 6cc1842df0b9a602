/**
 * Timeslice Intervals
 *
 * Partitions a time range into consecutive calendar-aligned intervals:
 * one per hour, day, week, month, quarter or year, aligned to a fixed
 * UTC offset, all returned in UTC.
 *
 * @packageDocumentation
 */

// Boundary calculation
export { boundaryAtOrBefore, nextBoundary } from './grouping.js';
// Configuration and generation
export {
	createGenerator,
	describeGenerator,
	generators,
	getIntervals,
	withGrouping,
	withOffsetWestSecs,
	withoutExtendedBegin,
	withoutExtendedEnd,
	withoutExtension,
	withPrecision,
} from './generator.js';
// One-off helpers
export { getExtendedUtcIntervals, getUtcIntervalsOpts } from './convenience.js';

// Shared primitives
export {
	intervalContains,
	intervalDuration,
	InvalidInstantError,
	InvalidOffsetError,
	InvalidPrecisionError,
	InvalidRangeError,
	OutOfRangeError,
	TimesliceError,
	toInstant,
} from '@timeslice/core';

// All types
export type {
	GeneratorConfig,
	GeneratorOptions,
	Grouping,
	Instant,
	InstantInput,
	Interval,
	Precision,
} from './types.js';
