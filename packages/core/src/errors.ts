/**
 * Errors thrown by Timeslice packages.
 */

import type { Temporal } from 'temporal-polyfill';

/**
 * Base class for every error raised by Timeslice.
 */
export class TimesliceError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/**
 * A value could not be read as an absolute instant.
 */
export class InvalidInstantError extends TimesliceError {
	readonly input: unknown;

	constructor(input: unknown, options?: { cause?: unknown }) {
		super(`Cannot interpret ${describeInput(input)} as an instant`, options);
		this.input = input;
	}
}

/**
 * The requested range ends before it begins.
 */
export class InvalidRangeError extends TimesliceError {
	readonly begin: Temporal.Instant;
	readonly end: Temporal.Instant;

	constructor(begin: Temporal.Instant, end: Temporal.Instant) {
		super(`Range end ${end.toString()} is before its begin ${begin.toString()}`);
		this.begin = begin;
		this.end = end;
	}
}

/**
 * Alignment offsets are whole seconds strictly within one day of UTC.
 */
export class InvalidOffsetError extends TimesliceError {
	readonly offsetWestSecs: number;

	constructor(offsetWestSecs: number) {
		super(`Offset must be an integer number of seconds in (-86400, 86400), got ${offsetWestSecs}`);
		this.offsetWestSecs = offsetWestSecs;
	}
}

/**
 * Precision must have a fixed length: months and years vary.
 */
export class InvalidPrecisionError extends TimesliceError {
	readonly precision: Temporal.Duration;

	constructor(precision: Temporal.Duration) {
		super(`Precision must not use months or years, got ${precision.toString()}`);
		this.precision = precision;
	}
}

/**
 * Calendar arithmetic left the range an instant can represent.
 */
export class OutOfRangeError extends TimesliceError {}

function describeInput(input: unknown): string {
	if (typeof input === 'string') return `"${input}"`;
	if (input instanceof Date) return 'an invalid Date';
	return String(input);
}
