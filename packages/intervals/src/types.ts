/**
 * Core type definitions for interval generation.
 */

import type { Temporal } from 'temporal-polyfill';
import type { Instant, InstantInput, Interval } from '@timeslice/core';

export type { Instant, InstantInput, Interval };

// ============================================================================
// Grouping Types
// ============================================================================

/**
 * Calendar granularity used to partition a range.
 * Weeks start on Monday.
 */
export type Grouping = 'hour' | 'day' | 'week' | 'month' | 'quarter' | 'year';

/**
 * Gap kept between the end of one interval and the start of the next.
 * Must be expressed in hours or smaller units.
 */
export type Precision = Temporal.Duration | Temporal.DurationLike;

// ============================================================================
// Generator Types
// ============================================================================

/**
 * Immutable interval generator configuration.
 */
export interface GeneratorConfig {
	readonly grouping: Grouping;
	/** Seconds west of UTC the boundaries align to (25200 = UTC-07:00) */
	readonly offsetWestSecs: number;
	readonly precision: Temporal.Duration;
	/** Let the first interval start at or before `begin` */
	readonly extendBegin: boolean;
	/** Let the last interval end at or after `end` */
	readonly extendEnd: boolean;
}

/**
 * Partial overrides accepted by `createGenerator`.
 */
export interface GeneratorOptions {
	grouping?: Grouping;
	offsetWestSecs?: number;
	precision?: Precision;
	extendBegin?: boolean;
	extendEnd?: boolean;
}
