/**
 * Shorthand entry points for one-off generation.
 */

import { createGenerator, getIntervals } from './generator.js';
import type { Grouping, InstantInput, Interval, Precision } from './types.js';

/**
 * Intervals with a 1 ms gap, extended to fully cover [begin, end].
 */
export function getExtendedUtcIntervals(
	begin: InstantInput,
	end: InstantInput,
	grouping: Grouping,
	offsetWestSecs: number
): Interval[] {
	return getIntervals(createGenerator({ grouping, offsetWestSecs }), begin, end);
}

/**
 * Intervals with every generator option spelled out.
 */
export function getUtcIntervalsOpts(
	begin: InstantInput,
	end: InstantInput,
	grouping: Grouping,
	offsetWestSecs: number,
	precision: Precision,
	extendBegin: boolean,
	extendEnd: boolean
): Interval[] {
	const config = createGenerator({ grouping, offsetWestSecs, precision, extendBegin, extendEnd });
	return getIntervals(config, begin, end);
}
