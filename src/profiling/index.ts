/**
 * Profiling span reconstruction, category filtering and summaries.
 *
 * @module profiling
 */

export {
	type Categorized,
	filterByCategory,
	isCategoryIncluded,
	matchesCategory,
} from './category-filter.js'
export {
	type CategoryStats,
	formatDuration,
	formatProfilingSummary,
	type ProfilingSummary,
	sumTimings,
	summarizeTimings,
} from './summary.js'
export {
	calculateTimings,
	type OpenSpan,
	reconstructSpans,
	type SpanDepth,
	type SpanReconstruction,
	type TimingRecord,
} from './timings.js'
