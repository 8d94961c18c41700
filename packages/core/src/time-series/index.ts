/**
 * Time-Series Module
 *
 * Input representations (indexed series, tables) and the canonical
 * univariate container consumed by metric functions.
 *
 * @module @tsforge/core/time-series
 */

export {
  type IndexLabel,
  isChronological,
  IndexedSeries,
  DataTable,
} from './frames.js';

export {
  type RangeTimeIndex,
  type DatetimeTimeIndex,
  type TimeIndex,
  TimeSeries,
} from './timeseries.js';
