/**
 * Canonical univariate time series
 *
 * The representation handed to metric functions. Either positional (a range
 * index) or time-indexed (strictly increasing epoch-millisecond timestamps).
 * Instances are immutable; every operation returns a new series.
 *
 * @module @tsforge/core/time-series/timeseries
 */

// =============================================================================
// TIME INDEX
// =============================================================================

export interface RangeTimeIndex {
  kind: 'range';
  /** Position of the first value */
  start: number;
}

export interface DatetimeTimeIndex {
  kind: 'datetime';
  /** Epoch milliseconds, strictly increasing */
  timestamps: readonly number[];
}

export type TimeIndex = RangeTimeIndex | DatetimeTimeIndex;

// =============================================================================
// TIME SERIES
// =============================================================================

export class TimeSeries {
  private constructor(
    private readonly data: readonly number[],
    readonly timeIndex: TimeIndex
  ) {}

  /**
   * Build a positional series (range index starting at 0)
   */
  static fromValues(values: readonly number[]): TimeSeries {
    return new TimeSeries([...values], { kind: 'range', start: 0 });
  }

  /**
   * Build a time-indexed series from values and timestamps of equal length
   */
  static fromSeries(values: readonly number[], timestamps: readonly (Date | number)[]): TimeSeries {
    if (values.length !== timestamps.length) {
      throw new RangeError(
        `Timestamps length ${timestamps.length} does not match values length ${values.length}`
      );
    }

    const millis = timestamps.map(t => (t instanceof Date ? t.getTime() : t));
    for (let i = 0; i < millis.length; i++) {
      if (!Number.isFinite(millis[i])) {
        throw new RangeError(`Invalid timestamp at position ${i}`);
      }
      if (i > 0 && millis[i] <= millis[i - 1]) {
        throw new RangeError(`Timestamps must be strictly increasing (position ${i})`);
      }
    }

    return new TimeSeries([...values], { kind: 'datetime', timestamps: millis });
  }

  get length(): number {
    return this.data.length;
  }

  /** Univariate container: always one component */
  get componentCount(): number {
    return 1;
  }

  get hasDatetimeIndex(): boolean {
    return this.timeIndex.kind === 'datetime';
  }

  values(): number[] {
    return [...this.data];
  }

  /**
   * Time key of each position: epoch ms for datetime series, position otherwise
   */
  keys(): number[] {
    if (this.timeIndex.kind === 'datetime') {
      return [...this.timeIndex.timestamps];
    }
    const { start } = this.timeIndex;
    return this.data.map((_, i) => start + i);
  }

  startTime(): number | undefined {
    return this.keys()[0];
  }

  endTime(): number | undefined {
    const keys = this.keys();
    return keys[keys.length - 1];
  }

  hasSameTimeIndex(other: TimeSeries): boolean {
    if (this.timeIndex.kind !== other.timeIndex.kind || this.length !== other.length) {
      return false;
    }
    const a = this.keys();
    const b = other.keys();
    return a.every((key, i) => key === b[i]);
  }

  /**
   * Restrict this series to the span shared with `other` (inclusive bounds).
   * Returns an empty series when the spans do not overlap.
   */
  sliceIntersect(other: TimeSeries): TimeSeries {
    if (this.timeIndex.kind !== other.timeIndex.kind) {
      throw new RangeError('Cannot intersect a datetime-indexed series with a positional one');
    }

    const otherStart = other.startTime();
    const otherEnd = other.endTime();
    const keys = this.keys();
    if (otherStart === undefined || otherEnd === undefined) {
      return this.slicePositions(0, 0);
    }

    let from = keys.findIndex(key => key >= otherStart);
    if (from < 0) from = keys.length;
    let to = from;
    while (to < keys.length && keys[to] <= otherEnd) {
      to++;
    }

    return this.slicePositions(from, to);
  }

  private slicePositions(from: number, to: number): TimeSeries {
    const values = this.data.slice(from, to);
    if (this.timeIndex.kind === 'datetime') {
      return new TimeSeries(values, {
        kind: 'datetime',
        timestamps: this.timeIndex.timestamps.slice(from, to),
      });
    }
    return new TimeSeries(values, { kind: 'range', start: this.timeIndex.start + from });
  }
}
