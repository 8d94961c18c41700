/**
 * Tabular and indexed input representations
 *
 * In-memory stand-ins for the shapes callers hand to the metric adapter:
 * a one-dimensional series with an index, and a table of named columns
 * sharing an index.
 *
 * @module @tsforge/core/time-series/frames
 */

/**
 * A single index label. Dates make a datetime index; numbers and strings
 * are positional or categorical labels.
 */
export type IndexLabel = Date | number | string;

/**
 * Index-type predicate: true when every label is a valid Date.
 */
export function isChronological(index: readonly IndexLabel[]): boolean {
  if (index.length === 0) return false;
  return index.every(label => label instanceof Date && Number.isFinite(label.getTime()));
}

function defaultIndex(length: number): number[] {
  return Array.from({ length }, (_, i) => i);
}

// =============================================================================
// INDEXED SERIES
// =============================================================================

/**
 * Ordered numeric values paired with an index of equal length
 */
export class IndexedSeries {
  readonly values: readonly number[];
  readonly index: readonly IndexLabel[];
  readonly name?: string;

  constructor(values: readonly number[], index?: readonly IndexLabel[], name?: string) {
    const resolvedIndex = index ?? defaultIndex(values.length);
    if (resolvedIndex.length !== values.length) {
      throw new RangeError(
        `Index length ${resolvedIndex.length} does not match values length ${values.length}`
      );
    }
    this.values = [...values];
    this.index = [...resolvedIndex];
    this.name = name;
  }

  get length(): number {
    return this.values.length;
  }

  isDatetimeIndex(): boolean {
    return isChronological(this.index);
  }
}

// =============================================================================
// DATA TABLE
// =============================================================================

/**
 * Named numeric columns sharing one index
 */
export class DataTable {
  readonly index: readonly IndexLabel[];
  private readonly columns: Map<string, readonly number[]>;

  constructor(columns: Record<string, readonly number[]>, index?: readonly IndexLabel[]) {
    const entries = Object.entries(columns);
    const rowCount = entries.length > 0 ? entries[0][1].length : (index?.length ?? 0);

    for (const [name, values] of entries) {
      if (values.length !== rowCount) {
        throw new RangeError(
          `Column "${name}" has ${values.length} rows, expected ${rowCount}`
        );
      }
    }

    const resolvedIndex = index ?? defaultIndex(rowCount);
    if (resolvedIndex.length !== rowCount) {
      throw new RangeError(
        `Index length ${resolvedIndex.length} does not match row count ${rowCount}`
      );
    }

    this.columns = new Map(entries.map(([name, values]) => [name, [...values]]));
    this.index = [...resolvedIndex];
  }

  get columnNames(): string[] {
    return Array.from(this.columns.keys());
  }

  get columnCount(): number {
    return this.columns.size;
  }

  get rowCount(): number {
    return this.index.length;
  }

  /** Shape as [rows, columns] */
  get shape(): [number, number] {
    return [this.rowCount, this.columnCount];
  }

  column(name: string): IndexedSeries {
    const values = this.columns.get(name);
    if (!values) {
      throw new RangeError(`Unknown column "${name}"`);
    }
    return new IndexedSeries(values, this.index, name);
  }

  /**
   * Drop the column axis of a single-column table
   */
  squeeze(): IndexedSeries {
    const names = this.columnNames;
    if (names.length !== 1) {
      throw new RangeError(`Only a single-column table can be squeezed, got ${names.length} columns`);
    }
    return this.column(names[0]);
  }
}
