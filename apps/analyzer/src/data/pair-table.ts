/**
 * Sparse table keyed by an ordered pair of names.
 *
 * Batter-vs-bowler counters live in one table; the bowler-vs-batter view is
 * the same cells read by column, so the two views cannot drift apart.
 */

interface PairCell<T> {
  row: string;
  column: string;
  value: T;
}

export class PairTable<T> {
  private cells = new Map<string, PairCell<T>>();
  private create: () => T;

  constructor(create: () => T) {
    this.create = create;
  }

  private static key(row: string, column: string): string {
    return JSON.stringify([row, column]);
  }

  ensure(row: string, column: string): T {
    const key = PairTable.key(row, column);
    const existing = this.cells.get(key);
    if (existing) {
      return existing.value;
    }

    const cell = { row, column, value: this.create() };
    this.cells.set(key, cell);
    return cell.value;
  }

  /**
   * Cells of one row, in insertion order
   */
  row(row: string): Array<[string, T]> {
    const result: Array<[string, T]> = [];
    for (const cell of this.cells.values()) {
      if (cell.row === row) {
        result.push([cell.column, cell.value]);
      }
    }
    return result;
  }

  /**
   * Cells of one column, in insertion order
   */
  column(column: string): Array<[string, T]> {
    const result: Array<[string, T]> = [];
    for (const cell of this.cells.values()) {
      if (cell.column === column) {
        result.push([cell.row, cell.value]);
      }
    }
    return result;
  }
}
