/**
 * Dataset Window
 *
 * The rows of the page currently materialized in memory. Index arguments are
 * checked before anything is touched, so a rejected call leaves the window
 * as it was.
 */

import { IndexOutOfRangeError } from '../core/errors.js';
import type { RowLookup } from '../events/row-change-notifier.js';

export class DatasetWindow<T> {
  private rows: T[] = [];

  public get length(): number {
    return this.rows.length;
  }

  public at(index: number): T | undefined {
    return this.inRange(index) ? this.rows[index] : undefined;
  }

  /**
   * Row lookup for the notifier
   */
  public readonly lookup: RowLookup<T> = (index) => {
    if (!this.inRange(index)) {
      return { found: false };
    }
    return { found: true, item: this.rows[index] };
  };

  public toArray(): T[] {
    return [...this.rows];
  }

  /**
   * Position of the first row equal to `item`, or -1
   */
  public indexOf(item: T, equals: (a: T, b: T) => boolean = Object.is): number {
    return this.rows.findIndex((row) => equals(row, item));
  }

  /**
   * Insert before `index`; `index === length` appends.
   */
  public insertAt(index: number, value: T): void {
    if (!Number.isInteger(index) || index < 0 || index > this.rows.length) {
      throw new IndexOutOfRangeError(
        index,
        this.rows.length,
        `Cannot insert at ${index}: index must be between 0 and ${this.rows.length}`
      );
    }
    this.rows.splice(index, 0, value);
  }

  public replace(index: number, value: T): void {
    this.assertInRange(index);
    this.rows[index] = value;
  }

  public removeAt(index: number): T {
    this.assertInRange(index);
    const [removed] = this.rows.splice(index, 1);
    return removed;
  }

  public clear(): void {
    this.rows.length = 0;
  }

  /**
   * Make the window hold exactly `items`: overwrite the overlapping prefix,
   * drop any old tail and append any new remainder.
   */
  public replaceContents(items: readonly T[]): void {
    const overlap = Math.min(this.rows.length, items.length);
    for (let i = 0; i < overlap; i++) {
      this.rows[i] = items[i];
    }

    if (this.rows.length > items.length) {
      this.rows.length = items.length;
    } else {
      for (let i = overlap; i < items.length; i++) {
        this.rows.push(items[i]);
      }
    }
  }

  private inRange(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.rows.length;
  }

  private assertInRange(index: number): void {
    if (!this.inRange(index)) {
      throw new IndexOutOfRangeError(index, this.rows.length);
    }
  }
}
