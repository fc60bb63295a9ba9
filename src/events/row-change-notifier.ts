/**
 * Row Change Notifier
 *
 * Two notification tiers for the rendering layer:
 * - per-row listeners, registered against one row position and called with
 *   `(index, item)` when that row is mutated, (un)selected or (un)expanded
 * - coarse listeners, called with no payload after every state change
 *
 * A dispatch runs every affected row's listeners first and then exactly one
 * coarse broadcast; the two are never interleaved.
 */

import { logger } from '../core/logger.js';
import type {
  ChangeListener,
  RowChangeListener,
  Unsubscribe,
} from '../types/table-types.js';

/**
 * Looks up the row currently at a position. `found: false` means the window
 * has no row there (for instance a stale selection index).
 */
export type RowLookup<T> = (index: number) => { found: true; item: T } | { found: false };

export class RowChangeNotifier<T> {
  private readonly rowListeners = new Map<number, RowChangeListener<T>[]>();
  private changeListeners: ChangeListener[] = [];

  /**
   * Register a callback for the row at `index`. The same callback may be
   * registered more than once and is then called once per registration.
   */
  public addRowChangeListener(index: number, listener: RowChangeListener<T>): void {
    const listeners = this.rowListeners.get(index) ?? [];
    listeners.push(listener);
    this.rowListeners.set(index, listeners);
  }

  /**
   * Remove the first registration of exactly this callback at `index`.
   * Unknown callbacks are ignored.
   */
  public removeRowChangeListener(index: number, listener: RowChangeListener<T>): void {
    const listeners = this.rowListeners.get(index);
    if (!listeners) return;

    const position = listeners.indexOf(listener);
    if (position === -1) return;

    listeners.splice(position, 1);
    if (listeners.length === 0) {
      this.rowListeners.delete(index);
    }
  }

  public rowListenerCount(index: number): number {
    return this.rowListeners.get(index)?.length ?? 0;
  }

  /**
   * Subscribe to coarse change notifications.
   *
   * @returns Unsubscribe function
   */
  public subscribe(listener: ChangeListener): Unsubscribe {
    this.changeListeners.push(listener);

    return () => this.unsubscribe(listener);
  }

  public unsubscribe(listener: ChangeListener): void {
    const position = this.changeListeners.indexOf(listener);
    if (position !== -1) {
      this.changeListeners.splice(position, 1);
    }
  }

  public get changeListenerCount(): number {
    return this.changeListeners.length;
  }

  /**
   * Fire the coarse channel only.
   */
  public notifyListeners(): void {
    // Copy so listeners may unsubscribe while being called
    for (const listener of [...this.changeListeners]) {
      try {
        listener();
      } catch (error) {
        logger.error({ err: error }, '[RowChangeNotifier] Change listener error');
      }
    }
  }

  /**
   * One per-row pass over `indexes`, then one coarse broadcast.
   * Positions without a row are skipped in the per-row pass.
   */
  public dispatch(indexes: Iterable<number>, lookup: RowLookup<T>): void {
    for (const index of indexes) {
      const listeners = this.rowListeners.get(index);
      if (!listeners || listeners.length === 0) continue;

      const row = lookup(index);
      if (!row.found) continue;

      for (const listener of [...listeners]) {
        try {
          listener(index, row.item);
        } catch (error) {
          logger.error({ err: error, index }, '[RowChangeNotifier] Row listener error');
        }
      }
    }

    this.notifyListeners();
  }

  /**
   * Drop every registration on both tiers.
   */
  public dispose(): void {
    this.rowListeners.clear();
    this.changeListeners = [];
  }
}
