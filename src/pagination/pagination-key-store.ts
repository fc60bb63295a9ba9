/**
 * Pagination Key Store
 *
 * Maps a page index to the opaque cursor token that fetches it. Tokens are
 * only learned moving forward: fetching page N stores the returned next token
 * at N + 1. Page 0 is always fetched without a token and never stored.
 *
 * There is no eviction. The store grows for the lifetime of a forward
 * browsing session and is emptied by a from-start refresh.
 */

import { ValidationError } from '../core/errors.js';

export class PaginationKeyStore<K> {
  private readonly keys = new Map<number, K>();

  /**
   * Token for a page, or undefined when the page was never reached forward
   * (always undefined for page 0).
   */
  public get(pageIndex: number): K | undefined {
    return this.keys.get(pageIndex);
  }

  /**
   * Record the token that fetches `pageIndex`.
   *
   * @throws {ValidationError} for page 0 or a non-integer index
   */
  public set(pageIndex: number, token: K): void {
    if (!Number.isInteger(pageIndex) || pageIndex < 1) {
      throw new ValidationError(
        `Cannot store a pagination token for page ${pageIndex}`,
        'pageIndex'
      );
    }
    this.keys.set(pageIndex, token);
  }

  public has(pageIndex: number): boolean {
    return this.keys.has(pageIndex);
  }

  public clear(): void {
    this.keys.clear();
  }

  public get size(): number {
    return this.keys.size;
  }

  /**
   * Snapshot of stored tokens ordered by page index
   */
  public entries(): Array<[number, K]> {
    return [...this.keys.entries()].sort(([a], [b]) => a - b);
  }
}
