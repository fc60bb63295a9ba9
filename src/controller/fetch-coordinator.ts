/**
 * Fetch Coordinator
 *
 * Owns the controller's run state machine and the forward cursor cache:
 *
 *   idle ──fetchPage──▶ fetching ──ok──▶ idle
 *                          │
 *                          └──fail──▶ error ──fetchPage──▶ fetching
 *
 * Every call to fetchPage starts a new generation. Only the newest generation
 * may apply its result; an older one is aborted through its signal and its
 * completion is discarded, so navigation calls issued while a fetch is in
 * flight always resolve to the last request made.
 *
 * Failures never escape as exceptions, whether the fetcher rejects or merging
 * the page throws. They become the `error` state and are handed to `onError`;
 * the page index stays as it was so the same page can be retried.
 */

import type { Logger } from '../core/logger.js';
import { TimeoutError, toFetchError } from '../core/errors.js';
import type { FetchError } from '../core/errors.js';
import { composeWithTimeout, isTimeoutAbortReason, onceAborted } from '../core/abort.js';
import { fromPromiseWith, match } from '../core/result.js';
import { PaginationKeyStore } from '../pagination/pagination-key-store.js';
import type { SortModel } from '../sorting/sort-model.js';
import type { FetchResult, Fetcher, TableRunState } from '../types/table-types.js';

export interface FetchRequest {
  readonly pageSize: number;
  readonly sortModel: SortModel | undefined;
}

export type FetchOutcome = 'loaded' | 'failed' | 'superseded';

export interface FetchCoordinatorOptions<K, T> {
  fetcher: Fetcher<K, T>;
  logger: Logger;
  /** 0 disables the deadline */
  fetchTimeoutMs: number;
  /** Called after the state has moved to `fetching` */
  onFetchStart: () => void;
  /**
   * Called with the fetched rows of the newest generation, after bookkeeping.
   * A throw here turns the fetch into a failure.
   */
  onPage: (items: readonly T[], pageIndex: number, previousPageIndex: number) => void;
  /** Called when the newest generation failed, after the state moved to `error` */
  onError: (error: FetchError) => void;
}

export class FetchCoordinator<K, T> {
  private readonly keyStore = new PaginationKeyStore<K>();
  private readonly options: FetchCoordinatorOptions<K, T>;

  private currentState: TableRunState = { status: 'idle' };
  private currentPageIndex = 0;
  private nextPageAvailable = false;
  private currentGeneration = 0;
  private inFlight: AbortController | null = null;
  private disposed = false;

  constructor(options: FetchCoordinatorOptions<K, T>) {
    this.options = options;
  }

  public get state(): TableRunState {
    return this.currentState;
  }

  public get currentError(): FetchError | undefined {
    return this.currentState.status === 'error' ? this.currentState.error : undefined;
  }

  public get pageIndex(): number {
    return this.currentPageIndex;
  }

  public get hasNextPage(): boolean {
    return this.nextPageAvailable;
  }

  public get hasPreviousPage(): boolean {
    return this.currentPageIndex !== 0;
  }

  /**
   * Number of fetches issued so far
   */
  public get generation(): number {
    return this.currentGeneration;
  }

  public get paginationKeys(): PaginationKeyStore<K> {
    return this.keyStore;
  }

  /**
   * Forget every learned cursor. Used before a from-start refresh, since
   * cursors are only valid for the sort order and page size they came from.
   */
  public resetPagination(): void {
    this.keyStore.clear();
  }

  /**
   * Fetch `pageIndex` and apply the result if no newer fetch was issued
   * meanwhile. Resolves once this request settles; never rejects.
   */
  public async fetchPage(pageIndex: number, request: FetchRequest): Promise<FetchOutcome> {
    const generation = ++this.currentGeneration;
    const log = this.options.logger.child({ generation, pageIndex });

    // A newer request makes the older one pointless
    this.inFlight?.abort();
    const abortController = new AbortController();
    this.inFlight = abortController;

    this.currentState = { status: 'fetching' };
    this.options.onFetchStart();

    const pageToken = this.keyStore.get(pageIndex);
    log.debug({ pageSize: request.pageSize, hasToken: pageToken !== undefined }, 'Fetching page');

    const signal = composeWithTimeout(abortController.signal, this.options.fetchTimeoutMs);
    const result = await fromPromiseWith(
      this.invoke(pageToken, request, signal, pageIndex),
      (error) => toFetchError(error, pageIndex)
    );

    if (this.disposed || generation !== this.currentGeneration) {
      log.debug({ latestGeneration: this.currentGeneration }, 'Discarding superseded fetch result');
      return 'superseded';
    }

    this.inFlight = null;

    return match(result, {
      ok: (page): FetchOutcome => {
        try {
          this.applyPage(page, pageIndex);
        } catch (error) {
          this.fail(toFetchError(error, pageIndex), log);
          return 'failed';
        }
        log.debug({ itemCount: page.items.length, hasNextPage: this.nextPageAvailable }, 'Page loaded');
        return 'loaded';
      },
      err: (error): FetchOutcome => {
        this.fail(error, log);
        return 'failed';
      },
    });
  }

  /**
   * Abort the in-flight fetch and ignore anything that completes later.
   */
  public dispose(): void {
    this.disposed = true;
    this.inFlight?.abort();
    this.inFlight = null;
    this.keyStore.clear();
  }

  private fail(error: FetchError, log: Logger): void {
    log.error({ err: error.cause ?? error }, 'An error occurred trying to fetch a page');
    this.currentState = { status: 'error', error };
    this.options.onError(error);
  }

  /**
   * Commit the page and hand it to `onPage`. If merging throws, the page
   * index and next-page flag are rolled back and the error is rethrown.
   */
  private applyPage(page: FetchResult<K, T>, pageIndex: number): void {
    const nextToken = page.nextPageToken ?? undefined;
    const previousPageIndex = this.currentPageIndex;
    const previousNextPageAvailable = this.nextPageAvailable;

    this.nextPageAvailable = nextToken !== undefined;
    this.currentPageIndex = pageIndex;
    if (nextToken !== undefined) {
      this.keyStore.set(pageIndex + 1, nextToken);
    }

    this.currentState = { status: 'idle' };
    try {
      this.options.onPage(page.items, pageIndex, previousPageIndex);
    } catch (error) {
      this.currentPageIndex = previousPageIndex;
      this.nextPageAvailable = previousNextPageAvailable;
      throw error;
    }
  }

  /**
   * Call the fetcher, settling early when the signal aborts so a hung data
   * source cannot outlive its deadline or a superseding request.
   */
  private invoke(
    pageToken: K | undefined,
    request: FetchRequest,
    signal: AbortSignal,
    pageIndex: number
  ): Promise<FetchResult<K, T>> {
    return new Promise<FetchResult<K, T>>((resolve, reject) => {
      const onAbort = () => {
        if (isTimeoutAbortReason(signal.reason)) {
          reject(
            new TimeoutError(`Fetching page ${pageIndex} exceeded ${this.options.fetchTimeoutMs}ms`, {
              pageIndex,
              timeoutMs: this.options.fetchTimeoutMs,
            })
          );
        } else {
          reject(signal.reason);
        }
      };

      if (signal.aborted) {
        onAbort();
        return;
      }
      const removeAbortListener = onceAborted(signal, onAbort);

      let pending: Promise<FetchResult<K, T>>;
      try {
        pending = this.options.fetcher(request.pageSize, request.sortModel, pageToken, signal);
      } catch (error) {
        removeAbortListener();
        reject(error);
        return;
      }

      pending.then(
        (page) => {
          removeAbortListener();
          resolve(page);
        },
        (error: unknown) => {
          removeAbortListener();
          reject(error);
        }
      );
    });
  }
}
