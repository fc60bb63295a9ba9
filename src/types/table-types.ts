/**
 * Shared types for the table controller and its collaborators.
 */

import type { FetchError } from '../core/errors.js';
import type { SortModel } from '../sorting/sort-model.js';

/**
 * One page returned by the data source.
 * A missing or null `nextPageToken` means there is no next page.
 */
export interface FetchResult<K, T> {
  readonly items: readonly T[];
  readonly nextPageToken?: K | null;
}

/**
 * The injected fetch capability.
 *
 * `pageToken` is undefined for page 0 and for any page whose token was never
 * learned. `signal` aborts when the request is superseded, times out, or the
 * controller is disposed; honoring it is optional.
 */
export type Fetcher<K, T> = (
  pageSize: number,
  sortModel: SortModel | undefined,
  pageToken: K | undefined,
  signal: AbortSignal
) => Promise<FetchResult<K, T>>;

/** Called with the row position and the row currently at that position */
export type RowChangeListener<T> = (index: number, item: T) => void;

/** Coarse notification: something about the table changed */
export type ChangeListener = () => void;

export type Unsubscribe = () => void;

/**
 * Column descriptor. The controller only needs identity and sortability;
 * rendering concerns live with the consumer.
 */
export interface TableColumn {
  readonly id: string;
  readonly title?: string;
  readonly sortable: boolean;
}

/**
 * Controller run state
 */
export type TableRunState =
  | { readonly status: 'idle' }
  | { readonly status: 'fetching' }
  | { readonly status: 'error'; readonly error: FetchError };

export type TableStatus = TableRunState['status'];

/**
 * Flags consumed while merging fetched pages
 */
export interface TableConfiguration {
  /** Merge a shallow copy (`[...items]`) of each fetched array; rows keep their identity */
  readonly copyItems: boolean;
  /** Drop selection and expansion when a different page (or a from-start refresh) lands */
  readonly clearSelectionOnPageChange: boolean;
  /** Deadline for a single fetch in ms; 0 disables it */
  readonly fetchTimeoutMs: number;
}

/**
 * Plain snapshot of controller internals for diagnostics
 */
export interface TableDebugSnapshot {
  readonly controllerId: string;
  readonly status: TableStatus;
  readonly pageIndex: number;
  readonly pageSize: number;
  readonly totalItems: number;
  readonly hasNextPage: boolean;
  readonly sort: string;
  readonly paginationKeys: readonly unknown[];
  readonly selectedRows: readonly number[];
  readonly expandedRows: readonly number[];
  readonly generation: number;
  readonly error?: string;
}
