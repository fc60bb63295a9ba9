/**
 * TableController - state of one paged, sortable, selectable table
 *
 * Materializes exactly one page of rows, fetched through an injected fetcher
 * that pages forward with opaque cursor tokens. The rendering layer reads the
 * public getters, calls the mutation API and listens on two channels:
 *
 * - `addListener` (coarse): fired after every state-affecting operation
 * - `addRowChangeListener` (per row): fired for a position when its row is
 *   edited, (un)selected or expanded/collapsed
 *
 * All state is owned by one logical thread; the only suspension point is the
 * fetcher. Overlapping fetches are sequenced by FetchCoordinator: the last
 * request issued wins.
 *
 * Usage:
 * ```typescript
 * const controller = new TableController<string, Customer>();
 * controller.init({
 *   columns: [{ id: 'name' }, { id: 'city' }],
 *   pageSizes: [10, 20, 50],
 *   initialPageSize: 20,
 *   fetcher: async (pageSize, sortModel, pageToken) => api.customers({ pageSize, sortModel, pageToken }),
 * });
 *
 * controller.addListener(() => render(controller));
 * await controller.nextPage();
 * ```
 */

import { randomUUID } from 'node:crypto';
import { createControllerLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';
import {
  ControllerStateError,
  IndexOutOfRangeError,
  ValidationError,
} from '../core/errors.js';
import type { FetchError } from '../core/errors.js';
import { DatasetWindow } from '../dataset/dataset-window.js';
import { RowChangeNotifier } from '../events/row-change-notifier.js';
import { SelectionSet } from '../selection/selection-set.js';
import {
  describeSortModel,
  nextSortModel,
  sortModelsEqual,
} from '../sorting/sort-model.js';
import type { SortModel } from '../sorting/sort-model.js';
import {
  ColumnsSchema,
  PageSizeSchema,
  TableInitOptionsSchema,
  parseOrThrow,
} from '../validation/schemas.js';
import type { ColumnInput, TableConfigurationInput } from '../validation/schemas.js';
import { FetchCoordinator } from './fetch-coordinator.js';
import type {
  ChangeListener,
  Fetcher,
  RowChangeListener,
  TableColumn,
  TableConfiguration,
  TableDebugSnapshot,
  TableRunState,
  Unsubscribe,
} from '../types/table-types.js';

export interface TableControllerInitOptions<K, T> {
  columns: readonly ColumnInput[];
  /** Page sizes offered to the user; `initialPageSize` must be one of them */
  pageSizes?: readonly number[];
  initialPageSize?: number;
  fetcher: Fetcher<K, T>;
  configuration?: TableConfigurationInput;
  /** Row equality used by `removeRow`; defaults to `Object.is` */
  rowEquals?: (a: T, b: T) => boolean;
}

export interface RefreshOptions {
  /** Forget every cursor and fetch page 0 instead of the current page */
  fromStart?: boolean;
}

const IDLE: TableRunState = { status: 'idle' };

export class TableController<K, T> {
  public readonly id: string;

  private readonly window = new DatasetWindow<T>();
  private readonly selection = new SelectionSet();
  private readonly expansion = new SelectionSet();
  private readonly notifier = new RowChangeNotifier<T>();
  private readonly log: Logger;

  private coordinator: FetchCoordinator<K, T> | null = null;
  private configuration: TableConfiguration | null = null;
  private boundColumns: readonly TableColumn[] = [];
  private availablePageSizes: readonly number[] | undefined;
  private currentPageSize = 0;
  private currentSortModel: SortModel | undefined;
  private rowEquals: (a: T, b: T) => boolean = Object.is;
  private fromStartPending = false;
  private disposed = false;

  constructor(id: string = randomUUID().substring(0, 8)) {
    this.id = id;
    this.log = createControllerLogger(id);
  }

  // ==========================================================================
  // Public state
  // ==========================================================================

  public get hasNextPage(): boolean {
    return this.coordinator?.hasNextPage ?? false;
  }

  public get hasPreviousPage(): boolean {
    return this.coordinator?.hasPreviousPage ?? false;
  }

  /**
   * Rows on the current page (not the size of the remote collection)
   */
  public get totalItems(): number {
    return this.window.length;
  }

  public get currentPageIndex(): number {
    return this.coordinator?.pageIndex ?? 0;
  }

  public get items(): T[] {
    return this.window.toArray();
  }

  public rowAt(index: number): T | undefined {
    return this.window.at(index);
  }

  public get columns(): readonly TableColumn[] {
    return this.boundColumns;
  }

  public get pageSizes(): readonly number[] | undefined {
    return this.availablePageSizes;
  }

  public get state(): TableRunState {
    return this.coordinator?.state ?? IDLE;
  }

  public get currentError(): FetchError | undefined {
    return this.coordinator?.currentError;
  }

  public get isInitialized(): boolean {
    return this.configuration !== null;
  }

  public get isDisposed(): boolean {
    return this.disposed;
  }

  public get tableConfiguration(): TableConfiguration | null {
    return this.configuration;
  }

  public get pageSize(): number {
    return this.currentPageSize;
  }

  /**
   * Changing the page size invalidates every cursor, so the table restarts
   * from page 0.
   *
   * @throws {ValidationError} for a non-positive size or one outside `pageSizes`
   */
  public set pageSize(pageSize: number) {
    this.assertUsable('set pageSize');
    const size = parseOrThrow(PageSizeSchema, pageSize, 'page size');
    if (this.availablePageSizes && !this.availablePageSizes.includes(size)) {
      throw new ValidationError(
        `Page size ${size} is not one of ${this.availablePageSizes.join(', ')}`,
        'pageSize'
      );
    }

    this.currentPageSize = size;
    if (this.coordinator) {
      void this.refresh({ fromStart: true });
    }
    this.notifier.notifyListeners();
  }

  public get sortModel(): SortModel | undefined {
    return this.currentSortModel;
  }

  /**
   * Replaces the sort and restarts from page 0; cursors depend on sort order.
   */
  public set sortModel(sortModel: SortModel | undefined) {
    this.assertUsable('set sortModel');
    this.currentSortModel = sortModel;
    if (this.coordinator) {
      void this.refresh({ fromStart: true });
    }
    this.notifier.notifyListeners();
  }

  /**
   * Header click: sort ascending on a new column, otherwise cycle the current
   * sort ascending → descending → unsorted.
   *
   * @throws {ValidationError} when `columnId` is not a sortable column
   */
  public swipeSortModel(columnId?: string): void {
    this.assertUsable('swipeSortModel');
    if (columnId !== undefined && this.boundColumns.length > 0) {
      const column = this.boundColumns.find((c) => c.id === columnId);
      if (!column || !column.sortable) {
        throw new ValidationError(`Column "${columnId}" is not sortable`, 'columnId');
      }
    }

    const next = nextSortModel(this.currentSortModel, columnId);
    if (sortModelsEqual(next, this.currentSortModel)) {
      return;
    }
    this.sortModel = next;
  }

  public get selectedRows(): number[] {
    return this.selection.toArray();
  }

  public get expandedRows(): number[] {
    return this.expansion.toArray();
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Bind columns, page sizes, fetcher and configuration, then schedule the
   * first fetch. Calling it again on a bound controller does nothing.
   *
   * @throws {ValidationError} for empty or duplicate columns, bad page sizes
   *   or bad configuration
   */
  public init(options: TableControllerInitOptions<K, T>): void {
    this.assertUsable('init');
    if (this.configuration !== null) {
      this.log.debug('Controller already initialized, ignoring init');
      return;
    }

    const parsed = parseOrThrow(
      TableInitOptionsSchema,
      {
        columns: options.columns,
        pageSizes: options.pageSizes,
        initialPageSize: options.initialPageSize,
        configuration: options.configuration,
      },
      'table options'
    );

    this.boundColumns = parsed.columns;
    this.availablePageSizes = parsed.pageSizes;
    this.currentPageSize = parsed.initialPageSize;
    this.configuration = parsed.configuration;
    this.rowEquals = options.rowEquals ?? Object.is;
    this.coordinator = new FetchCoordinator<K, T>({
      fetcher: options.fetcher,
      logger: this.log,
      fetchTimeoutMs: parsed.configuration.fetchTimeoutMs,
      onFetchStart: () => this.notifier.notifyListeners(),
      onPage: (items, pageIndex, previousPageIndex) =>
        this.mergePage(items, pageIndex, previousPageIndex),
      onError: () => this.discardPage(),
    });

    this.log.debug(
      { columns: parsed.columns.length, pageSize: parsed.initialPageSize },
      'Controller initialized'
    );
    this.scheduleInitialFetch();
  }

  /**
   * Rebind the columns and schedule a fetch of page 0.
   */
  public reset(columns: readonly ColumnInput[]): void {
    this.assertUsable('reset');
    this.requireCoordinator('reset');
    this.boundColumns = parseOrThrow(ColumnsSchema, columns, 'columns');
    this.scheduleInitialFetch();
  }

  /**
   * Abort the in-flight fetch and release every listener. Later calls to
   * fetching or mutating operations throw ControllerStateError.
   */
  public dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.coordinator?.dispose();
    this.notifier.dispose();
    this.log.debug('Controller disposed');
  }

  // ==========================================================================
  // Navigation
  // ==========================================================================

  /**
   * Fetch the page after the current one. Resolves once the fetch settles;
   * fetch failures are reported through `state`, not by rejecting.
   */
  public nextPage(): Promise<void> {
    const coordinator = this.requireCoordinator('nextPage');
    return this.fetch(coordinator.pageIndex + 1);
  }

  /**
   * Fetch the page before the current one, using the cursor learned when it
   * was first reached. Does nothing on page 0.
   */
  public previousPage(): Promise<void> {
    const coordinator = this.requireCoordinator('previousPage');
    if (!coordinator.hasPreviousPage) {
      this.log.warn('previousPage called on the first page, ignoring');
      return Promise.resolve();
    }
    return this.fetch(coordinator.pageIndex - 1);
  }

  /**
   * Re-fetch the current page, or with `fromStart` drop every cursor, empty
   * the window and fetch page 0.
   */
  public refresh({ fromStart = false }: RefreshOptions = {}): Promise<void> {
    const coordinator = this.requireCoordinator('refresh');
    if (!fromStart) {
      return this.fetch(coordinator.pageIndex);
    }

    coordinator.resetPagination();
    this.window.clear();
    this.fromStartPending = true;
    return this.fetch(0);
  }

  // ==========================================================================
  // Dataset mutation
  // ==========================================================================

  /**
   * Insert before `index`; `index === totalItems` appends.
   *
   * @throws {IndexOutOfRangeError} when `index` is negative or past the end
   */
  public insertAt(index: number, value: T): void {
    this.assertUsable('insertAt');
    this.window.insertAt(index, value);
    this.notifyRows([index]);
  }

  /**
   * Append `value`. The appended position is notified twice: once by the
   * insertion and once more for the new last row.
   */
  public insert(value: T): void {
    const index = this.window.length;
    this.insertAt(index, value);
    this.notifyRows([index]);
  }

  /**
   * @throws {IndexOutOfRangeError} unless 0 <= index < totalItems
   */
  public replace(index: number, value: T): void {
    this.assertUsable('replace');
    this.window.replace(index, value);
    this.notifyRows([index]);
  }

  /**
   * @throws {IndexOutOfRangeError} unless 0 <= index < totalItems
   */
  public removeRowAt(index: number): void {
    this.assertUsable('removeRowAt');
    this.window.removeAt(index);
    this.notifyRows([index]);
  }

  /**
   * Remove the first row equal to `item` under the `rowEquals` option.
   *
   * @throws {IndexOutOfRangeError} when no row matches; nothing is removed
   */
  public removeRow(item: T): void {
    this.assertUsable('removeRow');
    const index = this.window.indexOf(item, this.rowEquals);
    if (index === -1) {
      throw new IndexOutOfRangeError(
        index,
        this.window.length,
        'Item is not present in the current page'
      );
    }
    this.removeRowAt(index);
  }

  // ==========================================================================
  // Selection & expansion
  // ==========================================================================

  public isRowSelected(index: number): boolean {
    return this.selection.has(index);
  }

  public selectRow(index: number): void {
    this.assertRow('selectRow', index);
    this.notifyRows(this.selection.select(index));
  }

  /**
   * Accepts positions outside the window so stale selections can be dropped.
   */
  public unselectRow(index: number): void {
    this.assertUsable('unselectRow');
    this.notifyRows(this.selection.unselect(index));
  }

  public toggleRow(index: number): void {
    this.assertRow('toggleRow', index);
    this.notifyRows(this.selection.toggle(index));
  }

  /**
   * Select every row of the current page only.
   */
  public selectAllRows(): void {
    this.assertUsable('selectAllRows');
    this.notifyRows(this.selection.selectRange(this.window.length));
  }

  public unselectEveryRow(): void {
    this.assertUsable('unselectEveryRow');
    this.notifyRows(this.selection.clear());
  }

  public isRowExpanded(index: number): boolean {
    return this.expansion.has(index);
  }

  public expandRow(index: number): void {
    this.assertRow('expandRow', index);
    this.notifyRows(this.expansion.select(index));
  }

  public collapseRow(index: number): void {
    this.assertUsable('collapseRow');
    this.notifyRows(this.expansion.unselect(index));
  }

  public toggleRowExpansion(index: number): void {
    this.assertRow('toggleRowExpansion', index);
    this.notifyRows(this.expansion.toggle(index));
  }

  // ==========================================================================
  // Listeners
  // ==========================================================================

  public addRowChangeListener(index: number, listener: RowChangeListener<T>): void {
    this.assertUsable('addRowChangeListener');
    this.notifier.addRowChangeListener(index, listener);
  }

  public removeRowChangeListener(index: number, listener: RowChangeListener<T>): void {
    this.notifier.removeRowChangeListener(index, listener);
  }

  /**
   * Subscribe to coarse change notifications.
   *
   * @returns Unsubscribe function
   */
  public addListener(listener: ChangeListener): Unsubscribe {
    this.assertUsable('addListener');
    return this.notifier.subscribe(listener);
  }

  public removeListener(listener: ChangeListener): void {
    this.notifier.unsubscribe(listener);
  }

  // ==========================================================================
  // Diagnostics
  // ==========================================================================

  public debugSnapshot(): TableDebugSnapshot {
    const coordinator = this.coordinator;
    const error = this.currentError;
    return {
      controllerId: this.id,
      status: this.state.status,
      pageIndex: this.currentPageIndex,
      pageSize: this.currentPageSize,
      totalItems: this.window.length,
      hasNextPage: this.hasNextPage,
      sort: describeSortModel(this.currentSortModel),
      paginationKeys: coordinator ? coordinator.paginationKeys.entries().map(([, token]) => token) : [],
      selectedRows: this.selection.toArray(),
      expandedRows: this.expansion.toArray(),
      generation: coordinator?.generation ?? 0,
      ...(error ? { error: error.message } : {}),
    };
  }

  public toDebugString(): string {
    const snapshot = this.debugSnapshot();
    return [
      `TableController(${snapshot.controllerId})`,
      `   CurrentPageIndex(${snapshot.pageIndex}),`,
      `   PaginationKeys(${snapshot.paginationKeys.map(String).join(', ')}),`,
      `   Error(${snapshot.error ?? 'none'}),`,
      `   CurrentPageSize(${snapshot.pageSize}),`,
      `   TotalItems(${snapshot.totalItems}),`,
      `   Sort(${snapshot.sort}),`,
      `   State(${snapshot.status})`,
      ')',
    ].join('\n');
  }

  public logDebugState(): void {
    this.log.debug(this.debugSnapshot(), 'Controller state');
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async fetch(pageIndex: number): Promise<void> {
    const coordinator = this.requireCoordinator('fetch');
    await coordinator.fetchPage(pageIndex, {
      pageSize: this.currentPageSize,
      sortModel: this.currentSortModel,
    });
  }

  private scheduleInitialFetch(): void {
    queueMicrotask(() => {
      if (this.disposed) return;
      void this.fetch(0);
    });
  }

  private mergePage(items: readonly T[], pageIndex: number, previousPageIndex: number): void {
    const copyItems = this.configuration?.copyItems ?? false;
    this.window.replaceContents(copyItems ? [...items] : items);

    let released: number[] = [];
    const pageChanged = pageIndex !== previousPageIndex || this.fromStartPending;
    if (pageChanged && this.configuration?.clearSelectionOnPageChange) {
      released = [...new Set([...this.selection.clear(), ...this.expansion.clear()])];
    }
    this.fromStartPending = false;

    this.notifyRows(released);
  }

  private discardPage(): void {
    this.window.clear();
    this.notifier.notifyListeners();
  }

  /**
   * Per-row listeners for `indexes`, then one coarse broadcast.
   */
  private notifyRows(indexes: readonly number[]): void {
    this.notifier.dispatch(indexes, this.window.lookup);
  }

  private assertUsable(operation: string): void {
    if (this.disposed) {
      throw new ControllerStateError(`Cannot ${operation}: controller is disposed`, {
        controllerId: this.id,
        operation,
      });
    }
  }

  private assertRow(operation: string, index: number): void {
    this.assertUsable(operation);
    if (!Number.isInteger(index) || index < 0 || index >= this.window.length) {
      throw new IndexOutOfRangeError(index, this.window.length);
    }
  }

  private requireCoordinator(operation: string): FetchCoordinator<K, T> {
    this.assertUsable(operation);
    if (!this.coordinator) {
      throw new ControllerStateError(`Cannot ${operation}: controller is not initialized`, {
        controllerId: this.id,
        operation,
      });
    }
    return this.coordinator;
  }
}
