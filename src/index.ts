/**
 * Paged Table Controller
 *
 * State controller for tables that page through a remote collection with
 * opaque cursor tokens: pagination bookkeeping, fetch orchestration,
 * dataset-window edits, positional selection, sort toggling and change
 * notifications for a rendering layer.
 */

export { TableController } from './controller/table-controller.js';
export type { TableControllerInitOptions, RefreshOptions } from './controller/table-controller.js';
export { FetchCoordinator } from './controller/fetch-coordinator.js';
export type { FetchOutcome, FetchRequest, FetchCoordinatorOptions } from './controller/fetch-coordinator.js';

export { PaginationKeyStore } from './pagination/pagination-key-store.js';
export { SelectionSet } from './selection/selection-set.js';
export { DatasetWindow } from './dataset/dataset-window.js';
export { RowChangeNotifier } from './events/row-change-notifier.js';
export type { RowLookup } from './events/row-change-notifier.js';
export {
  sortAscending,
  sortDescending,
  sortModelsEqual,
  nextSortModel,
  describeSortModel,
} from './sorting/sort-model.js';
export type { SortModel } from './sorting/sort-model.js';

// Export types
export type * from './types/table-types.js';

// Export validation
export {
  ColumnSchema,
  ColumnsSchema,
  PageSizeSchema,
  TableConfigurationSchema,
  TableInitOptionsSchema,
  validate,
  parseOrThrow,
} from './validation/schemas.js';
export type { ColumnInput, TableConfigurationInput } from './validation/schemas.js';

// Export utilities
export * from './core/errors.js';
export { ok, err, isOk, isErr } from './core/result.js';
export type { Result } from './core/result.js';
export { logger, createChildLogger, createControllerLogger, LogLevels } from './core/logger.js';
export { config } from './core/config.js';
