/**
 * Sort Model
 *
 * Immutable description of the active sort: one field and a direction.
 * An absent model (undefined) means the table is unsorted.
 */

export interface SortModel {
  readonly fieldName: string;
  readonly descending: boolean;
}

export function sortAscending(fieldName: string): SortModel {
  return Object.freeze({ fieldName, descending: false });
}

export function sortDescending(fieldName: string): SortModel {
  return Object.freeze({ fieldName, descending: true });
}

export function sortModelsEqual(
  a: SortModel | undefined,
  b: SortModel | undefined
): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  return a.fieldName === b.fieldName && a.descending === b.descending;
}

/**
 * Tri-state toggle used by column headers.
 *
 * A column id that differs from the current field starts an ascending sort on
 * it. Otherwise (no id, or the same field) the current sort cycles
 * ascending → descending → unsorted. Unsorted with no id stays unsorted.
 *
 * @example
 * ```ts
 * let model = nextSortModel(undefined, 'name'); // name asc
 * model = nextSortModel(model, 'name');         // name desc
 * model = nextSortModel(model);                 // undefined
 * ```
 */
export function nextSortModel(
  current: SortModel | undefined,
  columnId?: string
): SortModel | undefined {
  if (columnId !== undefined && current?.fieldName !== columnId) {
    return sortAscending(columnId);
  }

  if (current === undefined) {
    return undefined;
  }

  return current.descending ? undefined : sortDescending(current.fieldName);
}

export function describeSortModel(model: SortModel | undefined): string {
  if (model === undefined) {
    return 'unsorted';
  }
  return `${model.fieldName} ${model.descending ? 'desc' : 'asc'}`;
}
