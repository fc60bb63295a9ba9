/**
 * Validation Schemas
 *
 * Zod schemas for controller init options and configuration. Defaults come
 * from the environment-backed config so a host can tune every controller at
 * once.
 */

import { z } from 'zod';
import type { ZodError, ZodTypeAny } from 'zod';
import { tableDefaults } from '../core/config.js';
import { ValidationError } from '../core/errors.js';
import { err, ok, unwrap } from '../core/result.js';
import type { Result } from '../core/result.js';

/**
 * Positive integer page size
 */
export const PageSizeSchema = z
  .number({
    invalid_type_error: 'page size must be a number',
  })
  .int('page size must be an integer')
  .positive('page size must be positive');

export const ColumnSchema = z.object({
  id: z.string().trim().min(1, 'column id cannot be empty'),
  title: z.string().optional(),
  sortable: z.boolean().default(true),
});

export const ColumnsSchema = z
  .array(ColumnSchema)
  .min(1, 'columns cannot be empty')
  .refine((columns) => new Set(columns.map((c) => c.id)).size === columns.length, {
    message: 'column ids must be unique',
  });

export const TableConfigurationSchema = z
  .object({
    copyItems: z.boolean().default(tableDefaults.copyItems),
    clearSelectionOnPageChange: z.boolean().default(tableDefaults.clearSelectionOnPageChange),
    fetchTimeoutMs: z
      .number()
      .int('fetchTimeoutMs must be an integer')
      .min(0, 'fetchTimeoutMs must be non-negative')
      .default(tableDefaults.fetchTimeoutMs),
  })
  .default({});

/**
 * Everything in the init options except the fetcher, which is a function and
 * checked by the type system.
 */
export const TableInitOptionsSchema = z
  .object({
    columns: ColumnsSchema,
    pageSizes: z.array(PageSizeSchema).min(1, 'pageSizes cannot be empty').optional(),
    initialPageSize: PageSizeSchema.default(tableDefaults.pageSize),
    configuration: TableConfigurationSchema,
  })
  .refine(
    (options) => options.pageSizes === undefined || options.pageSizes.includes(options.initialPageSize),
    { message: 'initialPageSize must be one of pageSizes', path: ['initialPageSize'] }
  );

export type ColumnInput = z.input<typeof ColumnSchema>;
export type TableConfigurationInput = z.input<typeof TableConfigurationSchema>;
export type ParsedTableInitOptions = z.output<typeof TableInitOptionsSchema>;

/**
 * Converts Zod validation error to ValidationError.
 */
function zodErrorToValidationError(zodError: ZodError, what: string): ValidationError {
  const issues = zodError.issues;
  const validationErrors = issues.map((issue) => {
    const path = issue.path.join('.');
    return `${path ? path + ': ' : ''}${issue.message}`;
  });

  const firstField = issues[0]?.path[0];
  const field = firstField !== undefined ? String(firstField) : undefined;

  return new ValidationError(`Invalid ${what}`, field, validationErrors, {
    zodIssues: issues,
  });
}

export function validate<S extends ZodTypeAny>(
  schema: S,
  input: unknown,
  what: string
): Result<z.output<S>, ValidationError> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    return err(zodErrorToValidationError(parsed.error, what));
  }
  return ok(parsed.data);
}

/**
 * @throws {ValidationError} listing every issue as `path: message`
 */
export function parseOrThrow<S extends ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  return unwrap(validate(schema, input, what));
}
