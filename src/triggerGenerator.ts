import type { PolymorphicMapping } from './model';
import { declaredColumns } from './model';
import { triggerName, triggerFunctionName } from './naming';

/**
 * Dialect-neutral description of the exclusivity trigger.
 *
 * Checks run in order on the final row image, before insert and before
 * update. A dialect renders the program into its own procedural SQL.
 */
export interface ExclusivityTrigger {
  readonly table: string;
  readonly name: string;
  /** Routine the trigger calls, for dialects that separate the two. */
  readonly functionName: string;
  readonly timing: 'before';
  readonly events: readonly TriggerEvent[];
  readonly checks: readonly TriggerCheck[];
}

export type TriggerEvent = 'insert' | 'update';

export type TriggerCheck = ExactlyOneCheck | UniqueActiveValueCheck;

/** Abort unless exactly one of `columns` is non-null. */
export interface ExactlyOneCheck {
  readonly type: 'exactlyOne';
  readonly columns: readonly string[];
  readonly message: string;
}

/**
 * Abort when the non-null column's value appears in another row.
 * Runs after `exactlyOne`, so at most one column is set at that point.
 * On update the row's own old image is skipped by its old primary key.
 */
export interface UniqueActiveValueCheck {
  readonly type: 'uniqueActiveValue';
  readonly table: string;
  readonly primaryKey: string;
  readonly columns: readonly { readonly column: string; readonly message: string }[];
}

export function exclusivityMessage(table: string, columns: readonly string[]): string {
  return `${table}: exactly one of (${columns.join(', ')}) must be set`;
}

export function duplicateValueMessage(table: string, column: string): string {
  // MySQL cuts MESSAGE_TEXT at 128 characters; the marker text comes first.
  return `active value is already used by another row: ${table}.${column}`;
}

export function buildExclusivityTrigger(mapping: PolymorphicMapping): ExclusivityTrigger {
  const columns = declaredColumns(mapping);
  const checks: TriggerCheck[] = [{
    type: 'exactlyOne',
    columns,
    message: exclusivityMessage(mapping.ownerTable, columns),
  }];

  if (mapping.options.uniqueAcrossColumns) {
    checks.push({
      type: 'uniqueActiveValue',
      table: mapping.ownerTable,
      primaryKey: mapping.primaryKey,
      columns: columns.map(column => ({
        column,
        message: duplicateValueMessage(mapping.ownerTable, column),
      })),
    });
  }

  return {
    table: mapping.ownerTable,
    name: triggerName(mapping),
    functionName: triggerFunctionName(mapping),
    timing: 'before',
    events: ['insert', 'update'],
    checks,
  };
}
