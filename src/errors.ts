/**
 * Error taxonomy for mapping declaration, compilation and resolution.
 */

/**
 * A polymorphic mapping declaration is malformed.
 * Carries every problem found, not just the first.
 */
export class InvalidMappingError extends Error {
  readonly issues: readonly string[];

  constructor(subject: string, issues: readonly string[]) {
    super(`Invalid polymorphic mapping for ${subject}: ${issues.join('; ')}`);
    this.name = 'InvalidMappingError';
    this.issues = issues;
  }
}

/**
 * The compiler cannot express a mapping as constraints on the target engine.
 */
export class UnsupportedMappingError extends Error {
  readonly ownerTable: string;
  readonly reason: string;

  constructor(ownerTable: string, reason: string) {
    super(`Cannot compile polymorphic constraints for "${ownerTable}": ${reason}`);
    this.name = 'UnsupportedMappingError';
    this.ownerTable = ownerTable;
    this.reason = reason;
  }
}

/**
 * The active foreign key points at a row that does not exist.
 * Only possible when the foreign-key constraint was bypassed.
 */
export class DanglingReferenceError extends Error {
  readonly ownerTable: string;
  readonly column: string;
  readonly referencedTable: string;
  readonly value: unknown;

  constructor(ownerTable: string, column: string, referencedTable: string, value: unknown) {
    super(
      `${ownerTable}.${column} references ${referencedTable} ${JSON.stringify(value)}, which does not exist`
    );
    this.name = 'DanglingReferenceError';
    this.ownerTable = ownerTable;
    this.column = column;
    this.referencedTable = referencedTable;
    this.value = value;
  }
}

/** SQLSTATE raised by the Postgres exclusivity trigger. */
export const CHECK_VIOLATION = '23514';

/** SQLSTATE signalled by the MySQL exclusivity triggers. */
export const MYSQL_USER_SIGNAL = '45000';

/**
 * Whether a driver error is the exclusivity trigger rejecting a row.
 * pg and PGlite expose the SQLSTATE as `code`; mysql2 as `sqlState`.
 */
export function isExclusivityViolation(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (!error.message.includes('exactly one of') && !error.message.includes('is already used by another row')) {
    return false;
  }
  const code = 'code' in error ? error.code : undefined;
  const sqlState = 'sqlState' in error ? error.sqlState : undefined;
  return code === CHECK_VIOLATION || sqlState === MYSQL_USER_SIGNAL;
}
