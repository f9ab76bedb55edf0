import type { DdlStatement, ReferentialAction } from './model';
import type { ExclusivityTrigger, TriggerCheck, TriggerEvent } from './triggerGenerator';

export type DialectName = 'postgres' | 'mysql';

export interface ForeignKeySpec {
  readonly table: string;
  readonly name: string;
  readonly column: string;
  readonly referencedTable: string;
  readonly referencedColumn: string;
  readonly onDelete: ReferentialAction;
}

export interface IndexSpec {
  readonly table: string;
  readonly name: string;
  readonly column: string;
}

/**
 * Renders constraint objects for one database engine.
 */
export interface Dialect {
  readonly name: DialectName;
  /**
   * Whether an index must exist before its foreign key.
   * Engines that create an implicit index otherwise would leave it behind on removal.
   */
  readonly indexBeforeForeignKey: boolean;
  /** Problem with an identifier on this engine, if any. */
  identifierProblem(name: string): string | undefined;
  addForeignKey(fk: ForeignKeySpec): DdlStatement;
  dropForeignKey(fk: ForeignKeySpec): DdlStatement;
  createIndex(index: IndexSpec): DdlStatement;
  dropIndex(index: IndexSpec): DdlStatement;
  createTrigger(trigger: ExclusivityTrigger): DdlStatement[];
  dropTrigger(trigger: ExclusivityTrigger): DdlStatement[];
}

/**
 * Escape a PostgreSQL identifier (table or column name).
 * Doubles any embedded double-quotes to prevent SQL injection.
 */
export function escapeIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Escape a PostgreSQL string literal.
 */
export function escapeLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function onDeleteClause(action: ReferentialAction): string {
  return action === 'NO ACTION' ? '' : ` ON DELETE ${action}`;
}

function byteLength(name: string): number {
  return new TextEncoder().encode(name).length;
}

// === PostgreSQL ===

const POSTGRES_MAX_IDENTIFIER_BYTES = 63;

function renderPostgresCheck(check: TriggerCheck, q: (name: string) => string): string[] {
  switch (check.type) {
    case 'exactlyOne': {
      const args = check.columns.map(c => `NEW.${q(c)}`).join(', ');
      // RAISE treats % as a placeholder.
      const format = `${check.message}, found %`.replace(/%(?!$)/g, '%%');
      return [
        `  set_count := num_nonnulls(${args});`,
        `  IF set_count <> 1 THEN`,
        `    RAISE EXCEPTION ${escapeLiteral(format)}, set_count USING ERRCODE = 'check_violation';`,
        `  END IF;`,
      ];
    }
    case 'uniqueActiveValue':
      return check.columns.flatMap(({ column, message }) => [
        `  IF NEW.${q(column)} IS NOT NULL AND EXISTS (`,
        `    SELECT 1 FROM ${q(check.table)}`,
        // OLD is the row being updated, still present under its old key.
        `    WHERE ${q(column)} = NEW.${q(column)} AND NOT (TG_OP = 'UPDATE' AND ${q(check.primaryKey)} = OLD.${q(check.primaryKey)})`,
        `  ) THEN`,
        `    RAISE EXCEPTION ${escapeLiteral(message.replace(/%/g, '%%'))} USING ERRCODE = 'check_violation';`,
        `  END IF;`,
      ]);
  }
}

export const postgresDialect: Dialect = {
  name: 'postgres',
  indexBeforeForeignKey: false,

  identifierProblem(name) {
    if (byteLength(name) > POSTGRES_MAX_IDENTIFIER_BYTES) {
      return `identifier "${name}" exceeds ${POSTGRES_MAX_IDENTIFIER_BYTES} bytes and would be truncated`;
    }
    if (name.includes('$$')) {
      return `identifier "${name}" contains "$$", which would terminate the trigger function body`;
    }
    return undefined;
  },

  addForeignKey(fk) {
    const q = escapeIdentifier;
    return {
      kind: 'foreignKey',
      name: fk.name,
      sql: `ALTER TABLE ${q(fk.table)} ADD CONSTRAINT ${q(fk.name)} FOREIGN KEY (${q(fk.column)}) REFERENCES ${q(fk.referencedTable)} (${q(fk.referencedColumn)})${onDeleteClause(fk.onDelete)};`,
    };
  },

  dropForeignKey(fk) {
    return {
      kind: 'foreignKey',
      name: fk.name,
      sql: `ALTER TABLE ${escapeIdentifier(fk.table)} DROP CONSTRAINT ${escapeIdentifier(fk.name)};`,
    };
  },

  createIndex(index) {
    const q = escapeIdentifier;
    return {
      kind: 'index',
      name: index.name,
      sql: `CREATE INDEX ${q(index.name)} ON ${q(index.table)} (${q(index.column)});`,
    };
  },

  dropIndex(index) {
    return { kind: 'index', name: index.name, sql: `DROP INDEX ${escapeIdentifier(index.name)};` };
  },

  createTrigger(trigger) {
    const q = escapeIdentifier;
    const body = [
      'DECLARE',
      '  set_count integer;',
      'BEGIN',
      ...trigger.checks.flatMap(check => renderPostgresCheck(check, q)),
      '  RETURN NEW;',
      'END;',
    ].join('\n');
    const events = trigger.events.map(e => e.toUpperCase()).join(' OR ');

    return [
      {
        kind: 'function',
        name: trigger.functionName,
        sql: `CREATE FUNCTION ${q(trigger.functionName)}() RETURNS trigger LANGUAGE plpgsql AS $$\n${body}\n$$;`,
      },
      {
        kind: 'trigger',
        name: trigger.name,
        sql: `CREATE TRIGGER ${q(trigger.name)} BEFORE ${events} ON ${q(trigger.table)} FOR EACH ROW EXECUTE FUNCTION ${q(trigger.functionName)}();`,
      },
    ];
  },

  dropTrigger(trigger) {
    const q = escapeIdentifier;
    return [
      { kind: 'trigger', name: trigger.name, sql: `DROP TRIGGER ${q(trigger.name)} ON ${q(trigger.table)};` },
      { kind: 'function', name: trigger.functionName, sql: `DROP FUNCTION ${q(trigger.functionName)}();` },
    ];
  },
};

// === MySQL ===

const MYSQL_MAX_IDENTIFIER_LENGTH = 64;
const MYSQL_MAX_MESSAGE_TEXT = 128;

function quoteMysqlIdentifier(name: string): string {
  return `\`${name.replace(/`/g, '``')}\``;
}

function quoteMysqlLiteral(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "''")}'`;
}

function mysqlSignal(message: string): string {
  return `    SIGNAL SQLSTATE '45000' SET MESSAGE_TEXT = ${quoteMysqlLiteral(message.slice(0, MYSQL_MAX_MESSAGE_TEXT))};`;
}

function renderMysqlCheck(check: TriggerCheck, event: TriggerEvent): string[] {
  const q = quoteMysqlIdentifier;
  switch (check.type) {
    case 'exactlyOne': {
      const sum = check.columns.map(c => `(NEW.${q(c)} IS NOT NULL)`).join(' + ');
      return [
        `  IF (${sum}) <> 1 THEN`,
        mysqlSignal(check.message),
        `  END IF;`,
      ];
    }
    case 'uniqueActiveValue':
      return check.columns.flatMap(({ column, message }) => [
        `  IF NEW.${q(column)} IS NOT NULL AND EXISTS (`,
        `    SELECT 1 FROM ${q(check.table)}`,
        event === 'update'
          ? `    WHERE ${q(column)} = NEW.${q(column)} AND ${q(check.primaryKey)} <> OLD.${q(check.primaryKey)}`
          : `    WHERE ${q(column)} = NEW.${q(column)}`,
        `  ) THEN`,
        mysqlSignal(message),
        `  END IF;`,
      ]);
  }
}

/** MySQL triggers fire on a single event, so the program becomes one trigger per event. */
export function mysqlTriggerName(trigger: ExclusivityTrigger, event: TriggerEvent): string {
  return `${trigger.name}_${event}`;
}

export const mysqlDialect: Dialect = {
  name: 'mysql',
  indexBeforeForeignKey: true,

  identifierProblem(name) {
    if (name.length > MYSQL_MAX_IDENTIFIER_LENGTH) {
      return `identifier "${name}" exceeds ${MYSQL_MAX_IDENTIFIER_LENGTH} characters`;
    }
    return undefined;
  },

  addForeignKey(fk) {
    const q = quoteMysqlIdentifier;
    return {
      kind: 'foreignKey',
      name: fk.name,
      sql: `ALTER TABLE ${q(fk.table)} ADD CONSTRAINT ${q(fk.name)} FOREIGN KEY (${q(fk.column)}) REFERENCES ${q(fk.referencedTable)} (${q(fk.referencedColumn)})${onDeleteClause(fk.onDelete)};`,
    };
  },

  dropForeignKey(fk) {
    const q = quoteMysqlIdentifier;
    return { kind: 'foreignKey', name: fk.name, sql: `ALTER TABLE ${q(fk.table)} DROP FOREIGN KEY ${q(fk.name)};` };
  },

  createIndex(index) {
    const q = quoteMysqlIdentifier;
    return {
      kind: 'index',
      name: index.name,
      sql: `CREATE INDEX ${q(index.name)} ON ${q(index.table)} (${q(index.column)});`,
    };
  },

  dropIndex(index) {
    const q = quoteMysqlIdentifier;
    return { kind: 'index', name: index.name, sql: `DROP INDEX ${q(index.name)} ON ${q(index.table)};` };
  },

  createTrigger(trigger) {
    const q = quoteMysqlIdentifier;
    return trigger.events.map((event): DdlStatement => {
      const name = mysqlTriggerName(trigger, event);
      const body = trigger.checks.flatMap(check => renderMysqlCheck(check, event)).join('\n');
      return {
        kind: 'trigger',
        name,
        sql: `CREATE TRIGGER ${q(name)} BEFORE ${event.toUpperCase()} ON ${q(trigger.table)} FOR EACH ROW\nBEGIN\n${body}\nEND;`,
      };
    });
  },

  dropTrigger(trigger) {
    return [...trigger.events].reverse().map((event): DdlStatement => {
      const name = mysqlTriggerName(trigger, event);
      return { kind: 'trigger', name, sql: `DROP TRIGGER ${quoteMysqlIdentifier(name)};` };
    });
  },
};

const DIALECTS: Record<DialectName, Dialect> = {
  postgres: postgresDialect,
  mysql: mysqlDialect,
};

export function isDialectName(name: string): name is DialectName {
  return name in DIALECTS;
}

export function getDialect(dialect: DialectName | Dialect = 'postgres'): Dialect {
  return typeof dialect === 'string' ? DIALECTS[dialect] : dialect;
}
