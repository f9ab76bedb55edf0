import type { ActiveKeyState, KeyValue, PolymorphicMapping } from './model';

/**
 * Read access to an entity's current, possibly unsaved, attribute values.
 */
export interface AttributeReader {
  currentValue(column: string): unknown;
}

export type AttributeSource = AttributeReader | ReadonlyMap<string, unknown> | Readonly<Record<string, unknown>>;

function isMap(source: AttributeSource): source is ReadonlyMap<string, unknown> {
  return source instanceof Map;
}

function isAttributeReader(source: AttributeSource): source is AttributeReader {
  return 'currentValue' in source && typeof source.currentValue === 'function';
}

/**
 * Normalize any supported attribute source to a reader.
 */
export function toAttributeReader(source: AttributeSource): AttributeReader {
  if (isMap(source)) {
    return { currentValue: column => source.get(column) };
  }
  if (isAttributeReader(source)) {
    return source;
  }
  const record: Readonly<Record<string, unknown>> = source;
  return {
    currentValue: column => (Object.prototype.hasOwnProperty.call(record, column) ? record[column] : undefined),
  };
}

function isSet(value: unknown): value is KeyValue {
  return value !== null && value !== undefined;
}

/**
 * Which declared column, if any, is active.
 *
 * Absent and `undefined` values count as null. Several set columns are a
 * conflict; declaration order never picks one.
 */
export function resolve(mapping: PolymorphicMapping, values: AttributeSource): ActiveKeyState {
  const reader = toAttributeReader(values);
  const set: { column: string; value: KeyValue }[] = [];

  for (const { column } of mapping.relations) {
    const value = reader.currentValue(column);
    if (isSet(value)) {
      set.push({ column, value });
    }
  }

  if (set.length === 0) {
    return { type: 'unset' };
  }
  if (set.length === 1) {
    return { type: 'resolved', column: set[0].column, value: set[0].value };
  }
  return { type: 'conflict', columns: set.map(s => s.column) };
}
