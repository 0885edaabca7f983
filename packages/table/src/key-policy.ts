// packages/table/src/key-policy.ts
// Three ways to derive an integer key per row; precedence string-enum > composite-int > single-int.
import {
  CompositeKeyOverflowError,
  CompositeKeyRangeError,
  DuplicatePrimaryKeyError,
  InvalidEnumKeyError,
  InvalidPrimaryKeyError,
  cellText,
  isSymbolicName,
  parseIntegerCell,
  type DataRow,
  type Diagnostics,
  type EnumKey,
  type FieldDescriptor,
  type KeyConflict,
  type KeyPolicy,
  type RowOffender,
  type TypeDescriptor
} from '@cfgsheet/core';

// floor(sqrt(2^31)): key1 * M + key2 stays below 2^31 for keys in [0, M).
// Generated data-access code carries the same constant, so it is not configurable.
export const COMPOSITE_KEY_MULTIPLIER = 46340;
export const COMPOSITE_KEY_LIMIT = 2 ** 31;

function isPrimitive(type: TypeDescriptor | undefined, name: 'int' | 'string'): boolean {
  return type?.kind === 'primitive' && type.name === name;
}

export function detectKeyPolicy(fields: FieldDescriptor[]): KeyPolicy {
  const [first, key1, key2] = fields;
  if (isPrimitive(first?.type, 'string')) return { kind: 'string-enum', keyField: first.actualName };

  if (
    key1?.keyTag === 'key1' && key2?.keyTag === 'key2' &&
    isPrimitive(key1.type, 'int') && isPrimitive(key2.type, 'int')
  ) {
    return { kind: 'composite-int', key1: key1.actualName, key2: key2.actualName, multiplier: COMPOSITE_KEY_MULTIPLIER };
  }

  return { kind: 'single-int', keyField: first?.actualName ?? 'id' };
}

export function combineCompositeKey(key1: number, key2: number): number {
  return key1 * COMPOSITE_KEY_MULTIPLIER + key2;
}

export function splitCompositeKey(key: number): [number, number] {
  return [Math.floor(key / COMPOSITE_KEY_MULTIPLIER), key % COMPOSITE_KEY_MULTIPLIER];
}

/** Keys seen on more than one row, with every row that carries them. */
export function conflictsOf<K extends string | number>(seen: Map<K, number[]>): KeyConflict[] {
  return [...seen].filter(([, rows]) => rows.length > 1).map(([key, rows]) => ({ key, rows }));
}

export function addRow<K>(seen: Map<K, number[]>, key: K, row: number): void {
  const rows = seen.get(key);
  if (rows) rows.push(row);
  else seen.set(key, [row]);
}

// ---------- validation (schema build time) ----------
function validateEnumKeys(table: string, rows: DataRow[]): void {
  const offenders: RowOffender[] = [];
  const seen = new Map<string, number[]>();
  for (const { row, cells } of rows) {
    const name = cellText(cells[0]);
    if (typeof cells[0] !== 'string' || !isSymbolicName(name)) {
      offenders.push({ value: cells[0], row });
      continue;
    }
    addRow(seen, name, row);
  }
  if (offenders.length) throw new InvalidEnumKeyError(table, offenders);
  const conflicts = conflictsOf(seen);
  if (conflicts.length) throw new DuplicatePrimaryKeyError(table, conflicts);
}

function validateCompositeKeys(table: string, policy: Extract<KeyPolicy, { kind: 'composite-int' }>, rows: DataRow[]): void {
  const offenders: RowOffender[] = [];
  const seen = new Map<number, number[]>();
  for (const { row, cells } of rows) {
    const k1 = parseIntegerCell(cells[1]);
    const k2 = parseIntegerCell(cells[2]);
    if (k1 === undefined) offenders.push({ value: cells[1], row });
    if (k2 === undefined) offenders.push({ value: cells[2], row });
    if (k1 === undefined || k2 === undefined) continue;

    if (k1 < 0 || k1 >= policy.multiplier || k2 < 0 || k2 >= policy.multiplier) {
      throw new CompositeKeyRangeError(table, row, k1, k2, policy.multiplier);
    }
    const combined = k1 * policy.multiplier + k2;
    if (combined >= COMPOSITE_KEY_LIMIT) throw new CompositeKeyOverflowError(table, combined, row);
    addRow(seen, combined, row);
  }
  if (offenders.length) throw new InvalidPrimaryKeyError(table, offenders, `${policy.key1}/${policy.key2}`);
  const conflicts = conflictsOf(seen);
  if (conflicts.length) throw new DuplicatePrimaryKeyError(table, conflicts);
}

function validateSingleKeys(table: string, policy: Extract<KeyPolicy, { kind: 'single-int' }>, rows: DataRow[], diagnostics: Diagnostics): void {
  const offenders = rows
    .filter(({ cells }) => parseIntegerCell(cells[0]) === undefined)
    .map(({ row, cells }) => ({ value: cells[0], row }));
  if (offenders.length) throw new InvalidPrimaryKeyError(table, offenders, policy.keyField);

  if (policy.keyField !== 'id') {
    diagnostics.warn(
      'CFG_KEY_NOT_ID',
      `Key column '${policy.keyField}' is not named id; its value is still written as the record id`,
      { table, field: policy.keyField, column: 0 }
    );
  }
}

export function validateKeys(table: string, policy: KeyPolicy, rows: DataRow[], diagnostics: Diagnostics): void {
  switch (policy.kind) {
    case 'string-enum': return validateEnumKeys(table, rows);
    case 'composite-int': return validateCompositeKeys(table, policy, rows);
    case 'single-int': return validateSingleKeys(table, policy, rows, diagnostics);
  }
}

/** Key of one validated row; `ordinal` is its position among data rows. */
export function deriveKey(table: string, policy: KeyPolicy, dataRow: DataRow, ordinal: number): number {
  const { row, cells } = dataRow;
  switch (policy.kind) {
    case 'string-enum':
      return ordinal;
    case 'composite-int': {
      const k1 = parseIntegerCell(cells[1]);
      const k2 = parseIntegerCell(cells[2]);
      if (k1 === undefined || k2 === undefined) {
        throw new InvalidPrimaryKeyError(table, [{ value: k1 === undefined ? cells[1] : cells[2], row }]);
      }
      return combineCompositeKey(k1, k2);
    }
    case 'single-int': {
      const key = parseIntegerCell(cells[0]);
      if (key === undefined) throw new InvalidPrimaryKeyError(table, [{ value: cells[0], row }], policy.keyField);
      return key;
    }
  }
}

/** (name, ordinal) of every row of a string-enum table; empty for the other policies. */
export function enumKeysOf(policy: KeyPolicy, rows: DataRow[]): EnumKey[] {
  if (policy.kind !== 'string-enum') return [];
  return rows.map(({ row, cells }, ordinal) => ({ name: cellText(cells[0]), value: ordinal, row }));
}
