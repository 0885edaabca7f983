// packages/refs/src/reference-index.ts
// Second pass over a finished batch: every [Table]/[Table/Field] tagged value
// must exist in the target's field. Nothing here throws; findings are issues.
import type {
  Diagnostics,
  EmptyReferenceConfig,
  FieldValue,
  Issue,
  RecordFields,
  RecordSet,
  ReferenceItem,
  ReferenceTag,
  ScalarValue,
  TypeDescriptor
} from '@cfgsheet/core';
import { formatType, scalarKind } from '@cfgsheet/grammar';

export type ScalarKind = 'number' | 'string' | 'boolean';

/** Fallback lookup for targets outside the batch, e.g. previously written outputs. */
export type TargetResolver = (table: string) => RecordSet | undefined;

export interface ReferenceOptions {
  emptyReference: EmptyReferenceConfig;
  resolveTarget?: TargetResolver;
  diagnostics?: Diagnostics;
}

export interface ReferenceReport {
  checked: number;
  skipped: number;
  issues: Issue[];
}

interface TargetIndex {
  field: string;
  present: boolean;
  kind?: ScalarKind;
  values: Set<ScalarValue>;
}

export function formatTag(tag: ReferenceTag): string {
  return tag.field ? `[${tag.table}/${tag.field}]` : `[${tag.table}]`;
}

export function kindOf(value: ScalarValue): ScalarKind {
  if (typeof value === 'number') return 'number';
  if (typeof value === 'string') return 'string';
  return 'boolean';
}

function isScalar(v: FieldValue): v is ScalarValue {
  return typeof v === 'number' || typeof v === 'string' || typeof v === 'boolean';
}

function scalarsOf(v: FieldValue): ScalarValue[] {
  if (isScalar(v)) return [v];
  if (Array.isArray(v)) return v.filter(isScalar);
  return [];
}

/**
 * Field a bare `[Table]` tag points at: `id` when records carry it, else the first
 * scalar, non-empty field of the first record.
 */
export function defaultTargetField(records: RecordSet): string {
  const first: RecordFields | undefined = records.values().next().value;
  if (!first || 'id' in first) return 'id';
  const found = Object.entries(first).find(([, v]) => isScalar(v) && v !== '');
  return found ? found[0] : 'id';
}

function indexTarget(records: RecordSet, field: string): TargetIndex {
  const index: TargetIndex = { field, present: false, values: new Set() };
  for (const fields of records.values()) {
    if (!(field in fields)) continue;
    index.present = true;
    for (const v of scalarsOf(fields[field])) {
      index.kind ??= kindOf(v);
      index.values.add(v);
    }
  }
  return index;
}

function isEmptySentinel(value: ScalarValue, declared: TypeDescriptor, empty: EmptyReferenceConfig): boolean {
  const kind = scalarKind(declared);
  if (kind === 'number') return typeof value === 'number' && empty.int.includes(value);
  if (kind === 'string') return typeof value === 'string' && empty.string.includes(value);
  return false;
}

function groupByField(items: ReferenceItem[]): Map<string, ReferenceItem[]> {
  const groups = new Map<string, ReferenceItem[]>();
  for (const item of items) {
    const key = `${item.sourceTable}\u0000${item.field}`;
    const list = groups.get(key);
    if (list) list.push(item);
    else groups.set(key, [item]);
  }
  return groups;
}

export function checkReferences(
  tables: ReadonlyMap<string, RecordSet>,
  pending: ReferenceItem[],
  opts: ReferenceOptions
): ReferenceReport {
  const report: ReferenceReport = { checked: 0, skipped: 0, issues: [] };
  const emit = (issue: Issue) => {
    report.issues.push(issue);
    opts.diagnostics?.report(issue);
  };

  const targets = new Map<string, RecordSet | undefined>();
  const lookup = (table: string): RecordSet | undefined => {
    if (!targets.has(table)) targets.set(table, tables.get(table) ?? opts.resolveTarget?.(table));
    return targets.get(table);
  };

  for (const items of groupByField(pending).values()) {
    const { sourceTable: table, field, target, declaredType } = items[0];
    const tag = formatTag(target);

    const records = lookup(target.table);
    if (!records) {
      emit({
        severity: 'warning',
        code: 'CFG_REF_TARGET_MISSING',
        message: `${table}.${field} references ${tag} but table ${target.table} is not available; skipped`,
        table, field
      });
      report.skipped += items.length;
      continue;
    }

    const index = indexTarget(records, target.field ?? defaultTargetField(records));
    if (!index.present && records.size > 0) {
      emit({
        severity: 'error',
        code: 'CFG_REF_TARGET_FIELD',
        message: `${table}.${field} references ${tag} but ${target.table} has no field ${index.field}`,
        table, field
      });
      report.skipped += items.length;
      continue;
    }

    const declaredKind = scalarKind(declaredType);
    if (declaredKind && index.kind && declaredKind !== index.kind) {
      emit({
        severity: 'error',
        code: 'CFG_REF_TYPE_MISMATCH',
        message: `${table}.${field} is ${formatType(declaredType)} but ${tag} holds ${index.kind} values`,
        table, field
      });
    }

    for (const item of items) {
      for (const value of scalarsOf(item.value)) {
        if (isEmptySentinel(value, declaredType, opts.emptyReference)) {
          report.skipped += 1;
          continue;
        }
        report.checked += 1;

        const kind = kindOf(value);
        if (index.kind && kind !== index.kind) {
          emit({
            severity: 'error',
            code: 'CFG_REF_KIND_MISMATCH',
            message: `${table} row ${item.row} ${field}: ${JSON.stringify(value)} is a ${kind}, ${tag} holds ${index.kind} values`,
            table, row: item.row, field, value
          });
          continue;
        }
        if (!index.values.has(value)) {
          emit({
            severity: 'error',
            code: 'CFG_REF_MISSING',
            message: `${table} row ${item.row} ${field}: ${JSON.stringify(value)} not found in ${tag}`,
            table, row: item.row, field, value
          });
        }
      }
    }
  }

  return report;
}
