// packages/table/src/table-schema.ts
import {
  DuplicateFieldError,
  InvalidFieldNameError,
  InvalidReferenceTagError,
  alignRow,
  identifierProblem,
  isBlankRow,
  isEmptyCell,
  type DataRow,
  type Diagnostics,
  type FieldDescriptor,
  type TableInput,
  type TableSchema,
  type TypeDescriptor
} from '@cfgsheet/core';
import type { CustomTypeRegistry } from '@cfgsheet/grammar';
import { FIRST_DATA_ROW, HEADER_ROW_COUNT, alignHeaderRows, parseFields } from './header';
import { detectKeyPolicy, validateKeys } from './key-policy';

export interface BuildContext {
  registry: CustomTypeRegistry;
  diagnostics: Diagnostics;
}

/** A non-ignored, non-key column: what ends up as a record property. */
export type ExportedField = FieldDescriptor & { type: TypeDescriptor };

export function isExportedField(f: FieldDescriptor): f is ExportedField {
  return f.index > 0 && f.label !== 'ignore' && f.type !== undefined;
}

export function exportedFields(schema: Pick<TableSchema, 'fields'>): ExportedField[] {
  return schema.fields.filter(isExportedField);
}

function findDuplicates(names: string[]): string[] {
  const seen = new Set<string>();
  const dups = new Set<string>();
  for (const n of names) {
    if (!n) continue;
    if (seen.has(n)) dups.add(n);
    seen.add(n);
  }
  return [...dups].sort();
}

function checkFieldNames(table: string, fields: FieldDescriptor[]): void {
  const exported = fields.filter(isExportedField);
  const dups = new Set([
    ...findDuplicates(fields.map((f) => f.rawName)),
    ...findDuplicates(exported.map((f) => f.actualName))
  ]);
  if (dups.size) throw new DuplicateFieldError(table, [...dups].sort());

  for (const f of exported) {
    const problem = identifierProblem(f.actualName);
    if (problem) throw new InvalidFieldNameError(table, f.rawName || f.actualName, f.index, problem);
    if (f.actualName === 'id') throw new InvalidFieldNameError(table, f.rawName, f.index, 'id is reserved for the record key');

    if (f.reference && (f.type.kind === 'map' || f.type.kind === 'custom')) {
      throw new InvalidReferenceTagError(table, f.actualName, f.index, `references need a scalar or list type, not ${f.type.kind}`);
    }
  }
}

function collectDataRows(table: string, rows: TableInput['rows'], width: number, diagnostics: Diagnostics): DataRow[] {
  const out: DataRow[] = [];
  rows.slice(HEADER_ROW_COUNT).forEach((cells, i) => {
    const row = FIRST_DATA_ROW + i;
    if (isBlankRow(cells)) {
      diagnostics.info('CFG_BLANK_ROW', `Skipped blank row ${row}`, { table, row });
      return;
    }
    if (cells.slice(width).some((c) => !isEmptyCell(c))) {
      diagnostics.warn('CFG_ROW_TRUNCATED', `Row ${row} has values beyond the last named column; they are dropped`, { table, row });
    }
    out.push({ row, cells: alignRow(cells, width) });
  });
  return out;
}

/**
 * Header rows -> fields -> key policy, then validates the key column(s) of every
 * data row. Everything thrown from here is fatal for the table.
 */
export function buildTableSchema(input: TableInput, ctx: BuildContext): TableSchema {
  const { name } = input;
  const header = alignHeaderRows(name, input.rows, ctx.diagnostics);
  const fields = parseFields(name, header, ctx.registry);
  checkFieldNames(name, fields);

  const keyPolicy = detectKeyPolicy(fields);
  const rows = collectDataRows(name, input.rows, fields.length, ctx.diagnostics);
  if (rows.length === 0) ctx.diagnostics.info('CFG_EMPTY_TABLE', `Table ${name} has no data rows`, { table: name });

  validateKeys(name, keyPolicy, rows, ctx.diagnostics);
  return { name, fields, keyPolicy, rows };
}
