/* tests/helpers.ts */
// Fixture builders shared by package tests: a table is six header rows
// (remark, header, type, label, name, default) followed by data rows.
import { Diagnostics, type CellValue, type SheetInput, type TableInput, type WorkbookInput } from '@cfgsheet/core';
import { standardRegistry as stockRegistry, type CustomTypeRegistry } from '@cfgsheet/grammar';

export interface ColumnSpec {
  name: string;
  type: string;
  label?: string;
  default?: CellValue;
  header?: string;
  remark?: string;
}

export function headerRows(columns: ColumnSpec[]): CellValue[][] {
  return [
    columns.map((c) => c.remark ?? ''),
    columns.map((c) => c.header ?? ''),
    columns.map((c) => c.type),
    columns.map((c) => c.label ?? ''),
    columns.map((c) => c.name),
    columns.map((c) => c.default ?? null)
  ];
}

export function table(name: string, columns: ColumnSpec[], data: CellValue[][] = []): TableInput {
  return { name, rows: [...headerRows(columns), ...data] };
}

export function workbook(name: string, ...sheets: SheetInput[]): WorkbookInput {
  return { name, sheets };
}

export function standardRegistry(fallback = true): CustomTypeRegistry {
  return stockRegistry({ fallback });
}

export function buildContext(opts: { fallback?: boolean } = {}) {
  return { registry: standardRegistry(opts.fallback), diagnostics: new Diagnostics() };
}

export function issueCodes(diagnostics: Diagnostics): string[] {
  return diagnostics.issues.map((i) => i.code);
}

// ---- stock tables ----
export const ITEM_COLUMNS: ColumnSpec[] = [
  { name: 'id', type: 'int', header: 'Id' },
  { name: 'name', type: 'string', label: 'required', header: 'Name', remark: 'shown in shop' },
  { name: 'hp', type: 'int', default: 10, header: 'HP' },
  { name: 'tags', type: 'list(int)', header: 'Tags' },
  { name: 'pos', type: 'math.Vector2', header: 'Position' },
  { name: 'note', type: 'string', label: 'ignore' }
];

export function itemsTable(data: CellValue[][] = [
  [1, 'Sword', null, '1,2', '1#2', 'x'],
  [2, 'Shield', 25, '', null, null]
]): TableInput {
  return table('Items', ITEM_COLUMNS, data);
}

export const WAVE_COLUMNS: ColumnSpec[] = [
  { name: 'id', type: 'int' },
  { name: 'key1:stage', type: 'int' },
  { name: 'key2:wave', type: 'int' },
  { name: 'monster', type: 'string' }
];

export const ELEMENT_COLUMNS: ColumnSpec[] = [
  { name: 'key', type: 'string' },
  { name: 'power', type: 'int' }
];
