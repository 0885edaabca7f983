// packages/table/src/describe.ts
// Structural description handed to the code generator.
import {
  DuplicatePrimaryKeyError,
  InvalidEnumKeyError,
  cellText,
  isBlankRow,
  isSymbolicName,
  parseIntegerCell,
  type EnumKey,
  type RowOffender,
  type SheetInput,
  type TableSchema,
  type TypeDescriptor
} from '@cfgsheet/core';
import { addRow, conflictsOf } from './key-policy';
import { exportedFields } from './table-schema';

export interface PropertyDescription {
  name: string;
  type: string;       // target-language type, e.g. List<int>
  sourceType: TypeDescriptor;
  summary: string;
}

export type DataVariant = 'plain' | 'key-indexed' | 'composite-id';

export interface DataTypeDescription {
  name: string;
  variant: DataVariant;
  multiplier?: number;
  keyFields?: { key1: string; key2: string };
}

export interface EnumMember {
  name: string;
  value: number;
  summary?: string;
}

export interface EnumDescription {
  name: string;
  members: EnumMember[];
}

export interface TableDescription {
  table: string;
  info: { name: string; properties: PropertyDescription[] };
  data: DataTypeDescription;
  keys?: EnumDescription;
}

export const ENUM_SHEET_PREFIX = 'Enum-';

export function targetTypeName(type: TypeDescriptor): string {
  switch (type.kind) {
    case 'primitive': return type.name;
    case 'list': return `List<${type.element}>`;
    case 'map': return `Map<${type.key},${type.value}>`;
    case 'custom': return type.name;
  }
}

function summaryOf(header: string, remark: string): string {
  return remark ? `${header}: ${remark}` : header;
}

export function describeTable(schema: TableSchema, enumKeys: EnumKey[] = []): TableDescription {
  const { name, keyPolicy } = schema;
  const properties = exportedFields(schema).map((f) => ({
    name: f.actualName,
    type: targetTypeName(f.type),
    sourceType: f.type,
    summary: summaryOf(f.header, f.remark)
  }));

  const out: TableDescription = {
    table: name,
    info: { name: `${name}Info`, properties },
    data: { name: `${name}Config`, variant: 'plain' }
  };

  switch (keyPolicy.kind) {
    case 'string-enum':
      out.data.variant = 'key-indexed';
      out.keys = {
        name: `${name}Keys`,
        members: enumKeys.map((k) => ({ name: k.name, value: k.value }))
      };
      break;
    case 'composite-int':
      out.data = {
        ...out.data,
        variant: 'composite-id',
        multiplier: keyPolicy.multiplier,
        keyFields: { key1: keyPolicy.key1, key2: keyPolicy.key2 }
      };
      break;
    case 'single-int':
      break;
  }
  return out;
}

export function isEnumSheet(sheet: Pick<SheetInput, 'name'>): boolean {
  return sheet.name.startsWith(ENUM_SHEET_PREFIX) && sheet.name.length > ENUM_SHEET_PREFIX.length;
}

/**
 * `Enum-Quality` sheet: heading row, then (name, value, remark) rows.
 * Row numbers in errors are 1-based sheet rows.
 */
export function describeEnumSheet(sheet: SheetInput): EnumDescription {
  const name = sheet.name.slice(ENUM_SHEET_PREFIX.length);
  const members: EnumMember[] = [];
  const offenders: RowOffender[] = [];
  const seen = new Map<string, number[]>();

  sheet.rows.slice(1).forEach((cells, i) => {
    const row = i + 2;
    if (isBlankRow(cells)) return;
    const memberName = cellText(cells[0]);
    const value = parseIntegerCell(cells[1]);
    if (!isSymbolicName(memberName)) offenders.push({ value: cells[0] ?? null, row });
    if (value === undefined) offenders.push({ value: cells[1] ?? null, row });
    if (!isSymbolicName(memberName) || value === undefined) return;

    addRow(seen, memberName, row);
    const remark = cellText(cells[2]);
    members.push(remark ? { name: memberName, value, summary: remark } : { name: memberName, value });
  });

  if (offenders.length) throw new InvalidEnumKeyError(name, offenders);
  const conflicts = conflictsOf(seen);
  if (conflicts.length) throw new DuplicatePrimaryKeyError(name, conflicts);
  return { name, members };
}
