// packages/table/src/record-builder.ts
import {
  DuplicatePrimaryKeyError,
  ExportError,
  RequiredFieldError,
  isEmptyCell,
  type BuiltTable,
  type CellValue,
  type FieldValue,
  type IdPosition,
  type RecordFields,
  type RecordSet,
  type ReferenceItem,
  type TableSchema
} from '@cfgsheet/core';
import { convertCell } from '@cfgsheet/grammar';
import { deriveKey, enumKeysOf } from './key-policy';
import { exportedFields, type BuildContext, type ExportedField } from './table-schema';

export interface RecordBuildContext extends BuildContext {
  idPosition: IdPosition;
}

/**
 * One record per data row, keyed by the derived key. Conversion failures are
 * reported and leave the field null; key and required-field problems throw.
 * Reference-tagged fields are only collected here, checked after the batch.
 */
export function buildRecords(schema: TableSchema, ctx: RecordBuildContext): BuiltTable {
  const { name: table, keyPolicy } = schema;
  const fields = exportedFields(schema);
  const records: RecordSet = new Map();
  const firstRowOf = new Map<number, number>();
  const pendingReferences: ReferenceItem[] = [];

  schema.rows.forEach((dataRow, ordinal) => {
    const { row, cells } = dataRow;
    const key = deriveKey(table, keyPolicy, dataRow, ordinal);

    const first = firstRowOf.get(key);
    if (first !== undefined) throw new DuplicatePrimaryKeyError(table, [{ key, rows: [first, row] }]);
    firstRowOf.set(key, row);

    const out: RecordFields = {};
    if (ctx.idPosition === 'first') out.id = key;

    for (const field of fields) {
      const value = convertField(table, field, row, cells[field.index] ?? null, ctx);
      out[field.actualName] = value;
      if (field.reference && value !== null) {
        pendingReferences.push({
          sourceTable: table,
          row,
          field: field.actualName,
          target: field.reference,
          declaredType: field.type,
          value
        });
      }
    }

    if (ctx.idPosition === 'last') out.id = key;
    records.set(key, out);
  });

  return { schema, records, enumKeys: enumKeysOf(keyPolicy, schema.rows), pendingReferences };
}

function convertField(table: string, field: ExportedField, row: number, cell: CellValue, ctx: RecordBuildContext): FieldValue {
  let source = cell;
  if (isEmptyCell(cell)) {
    if (field.defaultRaw === null && field.label === 'required') throw new RequiredFieldError(table, field.actualName, row);
    source = field.defaultRaw;
  }

  try {
    return convertCell(field.type, source, { registry: ctx.registry, table, field: field.actualName, row });
  } catch (e) {
    if (e instanceof ExportError && !e.fatal) {
      ctx.diagnostics.fromError(e, { table, row, field: field.actualName });
      return null;
    }
    throw e;
  }
}
