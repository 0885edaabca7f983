// packages/table/src/header.ts
// Header rows 1..6 -> FieldDescriptor[]; name tags are parsed here and nowhere else.
import {
  HeaderFormatError,
  UnknownCustomTypeError,
  alignRow,
  cellText,
  isEmptyCell,
  type CellValue,
  type Diagnostics,
  type FieldDescriptor,
  type FieldLabel,
  type KeyTag,
  type ReferenceTag
} from '@cfgsheet/core';
import { parseTypeAnnotation, type CustomTypeRegistry } from '@cfgsheet/grammar';

export const HEADER_ROWS = ['remark', 'header', 'type', 'label', 'name', 'default'] as const;
export type HeaderRowName = (typeof HEADER_ROWS)[number];
export const HEADER_ROW_COUNT = HEADER_ROWS.length;
export const FIRST_DATA_ROW = HEADER_ROW_COUNT + 1;

const NAME_ROW = HEADER_ROWS.indexOf('name');

const KEY_TAG = /^(key[12]):\s*/i;
const REFERENCE_TAG = /^\[([^\]/]+)(?:\/([^\]]+))?\]\s*/;

export interface NameTags {
  actualName: string;
  keyTag?: KeyTag;
  reference?: ReferenceTag;
}

/** Strips `key1:` / `key2:` and `[Table]` / `[Table/Field]` prefixes, in either order. */
export function parseNameTags(rawName: string): NameTags {
  let rest = rawName.trim();
  let keyTag: KeyTag | undefined;
  let reference: ReferenceTag | undefined;

  for (;;) {
    const k = keyTag ? null : KEY_TAG.exec(rest);
    if (k) {
      keyTag = k[1].toLowerCase() === 'key1' ? 'key1' : 'key2';
      rest = rest.slice(k[0].length);
      continue;
    }
    const r = reference ? null : REFERENCE_TAG.exec(rest);
    if (r) {
      const field = r[2]?.trim();
      reference = field ? { table: r[1].trim(), field } : { table: r[1].trim() };
      rest = rest.slice(r[0].length);
      continue;
    }
    break;
  }

  const tags: NameTags = { actualName: rest };
  if (keyTag) tags.keyTag = keyTag;
  if (reference) tags.reference = reference;
  return tags;
}

export function parseLabel(cell: CellValue): FieldLabel {
  const t = cellText(cell).toLowerCase();
  if (t === 'required') return 'required';
  if (t === 'ignore') return 'ignore';
  return 'normal';
}

function trimTrailingEmpty(cells: CellValue[]): CellValue[] {
  let end = cells.length;
  while (end > 0 && isEmptyCell(cells[end - 1])) end--;
  return cells.slice(0, end);
}

/**
 * Checks presence of all six header rows and aligns them to the name row.
 * Returns the aligned rows, in HEADER_ROWS order.
 */
export function alignHeaderRows(table: string, rows: CellValue[][], diagnostics: Diagnostics): CellValue[][] {
  if (rows.length < HEADER_ROW_COUNT) {
    throw new HeaderFormatError(table, `expected ${HEADER_ROW_COUNT} header rows, found ${rows.length}`, rows.length + 1);
  }
  HEADER_ROWS.forEach((label, i) => {
    if (rows[i].length === 0) throw new HeaderFormatError(table, `${label} row is empty`, i + 1);
  });

  const names = trimTrailingEmpty(rows[NAME_ROW]);
  if (names.length === 0) throw new HeaderFormatError(table, 'name row has no field names', NAME_ROW + 1);
  const width = names.length;

  return HEADER_ROWS.map((label, i) => {
    if (i === NAME_ROW) return names;
    const row = rows[i];
    if (row.length !== width) {
      const action = row.length < width ? 'padded' : 'truncated';
      diagnostics.info('CFG_HEADER_ALIGNED', `${label} row has ${row.length} cells, name row has ${width}; ${action}`, { table, row: i + 1 });
    }
    return alignRow(row, width);
  });
}

export function parseFields(table: string, header: CellValue[][], registry: CustomTypeRegistry): FieldDescriptor[] {
  const [remarks, headers, types, labels, names, defaults] = header;

  return names.map((nameCell, index) => {
    const rawName = cellText(nameCell);
    const tags = parseNameTags(rawName);
    const label = parseLabel(labels[index]);

    const field: FieldDescriptor = {
      index,
      rawName,
      actualName: tags.actualName,
      label,
      remark: cellText(remarks[index]),
      header: cellText(headers[index]),
      defaultRaw: isEmptyCell(defaults[index]) ? null : defaults[index]
    };
    if (tags.keyTag) field.keyTag = tags.keyTag;
    if (tags.reference) field.reference = tags.reference;

    // the key column is typed even when ignored: policy detection reads it
    if (label !== 'ignore' || index === 0) {
      const ctx = { table, field: tags.actualName || rawName, column: index, row: HEADER_ROWS.indexOf('type') + 1 };
      const type = parseTypeAnnotation(cellText(types[index]), ctx);
      if (type.kind === 'custom' && !registry.resolves(type.name)) throw new UnknownCustomTypeError(type.name, ctx);
      field.type = type;
    }
    return field;
  });
}
