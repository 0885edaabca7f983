// packages/core/src/errors.ts
// Error taxonomy for table builds. `fatal` errors stop the current table,
// the rest are turned into issues and the row/field carries on as null.

export const ErrorCodes = {
  MALFORMED_TYPE: 'CFG_MALFORMED_TYPE',
  TYPE_CONVERSION: 'CFG_TYPE_CONVERSION',
  UNKNOWN_CUSTOM_TYPE: 'CFG_UNKNOWN_CUSTOM_TYPE',
  CUSTOM_TYPE_PARSE: 'CFG_CUSTOM_TYPE_PARSE',
  HEADER_FORMAT: 'CFG_HEADER_FORMAT',
  DUPLICATE_FIELD: 'CFG_DUPLICATE_FIELD',
  INVALID_FIELD_NAME: 'CFG_INVALID_FIELD_NAME',
  INVALID_REFERENCE_TAG: 'CFG_INVALID_REFERENCE_TAG',
  INVALID_ENUM_KEY: 'CFG_INVALID_ENUM_KEY',
  INVALID_PRIMARY_KEY: 'CFG_INVALID_PRIMARY_KEY',
  DUPLICATE_PRIMARY_KEY: 'CFG_DUPLICATE_PRIMARY_KEY',
  COMPOSITE_KEY_RANGE: 'CFG_COMPOSITE_KEY_RANGE',
  COMPOSITE_KEY_OVERFLOW: 'CFG_COMPOSITE_KEY_OVERFLOW',
  REQUIRED_FIELD: 'CFG_REQUIRED_FIELD',
  SHEET_NAME_CONFLICT: 'CFG_SHEET_NAME_CONFLICT'
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export type ContextValue = string | number | boolean | null;

export interface ErrorContext {
  table?: string;
  row?: number;
  field?: string;
  column?: number;
  value?: ContextValue;
}

export interface RowOffender {
  value: ContextValue;
  row: number;
}

export interface KeyConflict {
  key: string | number;
  rows: number[];
}

export class ExportError extends Error {
  readonly code: ErrorCode;
  readonly context: ErrorContext;
  readonly fatal: boolean;

  constructor(code: ErrorCode, message: string, context: ErrorContext = {}, fatal = true) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
    this.fatal = fatal;
  }
}

function where(ctx: ErrorContext): string {
  const parts: string[] = [];
  if (ctx.table) parts.push(`table ${ctx.table}`);
  if (ctx.row !== undefined) parts.push(`row ${ctx.row}`);
  if (ctx.field) parts.push(`field ${ctx.field}`);
  return parts.length ? ` (${parts.join(', ')})` : '';
}

function listOffenders(offenders: RowOffender[]): string {
  return offenders.map((o) => `'${String(o.value)}' at row ${o.row}`).join('; ');
}

// ---------- grammar ----------
export class MalformedTypeAnnotationError extends ExportError {
  constructor(readonly annotation: string, reason: string, ctx: ErrorContext = {}) {
    super(ErrorCodes.MALFORMED_TYPE, `Malformed type annotation '${annotation}': ${reason}${where(ctx)}`, { ...ctx, value: annotation });
  }
}

export class TypeConversionError extends ExportError {
  constructor(readonly typeText: string, value: ContextValue, reason: string, ctx: ErrorContext = {}) {
    super(ErrorCodes.TYPE_CONVERSION, `Cannot convert ${JSON.stringify(value)} to ${typeText}: ${reason}${where(ctx)}`, { ...ctx, value }, false);
  }
}

export class UnknownCustomTypeError extends ExportError {
  constructor(readonly typeName: string, ctx: ErrorContext = {}) {
    super(ErrorCodes.UNKNOWN_CUSTOM_TYPE, `Unknown custom type '${typeName}'${where(ctx)}`, { ...ctx, value: typeName });
  }
}

export class CustomTypeParseError extends ExportError {
  constructor(readonly typeName: string, value: ContextValue, readonly reason: string, ctx: ErrorContext = {}) {
    super(ErrorCodes.CUSTOM_TYPE_PARSE, `Custom type '${typeName}' rejected ${JSON.stringify(value)}: ${reason}${where(ctx)}`, { ...ctx, value }, false);
  }
}

// ---------- header ----------
export class HeaderFormatError extends ExportError {
  constructor(table: string, detail: string, row?: number) {
    super(ErrorCodes.HEADER_FORMAT, `Header format error in ${table}: ${detail}`, { table, row });
  }
}

export class DuplicateFieldError extends ExportError {
  constructor(table: string, readonly duplicates: string[]) {
    super(ErrorCodes.DUPLICATE_FIELD, `Duplicate field names in ${table}: ${duplicates.join(', ')}`, { table });
  }
}

export class InvalidFieldNameError extends ExportError {
  constructor(table: string, field: string, column: number, reason: string) {
    super(ErrorCodes.INVALID_FIELD_NAME, `Invalid field name '${field}' at column ${column} in ${table}: ${reason}`, { table, field, column, value: field });
  }
}

export class InvalidReferenceTagError extends ExportError {
  constructor(table: string, field: string, column: number, reason: string) {
    super(ErrorCodes.INVALID_REFERENCE_TAG, `Invalid reference tag on '${field}' at column ${column} in ${table}: ${reason}`, { table, field, column });
  }
}

// ---------- keys ----------
export class InvalidEnumKeyError extends ExportError {
  constructor(table: string, readonly offenders: RowOffender[]) {
    super(ErrorCodes.INVALID_ENUM_KEY, `Illegal enum key names in ${table}: ${listOffenders(offenders)}`, { table, row: offenders[0]?.row });
  }
}

export class InvalidPrimaryKeyError extends ExportError {
  constructor(table: string, readonly offenders: RowOffender[], field?: string) {
    super(ErrorCodes.INVALID_PRIMARY_KEY, `Primary key is not an integer in ${table}: ${listOffenders(offenders)}`, { table, field, row: offenders[0]?.row });
  }
}

export class DuplicatePrimaryKeyError extends ExportError {
  constructor(table: string, readonly conflicts: KeyConflict[]) {
    const detail = conflicts.map((c) => `${JSON.stringify(c.key)} at rows ${c.rows.join(', ')}`).join('; ');
    super(ErrorCodes.DUPLICATE_PRIMARY_KEY, `Duplicate primary keys in ${table}: ${detail}`, { table, row: conflicts[0]?.rows[1], value: conflicts[0]?.key });
  }
}

export class CompositeKeyRangeError extends ExportError {
  constructor(table: string, row: number, readonly key1: number, readonly key2: number, multiplier: number) {
    super(ErrorCodes.COMPOSITE_KEY_RANGE, `Composite key (${key1}, ${key2}) out of range [0, ${multiplier}) in ${table} at row ${row}`, { table, row });
  }
}

export class CompositeKeyOverflowError extends ExportError {
  constructor(table: string, readonly combined: number, row: number) {
    super(ErrorCodes.COMPOSITE_KEY_OVERFLOW, `Composite key ${combined} >= 2^31 in ${table} at row ${row}`, { table, row, value: combined });
  }
}

// ---------- rows ----------
export class RequiredFieldError extends ExportError {
  constructor(table: string, field: string, row: number) {
    super(ErrorCodes.REQUIRED_FIELD, `Field '${field}' is required but empty with no default in ${table} at row ${row}`, { table, field, row });
  }
}

export class SheetNameConflictError extends ExportError {
  constructor(sheet: string, readonly firstWorkbook: string, readonly secondWorkbook: string) {
    super(ErrorCodes.SHEET_NAME_CONFLICT, `Sheet '${sheet}' appears in both ${firstWorkbook} and ${secondWorkbook}`, { table: sheet });
  }
}

export function isExportError(e: unknown): e is ExportError {
  return e instanceof ExportError;
}
