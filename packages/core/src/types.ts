// --------------------
// Cells & values
// --------------------
// What the spreadsheet reader hands us: nothing else reaches the grammar.
export type CellValue = null | number | string;

export type ScalarValue = number | boolean | string;

export type JsonValue =
  | null
  | ScalarValue
  | JsonValue[]
  | { [key: string]: JsonValue };

// dict(K,V) keeps insertion order even for integer keys, which a plain object would not
export type MapValue = Map<ScalarValue, ScalarValue>;

export type FieldValue = JsonValue | MapValue;

// --------------------
// Type grammar
// --------------------
export type PrimitiveName = 'int' | 'float' | 'bool' | 'string';

export type TypeDescriptor =
  | { kind: 'primitive'; name: PrimitiveName }
  | { kind: 'list'; element: PrimitiveName }
  | { kind: 'map'; key: PrimitiveName; value: PrimitiveName }
  | { kind: 'custom'; name: string };

// --------------------
// Fields / schema
// --------------------
export type FieldLabel = 'normal' | 'required' | 'ignore';

export type KeyTag = 'key1' | 'key2';

export interface ReferenceTag {
  table: string;
  field?: string; // defaults to the target's id
}

export interface FieldDescriptor {
  index: number;
  rawName: string;
  actualName: string;
  type?: TypeDescriptor; // absent on ignored columns
  label: FieldLabel;
  remark: string;
  header: string;
  defaultRaw: CellValue;
  keyTag?: KeyTag;
  reference?: ReferenceTag;
}

export type KeyPolicy =
  | { kind: 'string-enum'; keyField: string }
  | { kind: 'composite-int'; key1: string; key2: string; multiplier: number }
  | { kind: 'single-int'; keyField: string };

export type KeyPolicyKind = KeyPolicy['kind'];

export interface DataRow {
  row: number; // spreadsheet numbering, first data row is 7
  cells: CellValue[];
}

export interface TableSchema {
  name: string;
  fields: FieldDescriptor[];
  keyPolicy: KeyPolicy;
  rows: DataRow[]; // non-blank data rows, aligned to fields.length
}

// --------------------
// Records
// --------------------
export type RecordFields = Record<string, FieldValue>;

export type RecordSet = Map<number, RecordFields>;

export interface EnumKey {
  name: string;
  value: number;
  row: number;
}

export interface ReferenceItem {
  sourceTable: string;
  row: number;
  field: string;
  target: ReferenceTag;
  declaredType: TypeDescriptor;
  value: FieldValue;
}

export interface BuiltTable {
  schema: TableSchema;
  records: RecordSet;
  enumKeys: EnumKey[];
  pendingReferences: ReferenceItem[];
}

// --------------------
// Workbook input
// --------------------
export interface SheetInput {
  name: string;
  rows: CellValue[][];
}

export interface TableInput {
  name: string;
  rows: CellValue[][]; // six header rows followed by data rows
}

export interface WorkbookInput {
  name: string;
  sheets: SheetInput[];
}
