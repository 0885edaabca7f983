// packages/table/src/document.ts
// JSON text writer that keeps record order = row order. JSON.stringify cannot:
// it hoists integer-like keys of plain objects into ascending order.
import { DocumentSchema, type FieldValue, type RecordFields, type RecordSet } from '@cfgsheet/core';

type Writable = FieldValue | RecordFields | Writable[];

export interface DocumentOptions {
  indent?: number;
}

function writeEntries(entries: Array<[string, Writable]>, depth: number, indent: string): string {
  if (entries.length === 0) return '{}';
  const pad = indent.repeat(depth + 1);
  const body = entries.map(([k, v]) => `${pad}${JSON.stringify(k)}: ${write(v, depth + 1, indent)}`);
  return `{\n${body.join(',\n')}\n${indent.repeat(depth)}}`;
}

function write(value: Writable, depth: number, indent: string): string {
  if (value === null) return 'null';
  if (value instanceof Map) {
    return writeEntries([...value].map(([k, v]): [string, Writable] => [String(k), v]), depth, indent);
  }
  if (Array.isArray(value)) {
    if (value.length === 0) return '[]';
    const pad = indent.repeat(depth + 1);
    return `[\n${value.map((v) => pad + write(v, depth + 1, indent)).join(',\n')}\n${indent.repeat(depth)}]`;
  }
  if (typeof value === 'object') return writeEntries(Object.entries(value), depth, indent);
  if (typeof value === 'number' && !Number.isFinite(value)) return 'null';
  return JSON.stringify(value);
}

/** `{ "<key>": { ...fields } }`, records in insertion order, 4-space indent by default. */
export function serializeDocument(records: RecordSet, opts: DocumentOptions = {}): string {
  const indent = ' '.repeat(opts.indent ?? 4);
  const entries = [...records].map(([key, fields]): [string, Writable] => [String(key), fields]);
  return writeEntries(entries, 0, indent);
}

/** Reads a written document back. Map-typed fields come back as plain objects. */
export function parseDocument(text: string): RecordSet {
  const parsed = DocumentSchema.parse(JSON.parse(text));
  const out: RecordSet = new Map();
  for (const [key, fields] of Object.entries(parsed)) out.set(Number(key), fields);
  return out;
}
