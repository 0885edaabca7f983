// packages/grammar/src/type-grammar.ts
// Type annotations: `int` | `list(int)` | `dict(int,string)` | `some.Custom`
import {
  MalformedTypeAnnotationError,
  TypeConversionError,
  isEmptyCell,
  parseIntegerCell,
  type CellValue,
  type ErrorContext,
  type FieldValue,
  type MapValue,
  type PrimitiveName,
  type ScalarValue,
  type TypeDescriptor
} from '@cfgsheet/core';
import { isQualifiedName, type CustomTypeRegistry } from './registry';

const PRIMITIVE_ALIASES = new Map<string, PrimitiveName>([
  ['int', 'int'],
  ['int32', 'int'],
  ['integer', 'int'],
  ['float', 'float'],
  ['double', 'float'],
  ['bool', 'bool'],
  ['boolean', 'bool'],
  ['str', 'string'],
  ['string', 'string']
]);

const CONTAINER = /^([A-Za-z]+)\s*\((.*)\)$/s;
const FLOAT_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;
const TRUE_TEXT = new Set(['1', 'true', 'yes']);

export function primitiveName(text: string): PrimitiveName | undefined {
  return PRIMITIVE_ALIASES.get(text.trim().toLowerCase());
}

function count(text: string, ch: string): number {
  return text.split(ch).length - 1;
}

// ---------- parse ----------
export function parseTypeAnnotation(annotation: string, ctx: ErrorContext = {}): TypeDescriptor {
  const text = annotation.trim();
  if (!text) throw new MalformedTypeAnnotationError(annotation, 'empty annotation', ctx);

  if (count(text, '(') !== count(text, ')')) {
    throw new MalformedTypeAnnotationError(annotation, 'unbalanced parentheses', ctx);
  }

  if (text.includes('(')) {
    const m = CONTAINER.exec(text);
    if (!m) throw new MalformedTypeAnnotationError(annotation, 'unexpected text around container', ctx);
    const container = m[1].toLowerCase();
    const args = m[2].split(',').map((a) => a.trim());
    const prims = args.map(primitiveName);

    if (container === 'list') {
      if (args.length !== 1) throw new MalformedTypeAnnotationError(annotation, 'list takes exactly one element type', ctx);
      const element = prims[0];
      if (!element) throw new MalformedTypeAnnotationError(annotation, `list element '${args[0]}' is not a primitive`, ctx);
      return { kind: 'list', element };
    }
    if (container === 'dict') {
      if (args.length !== 2) throw new MalformedTypeAnnotationError(annotation, 'dict takes a key and a value type', ctx);
      const [key, value] = prims;
      if (!key) throw new MalformedTypeAnnotationError(annotation, `dict key '${args[0]}' is not a primitive`, ctx);
      if (!value) throw new MalformedTypeAnnotationError(annotation, `dict value '${args[1]}' is not a primitive`, ctx);
      return { kind: 'map', key, value };
    }
    throw new MalformedTypeAnnotationError(annotation, `unknown container '${m[1]}'`, ctx);
  }

  const prim = primitiveName(text);
  if (prim) return { kind: 'primitive', name: prim };

  if (text.includes('.')) {
    if (!isQualifiedName(text)) throw new MalformedTypeAnnotationError(annotation, 'invalid qualified type name', ctx);
    return { kind: 'custom', name: text };
  }

  throw new MalformedTypeAnnotationError(annotation, `unknown type '${text}'`, ctx);
}

export function formatType(type: TypeDescriptor): string {
  switch (type.kind) {
    case 'primitive': return type.name;
    case 'list': return `list(${type.element})`;
    case 'map': return `dict(${type.key},${type.value})`;
    case 'custom': return type.name;
  }
}

/** Scalar kind a value of this type (or its elements) has at runtime; undefined for maps and custom types. */
export function scalarKind(type: TypeDescriptor): 'number' | 'string' | 'boolean' | undefined {
  const prim = type.kind === 'primitive' ? type.name : type.kind === 'list' ? type.element : undefined;
  switch (prim) {
    case 'int':
    case 'float': return 'number';
    case 'string': return 'string';
    case 'bool': return 'boolean';
    default: return undefined;
  }
}

// ---------- convert ----------
export interface ConvertContext {
  registry: CustomTypeRegistry;
  table?: string;
  field?: string;
  row?: number;
}

function errorContext(ctx: ConvertContext): ErrorContext {
  return { table: ctx.table, field: ctx.field, row: ctx.row };
}

export function convertPrimitive(name: PrimitiveName, raw: CellValue, ctx: ConvertContext): ScalarValue {
  const empty = raw === null || isEmptyCell(raw);
  switch (name) {
    case 'int': {
      if (empty) return 0;
      if (typeof raw === 'number') return Math.trunc(raw);
      const n = parseIntegerCell(raw);
      if (n === undefined) throw new TypeConversionError('int', raw, 'not an integer', errorContext(ctx));
      return n;
    }
    case 'float': {
      if (empty) return 0;
      if (typeof raw === 'number') return raw;
      const t = String(raw).trim();
      if (!FLOAT_TEXT.test(t)) throw new TypeConversionError('float', raw, 'not a number', errorContext(ctx));
      return Number(t);
    }
    case 'bool':
      if (empty) return false;
      return TRUE_TEXT.has(String(raw).trim().toLowerCase());
    case 'string':
      if (raw === null) return '';
      return typeof raw === 'number' ? String(raw) : raw;
  }
}

function convertList(element: PrimitiveName, raw: CellValue, ctx: ConvertContext): ScalarValue[] {
  if (raw === null || isEmptyCell(raw)) return [];
  if (typeof raw === 'number') return [convertPrimitive(element, raw, ctx)];
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s !== '')
    .map((s) => convertPrimitive(element, s, ctx));
}

function convertMap(key: PrimitiveName, value: PrimitiveName, raw: CellValue, ctx: ConvertContext): MapValue {
  const out: MapValue = new Map();
  if (raw === null || isEmptyCell(raw)) return out;
  const typeText = formatType({ kind: 'map', key, value });

  for (const line of String(raw).split(/\r?\n/)) {
    const at = line.indexOf(':');
    if (at < 0) continue;
    const k = line.slice(0, at).trim();
    if (!k) throw new TypeConversionError(typeText, raw, `empty key in line '${line}'`, errorContext(ctx));
    const ck = convertPrimitive(key, k, ctx);
    if (out.has(ck)) throw new TypeConversionError(typeText, raw, `duplicate key '${k}'`, errorContext(ctx));
    out.set(ck, convertPrimitive(value, line.slice(at + 1).trim(), ctx));
  }
  return out;
}

export function convertCell(type: TypeDescriptor, raw: CellValue, ctx: ConvertContext): FieldValue {
  switch (type.kind) {
    case 'primitive': return convertPrimitive(type.name, raw, ctx);
    case 'list': return convertList(type.element, raw, ctx);
    case 'map': return convertMap(type.key, type.value, raw, ctx);
    case 'custom': return ctx.registry.parse(type.name, raw, errorContext(ctx));
  }
}
