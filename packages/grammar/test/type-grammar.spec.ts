import { describe, it, expect } from 'vitest';
import { MalformedTypeAnnotationError, TypeConversionError } from '@cfgsheet/core';
import {
  CustomTypeRegistry,
  convertCell,
  formatType,
  parseTypeAnnotation,
  registerStandardTypes,
  scalarKind
} from '../src';

const registry = registerStandardTypes(CustomTypeRegistry.builder()).build();
const ctx = { registry, table: 'Items', field: 'tags', row: 7 };

describe('parseTypeAnnotation', () => {
  it('reads primitives and their aliases', () => {
    expect(parseTypeAnnotation('int')).toEqual({ kind: 'primitive', name: 'int' });
    expect(parseTypeAnnotation(' Double ')).toEqual({ kind: 'primitive', name: 'float' });
    expect(parseTypeAnnotation('boolean')).toEqual({ kind: 'primitive', name: 'bool' });
    expect(parseTypeAnnotation('str')).toEqual({ kind: 'primitive', name: 'string' });
  });

  it('reads containers', () => {
    expect(parseTypeAnnotation('list(int)')).toEqual({ kind: 'list', element: 'int' });
    expect(parseTypeAnnotation('dict(int, string)')).toEqual({ kind: 'map', key: 'int', value: 'string' });
    expect(parseTypeAnnotation('LIST ( float )')).toEqual({ kind: 'list', element: 'float' });
  });

  it('reads dotted names as custom types', () => {
    expect(parseTypeAnnotation('math.Vector2')).toEqual({ kind: 'custom', name: 'math.Vector2' });
  });

  it.each([
    ['', 'empty annotation'],
    ['list(int', 'unbalanced parentheses'],
    ['list(int,int)', 'list takes exactly one element type'],
    ['dict(int)', 'dict takes a key and a value type'],
    ['list(math.Vector2)', "list element 'math.Vector2' is not a primitive"],
    ['set(int)', "unknown container 'set'"],
    ['long', "unknown type 'long'"],
    ['math..Vector2', 'invalid qualified type name'],
    ['constructor', "unknown type 'constructor'"]
  ])('rejects %j (%s)', (text, reason) => {
    expect(() => parseTypeAnnotation(text)).toThrow(MalformedTypeAnnotationError);
    expect(() => parseTypeAnnotation(text)).toThrow(reason);
  });

  it('formats back to canonical text', () => {
    expect(formatType(parseTypeAnnotation('Dict(integer,str)'))).toBe('dict(int,string)');
    expect(formatType(parseTypeAnnotation('list(boolean)'))).toBe('list(bool)');
  });

  it('maps types to runtime scalar kinds', () => {
    expect(scalarKind({ kind: 'primitive', name: 'float' })).toBe('number');
    expect(scalarKind({ kind: 'list', element: 'string' })).toBe('string');
    expect(scalarKind({ kind: 'map', key: 'int', value: 'int' })).toBeUndefined();
  });
});

describe('convertCell', () => {
  const int = parseTypeAnnotation('int');

  it('converts ints, defaulting empty to 0', () => {
    expect(convertCell(int, '42', ctx)).toBe(42);
    expect(convertCell(int, 3.9, ctx)).toBe(3);
    expect(convertCell(int, '5.0', ctx)).toBe(5);
    expect(convertCell(int, '  ', ctx)).toBe(0);
    expect(convertCell(int, null, ctx)).toBe(0);
  });

  it('reads back the text form of every primitive value', () => {
    const cases: Array<[string, Array<number | boolean | string>]> = [
      ['int', [-7, 0, 42, 2147483647]],
      ['float', [-1.5, 0.25, 1e-7, 2.5e21, -3.75e-9]],
      ['bool', [true, false]],
      ['string', ['Sword', ' padded ', '12']]
    ];
    for (const [name, values] of cases) {
      const type = parseTypeAnnotation(name);
      for (const v of values) expect(convertCell(type, String(v), ctx)).toBe(v);
    }
    expect(convertCell(parseTypeAnnotation('float'), '-2.5E3', ctx)).toBe(-2500);
  });

  it('rejects non-integer text', () => {
    for (const bad of ['abc', '0x10', '1e3', '2.5']) {
      expect(() => convertCell(int, bad, ctx)).toThrow(TypeConversionError);
    }
  });

  it('conversion errors are recoverable and carry context', () => {
    try {
      convertCell(int, 'abc', ctx);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(TypeConversionError);
      if (e instanceof TypeConversionError) {
        expect(e.fatal).toBe(false);
        expect(e.context).toMatchObject({ table: 'Items', field: 'tags', row: 7 });
      }
    }
  });

  it('converts floats and bools', () => {
    expect(convertCell(parseTypeAnnotation('float'), '1.5', ctx)).toBe(1.5);
    expect(convertCell(parseTypeAnnotation('float'), '.5', ctx)).toBe(0.5);
    expect(() => convertCell(parseTypeAnnotation('float'), '1.5x', ctx)).toThrow(TypeConversionError);
    const bool = parseTypeAnnotation('bool');
    expect(convertCell(bool, 'TRUE', ctx)).toBe(true);
    expect(convertCell(bool, 1, ctx)).toBe(true);
    expect(convertCell(bool, 'no', ctx)).toBe(false);
    expect(convertCell(bool, null, ctx)).toBe(false);
  });

  it('converts strings, numbers become text', () => {
    const str = parseTypeAnnotation('string');
    expect(convertCell(str, 12, ctx)).toBe('12');
    expect(convertCell(str, null, ctx)).toBe('');
    expect(convertCell(str, 'Sword', ctx)).toBe('Sword');
  });

  it('splits lists on commas and drops empty segments', () => {
    const list = parseTypeAnnotation('list(int)');
    expect(convertCell(list, '1, 2,3', ctx)).toEqual([1, 2, 3]);
    expect(convertCell(list, '1,,2,', ctx)).toEqual([1, 2]);
    expect(convertCell(list, 9, ctx)).toEqual([9]);
    expect(convertCell(list, '', ctx)).toEqual([]);
    expect(convertCell(parseTypeAnnotation('list(string)'), 'a, b', ctx)).toEqual(['a', 'b']);
  });

  it('reads one dict entry per line in order', () => {
    const map = parseTypeAnnotation('dict(int,string)');
    const value = convertCell(map, '3: three\n1:one\r\nno colon here', ctx);
    expect(value).toBeInstanceOf(Map);
    if (value instanceof Map) expect([...value]).toEqual([[3, 'three'], [1, 'one']]);
  });

  it('rejects duplicate and empty dict keys', () => {
    const map = parseTypeAnnotation('dict(int,int)');
    expect(() => convertCell(map, '1:2\n1:3', ctx)).toThrow("duplicate key '1'");
    expect(() => convertCell(map, ':2', ctx)).toThrow(TypeConversionError);
  });

  it('delegates custom types to the registry', () => {
    expect(convertCell(parseTypeAnnotation('math.Vector2'), '1#2', ctx)).toEqual({ x: 1, y: 2 });
    expect(convertCell(parseTypeAnnotation('math.Vector2'), '', ctx)).toBeNull();
  });
});
