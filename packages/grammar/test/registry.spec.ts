import { describe, it, expect } from 'vitest';
import { CustomTypeParseError, MalformedTypeAnnotationError, UnknownCustomTypeError } from '@cfgsheet/core';
import { CustomTypeRegistry, genericCustomValue, isQualifiedName, registerStandardTypes } from '../src';

describe('CustomTypeRegistry', () => {
  it('parses registered types', () => {
    const registry = registerStandardTypes(CustomTypeRegistry.builder()).build();
    expect(registry.names()).toEqual(['math.Range', 'math.Vector2', 'math.Vector3']);
    expect(registry.parse('math.Vector3', '1# 2 #3')).toEqual({ x: 1, y: 2, z: 3 });
    expect(registry.parse('math.Range', '2#5')).toEqual({ min: 2, max: 5 });
  });

  it('wraps parser failures as recoverable errors', () => {
    const registry = registerStandardTypes(CustomTypeRegistry.builder()).build();
    let caught: unknown;
    try {
      registry.parse('math.Range', '5#2', { table: 'Skills', field: 'range', row: 9 });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(CustomTypeParseError);
    if (caught instanceof CustomTypeParseError) {
      expect(caught.fatal).toBe(false);
      expect(caught.context).toMatchObject({ table: 'Skills', field: 'range', row: 9 });
    }
  });

  it('falls back to a generic structure for unregistered dotted names', () => {
    const registry = new CustomTypeRegistry();
    expect(registry.resolves('game.Reward')).toBe(true);
    expect(registry.parse('game.Reward', 'gold # 100')).toEqual({
      type: 'game.Reward',
      raw: 'gold # 100',
      segments: ['gold', '100']
    });
    expect(registry.parse('game.Reward', '  ')).toBeNull();
    expect(genericCustomValue('a.B', 7)).toEqual({ type: 'a.B', raw: 7, segments: ['7'] });
  });

  it('rejects unregistered names when the fallback is off', () => {
    const registry = new CustomTypeRegistry([], { fallback: false });
    expect(registry.resolves('game.Reward')).toBe(false);
    expect(() => registry.parse('game.Reward', 'x')).toThrow(UnknownCustomTypeError);
  });

  it('validates registrations', () => {
    const builder = CustomTypeRegistry.builder();
    expect(() => builder.register('Vector2', () => null)).toThrow(MalformedTypeAnnotationError);
    builder.register('game.Id', (raw) => String(raw));
    expect(() => builder.register('game.Id', () => null)).toThrow("Custom type 'game.Id' is already registered");
    expect(builder.build().has('game.Id')).toBe(true);
  });

  it('recognises qualified names', () => {
    expect(isQualifiedName('a.b.C_1')).toBe(true);
    expect(isQualifiedName('a.')).toBe(false);
    expect(isQualifiedName('1a.b')).toBe(false);
  });
});
