// packages/grammar/src/standard-types.ts
// Small stock of `#`-separated numeric types most game tables end up needing.
import type { JsonValue } from '@cfgsheet/core';
import { CustomTypeRegistry, type CustomTypeParser, type CustomTypeRegistryBuilder, type RegistryOptions } from './registry';

function numbers(raw: number | string, expected: number): number[] {
  const parts = String(raw).split('#').map((s) => s.trim());
  if (parts.length !== expected) {
    throw new Error(`expected ${expected} '#'-separated numbers, got ${parts.length}`);
  }
  return parts.map((p) => {
    const n = Number(p);
    if (p === '' || !Number.isFinite(n)) throw new Error(`'${p}' is not a number`);
    return n;
  });
}

const vector2: CustomTypeParser = (raw) => {
  const [x, y] = numbers(raw, 2);
  return { x, y };
};

const vector3: CustomTypeParser = (raw) => {
  const [x, y, z] = numbers(raw, 3);
  return { x, y, z };
};

const range: CustomTypeParser = (raw): JsonValue => {
  const [min, max] = numbers(raw, 2);
  if (min > max) throw new Error(`range minimum ${min} is greater than maximum ${max}`);
  return { min, max };
};

export const STANDARD_TYPES: ReadonlyArray<[string, CustomTypeParser]> = [
  ['math.Vector2', vector2],
  ['math.Vector3', vector3],
  ['math.Range', range]
];

export function registerStandardTypes(builder: CustomTypeRegistryBuilder): CustomTypeRegistryBuilder {
  for (const [name, parser] of STANDARD_TYPES) builder.register(name, parser);
  return builder;
}

/** Registry holding the stock types only. */
export function standardRegistry(opts: RegistryOptions = {}): CustomTypeRegistry {
  return registerStandardTypes(CustomTypeRegistry.builder()).build(opts);
}
