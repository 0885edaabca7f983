// packages/grammar/src/registry.ts
import {
  CustomTypeParseError,
  ExportError,
  MalformedTypeAnnotationError,
  UnknownCustomTypeError,
  isEmptyCell,
  type CellValue,
  type ErrorContext,
  type JsonValue
} from '@cfgsheet/core';

export interface CustomTypeContext {
  typeName: string;
  table?: string;
  field?: string;
  row?: number;
}

export type CustomTypeParser = (raw: number | string, ctx: CustomTypeContext) => JsonValue;

export interface GenericCustomValue {
  [key: string]: JsonValue;
  type: string;
  raw: number | string;
  segments: string[];
}

export interface RegistryOptions {
  fallback?: boolean;
}

const QUALIFIED_NAME = /^[A-Za-z_]\w*(?:\.[A-Za-z_]\w*)+$/;

export function isQualifiedName(name: string): boolean {
  return QUALIFIED_NAME.test(name);
}

/** Structural value used for dotted types nobody registered a parser for. */
export function genericCustomValue(typeName: string, raw: number | string): GenericCustomValue {
  return {
    type: typeName,
    raw,
    segments: String(raw).split('#').map((s) => s.trim())
  };
}

function errorContext(ctx: CustomTypeContext): ErrorContext {
  return { table: ctx.table, field: ctx.field, row: ctx.row };
}

/**
 * Read-only after construction. Build one per run with
 * `CustomTypeRegistry.builder()` and hand it to every table build.
 */
export class CustomTypeRegistry {
  private readonly parsers: ReadonlyMap<string, CustomTypeParser>;
  readonly fallback: boolean;

  constructor(parsers: Iterable<[string, CustomTypeParser]> = [], opts: RegistryOptions = {}) {
    this.parsers = new Map(parsers);
    this.fallback = opts.fallback ?? true;
  }

  static builder(): CustomTypeRegistryBuilder {
    return new CustomTypeRegistryBuilder();
  }

  has(name: string): boolean {
    return this.parsers.has(name);
  }

  /** True when `parse` can produce a value for this name: registered, or covered by the fallback. */
  resolves(name: string): boolean {
    return this.fallback || this.parsers.has(name);
  }

  names(): string[] {
    return [...this.parsers.keys()].sort();
  }

  parse(typeName: string, raw: CellValue, ctx: Omit<CustomTypeContext, 'typeName'> = {}): JsonValue {
    const full: CustomTypeContext = { ...ctx, typeName };
    const parser = this.parsers.get(typeName);
    if (!parser) {
      if (!this.fallback) throw new UnknownCustomTypeError(typeName, errorContext(full));
      return raw === null || isEmptyCell(raw) ? null : genericCustomValue(typeName, raw);
    }
    if (raw === null || isEmptyCell(raw)) return null;
    try {
      return parser(raw, full);
    } catch (e) {
      if (e instanceof ExportError) throw e;
      const reason = e instanceof Error ? e.message : String(e);
      throw new CustomTypeParseError(typeName, raw, reason, errorContext(full));
    }
  }
}

export class CustomTypeRegistryBuilder {
  private readonly parsers = new Map<string, CustomTypeParser>();

  register(name: string, parser: CustomTypeParser): this {
    if (!isQualifiedName(name)) {
      throw new MalformedTypeAnnotationError(name, 'custom type names must be dotted, e.g. math.Vector2');
    }
    if (this.parsers.has(name)) throw new Error(`Custom type '${name}' is already registered`);
    this.parsers.set(name, parser);
    return this;
  }

  build(opts: RegistryOptions = {}): CustomTypeRegistry {
    return new CustomTypeRegistry(this.parsers, opts);
  }
}
