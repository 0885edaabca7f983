// packages/core/src/schemas.ts
import { z } from 'zod';
import type { JsonValue } from './types';

// spreadsheet readers hand out null/number/text only; booleans arrive as text
export const CellValueSchema = z.union([z.null(), z.number(), z.string()]);

export const CellRowSchema = z.array(CellValueSchema);

export const SheetSchema = z.object({
  name: z.string().min(1),
  rows: z.array(CellRowSchema)
}).strict();

export const TableInputSchema = SheetSchema;

export const WorkbookSchema = z.object({
  name: z.string().min(1),
  sheets: z.array(SheetSchema).min(1)
}).strict();

// on disk the workbook name comes from the file name
export const WorkbookFileSchema = z.object({
  name: z.string().min(1).optional(),
  sheets: z.array(SheetSchema).min(1)
}).strict();

// ---- written documents (read back for reference checks) ----
export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.null(), z.boolean(), z.number(), z.string(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

export const DocumentSchema = z.record(
  z.string().regex(/^-?\d+$/, 'record keys are integers'),
  z.record(JsonValueSchema)
);

// ---- run configuration ----
export const NamingSchema = z.object({
  json: z.string().default('{name}Config.json'),
  data: z.string().default('{name}Data.json'),
  keys: z.string().default('{name}Keys.json'),
  enum: z.string().default('{name}.json')
}).strict();

export const EmptyReferenceSchema = z.object({
  int: z.array(z.number()).default([0]),
  string: z.array(z.string()).default([''])
}).strict();

export const ExportConfigSchema = z.object({
  idPosition: z.enum(['first', 'last']).default('first'),
  customTypeFallback: z.boolean().default(true),
  emptyReference: EmptyReferenceSchema.default({}),
  abortOnFatal: z.boolean().default(false),
  diffOnly: z.boolean().default(true),
  naming: NamingSchema.default({}),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
}).strict();

export type ExportConfig = z.infer<typeof ExportConfigSchema>;
export type ExportConfigInput = z.input<typeof ExportConfigSchema>;
export type NamingConfig = z.infer<typeof NamingSchema>;
export type EmptyReferenceConfig = z.infer<typeof EmptyReferenceSchema>;
export type IdPosition = ExportConfig['idPosition'];

export function defaultConfig(overrides: ExportConfigInput = {}): ExportConfig {
  return ExportConfigSchema.parse(overrides);
}
