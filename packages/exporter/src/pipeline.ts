// packages/exporter/src/pipeline.ts
// Stage 1 builds every table of the batch; stage 2 checks references once all
// of them are done. A fatal error only costs the table it came from, unless
// abortOnFatal is set.
import {
  ExportError,
  SheetNameConflictError,
  type BuiltTable,
  type DiagnosticLogger,
  type Diagnostics,
  type ExportConfig,
  type Issue,
  type IssueSummary,
  type RecordSet,
  type TableInput,
  type WorkbookInput
} from '@cfgsheet/core';
import type { CustomTypeRegistry } from '@cfgsheet/grammar';
import { checkReferences, type ReferenceReport, type TargetResolver } from '@cfgsheet/refs';
import {
  buildRecords,
  buildTableSchema,
  describeEnumSheet,
  describeTable,
  isEnumSheet,
  serializeDocument,
  type EnumDescription,
  type TableDescription
} from '@cfgsheet/table';

export interface ExportContext {
  config: ExportConfig;
  registry: CustomTypeRegistry;
  diagnostics: Diagnostics;
  resolveTarget?: TargetResolver;
  logger?: DiagnosticLogger;
}

export interface TableResult {
  workbook: string;
  built: BuiltTable;
  document: string;
  description: TableDescription;
}

export interface TableFailure {
  workbook: string;
  table: string;
  error: ExportError;
}

export interface BatchResult {
  tables: TableResult[];
  enums: EnumDescription[];
  failures: TableFailure[];
  skipped: string[];
  references: ReferenceReport;
  issues: readonly Issue[];
  summary: IssueSummary;
}

const WORKBOOK_NAME = /^[A-Z]/;

export function buildTable(input: TableInput, ctx: Pick<ExportContext, 'config' | 'registry' | 'diagnostics'>): BuiltTable {
  const schema = buildTableSchema(input, ctx);
  return buildRecords(schema, { ...ctx, idPosition: ctx.config.idPosition });
}

export function exportBatch(workbooks: WorkbookInput[], ctx: ExportContext): BatchResult {
  const { config, diagnostics, logger } = ctx;
  const tables: TableResult[] = [];
  const enums: EnumDescription[] = [];
  const failures: TableFailure[] = [];
  const skipped: string[] = [];
  const owners = new Map<string, string>();

  const attempt = (workbook: string, table: string, fn: () => void): void => {
    try {
      fn();
    } catch (e) {
      if (!(e instanceof ExportError)) throw e;
      diagnostics.fromError(e, { table: e.context.table ?? table });
      failures.push({ workbook, table, error: e });
      if (config.abortOnFatal) throw e;
    }
  };

  // ---------- stage 1: build ----------
  for (const wb of workbooks) {
    if (!WORKBOOK_NAME.test(wb.name)) {
      diagnostics.warn('CFG_WORKBOOK_SKIPPED', `Workbook ${wb.name} does not start with an uppercase letter; skipped`);
      skipped.push(wb.name);
      continue;
    }
    const [main, ...rest] = wb.sheets;
    if (!main) {
      diagnostics.warn('CFG_WORKBOOK_SKIPPED', `Workbook ${wb.name} has no sheets; skipped`);
      skipped.push(wb.name);
      continue;
    }

    attempt(wb.name, main.name, () => {
      const owner = owners.get(main.name);
      if (owner) throw new SheetNameConflictError(main.name, owner, wb.name);
      owners.set(main.name, wb.name);

      logger?.info({ workbook: wb.name, table: main.name }, 'building table');
      const built = buildTable(main, ctx);
      tables.push({
        workbook: wb.name,
        built,
        document: serializeDocument(built.records),
        description: describeTable(built.schema, built.enumKeys)
      });
    });

    for (const sheet of rest.filter(isEnumSheet)) {
      attempt(wb.name, sheet.name, () => { enums.push(describeEnumSheet(sheet)); });
    }
  }

  // ---------- stage 2: references ----------
  const recordSets = new Map<string, RecordSet>(tables.map((t) => [t.built.schema.name, t.built.records]));
  const references = checkReferences(
    recordSets,
    tables.flatMap((t) => t.built.pendingReferences),
    { emptyReference: config.emptyReference, resolveTarget: ctx.resolveTarget, diagnostics }
  );

  const summary = diagnostics.logSummary(`exported ${tables.length} tables, ${failures.length} failed`);
  return { tables, enums, failures, skipped, references, issues: diagnostics.issues, summary };
}
