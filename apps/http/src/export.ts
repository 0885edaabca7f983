// apps/http/src/export.ts
// Folder export: workbooks on disk -> documents and descriptions on disk.
import {
  Diagnostics,
  createLogger,
  type DiagnosticLogger,
  type ExportConfig
} from '@cfgsheet/core';
import { standardRegistry } from '@cfgsheet/grammar';
import { createOutputResolver, exportBatch, writeOutputs, type BatchResult, type WriteReport } from '@cfgsheet/exporter';
import { loadConfig, loadWorkbooks } from '@cfgsheet/source';

export interface ExportRunOptions {
  inputDir: string;
  outDir: string;
  descriptionsDir?: string;
  config?: ExportConfig; // defaults to cfgsheet.json found from inputDir
  logger?: DiagnosticLogger;
}

export interface ExportRun {
  result: BatchResult;
  report: WriteReport;
}

/**
 * Tables missing from this batch are resolved from documents a previous run
 * left in `outDir`, so a partial export still gets its references checked.
 */
export function runExport(opts: ExportRunOptions): ExportRun {
  const config = opts.config ?? loadConfig(opts.inputDir, opts.logger);
  const logger = opts.logger ?? createLogger({ level: config.logLevel });
  const diagnostics = new Diagnostics(logger);

  const workbooks = loadWorkbooks(opts.inputDir);
  logger.info({ inputDir: opts.inputDir, workbooks: workbooks.length }, 'workbooks loaded');

  const result = exportBatch(workbooks, {
    config,
    registry: standardRegistry({ fallback: config.customTypeFallback }),
    diagnostics,
    logger,
    resolveTarget: createOutputResolver(opts.outDir, config.naming, diagnostics)
  });
  const report = writeOutputs(result, { json: opts.outDir, descriptions: opts.descriptionsDir }, config);
  logger.info({ written: report.written.length, unchanged: report.unchanged.length }, 'outputs written');
  return { result, report };
}
