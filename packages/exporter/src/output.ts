// packages/exporter/src/output.ts
import fs from 'node:fs';
import path from 'node:path';
import type { Diagnostics, ExportConfig, NamingConfig, RecordSet } from '@cfgsheet/core';
import type { TargetResolver } from '@cfgsheet/refs';
import { parseDocument } from '@cfgsheet/table';
import type { BatchResult } from './pipeline';

export interface OutputDirs {
  json: string;
  descriptions?: string; // defaults to json
}

export interface WriteReport {
  written: string[];
  unchanged: string[];
}

export function outputFileName(pattern: string, name: string): string {
  return pattern.replaceAll('{name}', name);
}

function writeIfChanged(file: string, content: string, diffOnly: boolean, report: WriteReport): void {
  if (diffOnly && fs.existsSync(file) && fs.readFileSync(file, 'utf-8') === content) {
    report.unchanged.push(file);
    return;
  }
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content, 'utf-8');
  report.written.push(file);
}

function describe(value: object): string {
  return JSON.stringify(value, null, 2) + '\n';
}

/** Writes documents and descriptions; in diffOnly mode identical files are left untouched. */
export function writeOutputs(result: BatchResult, dirs: OutputDirs, config: Pick<ExportConfig, 'naming' | 'diffOnly'>): WriteReport {
  const { naming, diffOnly } = config;
  const descDir = dirs.descriptions ?? dirs.json;
  const report: WriteReport = { written: [], unchanged: [] };

  for (const t of result.tables) {
    const name = t.built.schema.name;
    writeIfChanged(path.join(dirs.json, outputFileName(naming.json, name)), t.document, diffOnly, report);
    const { keys, ...description } = t.description;
    writeIfChanged(path.join(descDir, outputFileName(naming.data, name)), describe(description), diffOnly, report);
    if (keys) writeIfChanged(path.join(descDir, outputFileName(naming.keys, name)), describe(keys), diffOnly, report);
  }
  for (const e of result.enums) {
    writeIfChanged(path.join(descDir, outputFileName(naming.enum, e.name)), describe(e), diffOnly, report);
  }
  return report;
}

/**
 * Resolves reference targets from documents already written to `dir`.
 * Each file is read at most once per resolver.
 */
export function createOutputResolver(dir: string, naming: NamingConfig, diagnostics?: Diagnostics): TargetResolver {
  const cache = new Map<string, RecordSet | undefined>();
  return (table) => {
    if (cache.has(table)) return cache.get(table);
    const file = path.join(dir, outputFileName(naming.json, table));
    let records: RecordSet | undefined;
    if (fs.existsSync(file)) {
      try {
        records = parseDocument(fs.readFileSync(file, 'utf-8'));
      } catch (e) {
        diagnostics?.warn('CFG_REF_TARGET_UNREADABLE', `Cannot read ${file}: ${e instanceof Error ? e.message : String(e)}`, { table });
      }
    }
    cache.set(table, records);
    return records;
  };
}
