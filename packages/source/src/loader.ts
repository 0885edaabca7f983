// packages/source/src/loader.ts
import fs from 'node:fs';
import path from 'node:path';
import {
  ExportConfigSchema,
  WorkbookFileSchema,
  createLogger,
  type DiagnosticLogger,
  type ExportConfig,
  type WorkbookInput
} from '@cfgsheet/core';

export const CONFIG_FILE = 'cfgsheet.json';

const cache = new Map<string, ExportConfig>();

export function findUp(filename: string, startDir = process.cwd()): string | null {
  let dir = path.resolve(startDir);
  while (true) {
    const candidate = path.join(dir, filename);
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * loadConfig() looks for cfgsheet.json from `startDir` upwards. A missing file
 * means defaults; a present but invalid one throws (ZodError). Results are
 * cached per start directory. CFGSHEET_LOG_LEVEL overrides `logLevel`.
 */
export function loadConfig(startDir = process.cwd(), logger: DiagnosticLogger = createLogger()): ExportConfig {
  const key = path.resolve(startDir);
  const hit = cache.get(key);
  if (hit) return hit;

  const file = findUp(CONFIG_FILE, key);
  let raw: unknown = {};
  if (file) {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
    logger.debug({ file }, 'config loaded');
  } else {
    logger.warn({ startDir: key }, `${CONFIG_FILE} not found, using defaults`);
  }

  const envLevel = process.env.CFGSHEET_LOG_LEVEL?.trim();
  const base = typeof raw === 'object' && raw !== null ? raw : {};
  const config = ExportConfigSchema.parse(envLevel ? { ...base, logLevel: envLevel } : base);
  cache.set(key, config);
  return config;
}

/** for tests / hot reload */
export function _resetConfigCache(): void { cache.clear(); }

function listJsonFiles(dir: string): string[] {
  const out: string[] = [];
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) out.push(...listJsonFiles(full));
    else if (entry.isFile() && entry.name.endsWith('.json') && entry.name !== CONFIG_FILE) out.push(full);
  }
  return out;
}

export function loadWorkbookFile(file: string): WorkbookInput {
  const parsed = WorkbookFileSchema.parse(JSON.parse(fs.readFileSync(file, 'utf-8')));
  return { name: parsed.name ?? path.basename(file, '.json'), sheets: parsed.sheets };
}

/** Every `*.json` workbook under `dir`, recursively, in path order. */
export function loadWorkbooks(dir: string): WorkbookInput[] {
  return listJsonFiles(dir).sort().map(loadWorkbookFile);
}
