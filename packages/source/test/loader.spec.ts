import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { pino } from 'pino';
import { CONFIG_FILE, _resetConfigCache, findUp, loadConfig, loadWorkbooks } from '../src';

const silent = pino({ level: 'silent' });
let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cfgsheet-src-'));
  _resetConfigCache();
  delete process.env.CFGSHEET_LOG_LEVEL;
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
  delete process.env.CFGSHEET_LOG_LEVEL;
});

function writeJson(rel: string, value: unknown): void {
  const file = path.join(dir, rel);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, JSON.stringify(value));
}

describe('loadWorkbooks', () => {
  it('reads every workbook recursively in path order', () => {
    writeJson('b/Shops.json', { sheets: [{ name: 'Shops', rows: [] }] });
    writeJson('Items.json', { name: 'ItemBook', sheets: [{ name: 'Items', rows: [[1, null, 'x']] }] });
    writeJson(CONFIG_FILE, { diffOnly: false });
    fs.writeFileSync(path.join(dir, 'readme.txt'), 'not a workbook');

    expect(loadWorkbooks(dir)).toEqual([
      { name: 'ItemBook', sheets: [{ name: 'Items', rows: [[1, null, 'x']] }] },
      { name: 'Shops', sheets: [{ name: 'Shops', rows: [] }] }
    ]);
  });

  it('rejects malformed workbook files', () => {
    writeJson('Items.json', { sheets: [{ name: 'Items', rows: [[{ nested: true }]] }] });
    expect(() => loadWorkbooks(dir)).toThrow();
  });
});

describe('loadConfig', () => {
  it('falls back to defaults without a config file', () => {
    const cfg = loadConfig(dir, silent);
    expect(cfg.idPosition).toBe('first');
    expect(cfg.diffOnly).toBe(true);
  });

  it('finds the config file in a parent directory', () => {
    writeJson(CONFIG_FILE, { idPosition: 'last', naming: { json: '{name}.json' } });
    const nested = path.join(dir, 'a', 'b');
    fs.mkdirSync(nested, { recursive: true });

    expect(findUp(CONFIG_FILE, nested)).toBe(path.join(dir, CONFIG_FILE));
    const cfg = loadConfig(nested, silent);
    expect(cfg.idPosition).toBe('last');
    expect(cfg.naming).toEqual({ json: '{name}.json', data: '{name}Data.json', keys: '{name}Keys.json', enum: '{name}.json' });
  });

  it('caches until reset', () => {
    writeJson(CONFIG_FILE, { abortOnFatal: true });
    expect(loadConfig(dir, silent).abortOnFatal).toBe(true);
    writeJson(CONFIG_FILE, { abortOnFatal: false });
    expect(loadConfig(dir, silent).abortOnFatal).toBe(true);
    _resetConfigCache();
    expect(loadConfig(dir, silent).abortOnFatal).toBe(false);
  });

  it('lets the environment override the log level', () => {
    writeJson(CONFIG_FILE, { logLevel: 'warn' });
    process.env.CFGSHEET_LOG_LEVEL = 'debug';
    expect(loadConfig(dir, silent).logLevel).toBe('debug');
  });

  it('rejects invalid config files', () => {
    writeJson(CONFIG_FILE, { idPosition: 'middle' });
    expect(() => loadConfig(dir, silent)).toThrow();
  });
});
