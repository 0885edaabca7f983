import { describe, it, expect } from 'vitest';
import { pino } from 'pino';
import { Diagnostics, RequiredFieldError, TypeConversionError, contextValue } from '../src';

function capture() {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino({ level: 'info' }, { write: (msg: string) => { lines.push(JSON.parse(msg)); } });
  return { lines, logger };
}

describe('Diagnostics', () => {
  it('collects issues and mirrors them to the logger', () => {
    const { lines, logger } = capture();
    const d = new Diagnostics(logger);
    d.warn('CFG_BLANK_ROW', 'Skipped blank row 8', { table: 'Items', row: 8 });

    expect(d.issues).toEqual([
      { severity: 'warning', code: 'CFG_BLANK_ROW', message: 'Skipped blank row 8', table: 'Items', row: 8 }
    ]);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 40, msg: 'Skipped blank row 8', code: 'CFG_BLANK_ROW', table: 'Items', row: 8 });
  });

  it('records errors with their own severity', () => {
    const d = new Diagnostics();
    d.fromError(new RequiredFieldError('Items', 'name', 9));
    d.fromError(new TypeConversionError('int', 'abc', 'not an integer', { table: 'Items', field: 'hp', row: 10 }));

    expect(d.issues.map((i) => [i.severity, i.code, i.row])).toEqual([
      ['fatal', 'CFG_REQUIRED_FIELD', 9],
      ['error', 'CFG_TYPE_CONVERSION', 10]
    ]);
    expect(d.issues[1].value).toBe('abc');
  });

  it('summarises and filters by table', () => {
    const d = new Diagnostics();
    d.info('A', 'a', { table: 'Items' });
    d.warn('B', 'b', { table: 'Shops' });
    d.error('C', 'c', { table: 'Items' });
    expect(d.summary()).toEqual({ fatal: 0, error: 1, warning: 1, info: 1 });
    expect(d.forTable('Items').map((i) => i.code)).toEqual(['A', 'C']);
  });

  it('logs the summary at the worst level seen', () => {
    const { lines, logger } = capture();
    const d = new Diagnostics(logger);
    d.warn('B', 'b');
    const s = d.logSummary('batch');
    expect(s.warning).toBe(1);
    expect(lines[1]).toMatchObject({ level: 40, msg: 'batch: 0 fatal, 0 errors, 1 warnings' });
  });
});

describe('contextValue', () => {
  it('keeps scalars and stringifies the rest', () => {
    expect(contextValue(3)).toBe(3);
    expect(contextValue(undefined)).toBeNull();
    expect(contextValue([1, 2])).toBe('[1,2]');
    expect(contextValue(new Map([[1, 'a']]))).toBe('[[1,"a"]]');
  });
});
