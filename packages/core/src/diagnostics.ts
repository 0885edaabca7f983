// packages/core/src/diagnostics.ts
import { pino, type BaseLogger, type Level } from 'pino';
import { ExportError, type ContextValue, type ErrorContext } from './errors';

export type Severity = 'fatal' | 'error' | 'warning' | 'info';

export interface Issue extends ErrorContext {
  severity: Severity;
  code: string;
  message: string;
}

export type IssueSummary = Record<Severity, number>;

export type DiagnosticLogger = Pick<BaseLogger, 'info' | 'warn' | 'error' | 'fatal' | 'debug'>;

export interface LoggerOptions {
  level?: Level | 'silent';
  name?: string;
}

export function createLogger(opts: LoggerOptions = {}): BaseLogger {
  return pino({
    name: opts.name ?? 'cfgsheet',
    level: opts.level ?? process.env.CFGSHEET_LOG_LEVEL ?? 'info'
  });
}

const LOG_LEVEL: Record<Severity, 'fatal' | 'error' | 'warn' | 'info'> = {
  fatal: 'fatal',
  error: 'error',
  warning: 'warn',
  info: 'info'
};

/**
 * Collects every issue raised during a run and mirrors it to the logger.
 * Recoverable problems are read back from here at the end of a batch
 * instead of interrupting row processing.
 */
export class Diagnostics {
  private readonly items: Issue[] = [];

  constructor(private readonly logger: DiagnosticLogger = createLogger({ level: 'silent' })) {}

  report(issue: Issue): void {
    this.items.push(issue);
    const { severity, message, ...ctx } = issue;
    this.logger[LOG_LEVEL[severity]](ctx, message);
  }

  info(code: string, message: string, ctx: ErrorContext = {}): void {
    this.report({ severity: 'info', code, message, ...ctx });
  }

  warn(code: string, message: string, ctx: ErrorContext = {}): void {
    this.report({ severity: 'warning', code, message, ...ctx });
  }

  error(code: string, message: string, ctx: ErrorContext = {}): void {
    this.report({ severity: 'error', code, message, ...ctx });
  }

  /** Records an ExportError, as `fatal` or `error` depending on the error itself. */
  fromError(err: ExportError, extra: ErrorContext = {}): void {
    this.report({
      severity: err.fatal ? 'fatal' : 'error',
      code: err.code,
      message: err.message,
      ...err.context,
      ...extra
    });
  }

  get issues(): readonly Issue[] {
    return this.items;
  }

  forTable(table: string): Issue[] {
    return this.items.filter((i) => i.table === table);
  }

  summary(): IssueSummary {
    const out: IssueSummary = { fatal: 0, error: 0, warning: 0, info: 0 };
    for (const i of this.items) out[i.severity] += 1;
    return out;
  }

  logSummary(label: string): IssueSummary {
    const s = this.summary();
    const level = s.fatal || s.error ? 'error' : s.warning ? 'warn' : 'info';
    this.logger[level]({ summary: s }, `${label}: ${s.fatal} fatal, ${s.error} errors, ${s.warning} warnings`);
    return s;
  }
}

export function contextValue(v: unknown): ContextValue {
  if (v === null || v === undefined) return null;
  if (typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean') return v;
  if (v instanceof Map) return JSON.stringify([...v.entries()]);
  return JSON.stringify(v);
}
