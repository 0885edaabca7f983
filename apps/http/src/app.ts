// apps/http/src/app.ts
import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { ZodError, z } from 'zod';
import {
  Diagnostics,
  ExportConfigSchema,
  ExportError,
  TableInputSchema,
  WorkbookSchema,
  defaultConfig,
  type ExportConfig
} from '@cfgsheet/core';
import { formatType, standardRegistry } from '@cfgsheet/grammar';
import { buildTableSchema, describeTable, enumKeysOf, exportedFields } from '@cfgsheet/table';
import { exportBatch } from '@cfgsheet/exporter';

export interface AppOptions {
  config?: ExportConfig;
  logger?: boolean;
  rateLimitMax?: number;
}

const ExportRequestSchema = z.object({
  workbooks: z.array(WorkbookSchema).min(1),
  config: z.record(z.string(), z.unknown()).optional()
}).strict();

function classifyError(err: Error & { statusCode?: number }) {
  if (err instanceof ZodError) {
    const details = err.issues.map((i) => ({ path: i.path.join('.'), msg: i.message, code: i.code }));
    return { status: 400, body: { code: 'VALIDATION', details } };
  }
  if (err instanceof ExportError) {
    return { status: 422, body: { code: err.code, message: err.message, context: err.context } };
  }
  if (err.statusCode && err.statusCode < 500) {
    return { status: err.statusCode, body: { code: 'REQUEST', message: err.message } };
  }
  return { status: 500, body: { code: 'INTERNAL', message: 'Request failed' } };
}

export async function buildApp(opts: AppOptions = {}): Promise<FastifyInstance> {
  const baseConfig = opts.config ?? defaultConfig();
  const registries = new Map([true, false].map((fallback) => [fallback, standardRegistry({ fallback })]));
  const registryFor = (config: ExportConfig) =>
    registries.get(config.customTypeFallback) ?? standardRegistry({ fallback: config.customTypeFallback });

  const app = Fastify({
    logger: opts.logger ?? { level: baseConfig.logLevel },
    bodyLimit: 10_000_000
  });

  await app.register(cors, {
    origin: (origin, cb) => {
      const allow = (process.env.CORS_ORIGIN || '').split(',').map((s) => s.trim()).filter(Boolean);
      if (!origin || allow.length === 0 || allow.includes(origin)) return cb(null, true);
      cb(new Error('CORS not allowed'), false);
    },
    credentials: true
  });

  await app.register(rateLimit, {
    max: opts.rateLimitMax ?? 600,
    timeWindow: '1 minute'
  });

  app.addHook('onSend', async (req, reply, payload) => {
    reply.header('x-request-id', req.id);
    return payload;
  });

  app.setErrorHandler((err, req, reply) => {
    const { status, body } = classifyError(err);
    if (status >= 500) req.log.error({ err, requestId: req.id }, 'request-error');
    else req.log.warn({ code: body.code, requestId: req.id }, 'request-rejected');
    reply.status(status).send(body);
  });

  app.get('/healthz', async () => ({ ok: true }));

  // header rows + key column check only; no records
  app.post('/schema', async (req) => {
    const table = TableInputSchema.parse(req.body);
    const diagnostics = new Diagnostics(req.log);
    const schema = buildTableSchema(table, { registry: registryFor(baseConfig), diagnostics });
    return {
      table: schema.name,
      keyPolicy: schema.keyPolicy,
      fields: exportedFields(schema).map((f) => ({
        name: f.actualName,
        type: formatType(f.type),
        label: f.label,
        ...(f.reference ? { reference: f.reference } : {})
      })),
      description: describeTable(schema, enumKeysOf(schema.keyPolicy, schema.rows)),
      issues: diagnostics.issues
    };
  });

  app.post('/export', async (req) => {
    const body = ExportRequestSchema.parse(req.body);
    const config = ExportConfigSchema.parse({ ...baseConfig, ...body.config });
    const diagnostics = new Diagnostics(req.log);
    const result = exportBatch(body.workbooks, { config, registry: registryFor(config), diagnostics });

    return {
      tables: result.tables.map((t) => ({
        workbook: t.workbook,
        name: t.built.schema.name,
        document: t.document,
        description: t.description
      })),
      enums: result.enums,
      failures: result.failures.map((f) => ({ workbook: f.workbook, table: f.table, code: f.error.code, message: f.error.message })),
      skipped: result.skipped,
      references: { checked: result.references.checked, skipped: result.references.skipped },
      issues: result.issues,
      summary: result.summary
    };
  });

  return app;
}
