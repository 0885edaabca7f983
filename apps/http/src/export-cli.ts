// apps/http/src/export-cli.ts
// usage: tsx src/export-cli.ts <workbook-dir> <json-out-dir> [descriptions-dir]
import path from 'node:path';
import { createLogger } from '@cfgsheet/core';
import { runExport } from './export';

const logger = createLogger({ name: 'cfgsheet-export' });

function main(): number {
  const [inputArg, outArg, descArg] = process.argv.slice(2);
  const inputDir = inputArg ?? process.env.CFGSHEET_INPUT;
  const outDir = outArg ?? process.env.CFGSHEET_OUT;
  if (!inputDir || !outDir) {
    logger.error('usage: export <workbook-dir> <json-out-dir> [descriptions-dir]');
    return 2;
  }

  const { result } = runExport({
    inputDir: path.resolve(inputDir),
    outDir: path.resolve(outDir),
    descriptionsDir: descArg ? path.resolve(descArg) : undefined
  });
  return result.failures.length ? 1 : 0;
}

try {
  process.exitCode = main();
} catch (err) {
  logger.fatal({ err }, 'export failed');
  process.exitCode = 1;
}
