// apps/http/src/index.ts
import { loadConfig } from '@cfgsheet/source';
import { buildApp } from './app';

async function main() {
  const app = await buildApp({ config: loadConfig() });
  const port = Number(process.env.PORT ?? 4000);

  const onShutdown = async (signal: string) => {
    app.log.info({ signal }, 'shutting-down');
    try {
      await app.close();
    } finally {
      process.exit(0);
    }
  };
  process.on('SIGINT', () => { void onShutdown('SIGINT'); });
  process.on('SIGTERM', () => { void onShutdown('SIGTERM'); });

  await app.listen({ port, host: '0.0.0.0' });
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
