// apps/http/src/index.ts
import type { Store } from '@erdbase/core';
import { MemoryStore } from '@erdbase/store-memory';
import { MySQLStore, migrate } from '@erdbase/store-mysql';
import { buildApp } from './app';
import { describeConfig, loadConfig } from './config';
import { shutdown } from './shutdown';

async function openStore(kind: 'mysql' | 'memory', uri: string): Promise<{ store: Store; close: () => Promise<void> }> {
  if (kind === 'memory') {
    return { store: new MemoryStore(), close: async () => {} };
  }
  const mysql = MySQLStore.connect(uri);
  await migrate(mysql.db);
  return { store: mysql, close: () => mysql.close() };
}

async function main() {
  const config = loadConfig();
  const { store, close } = await openStore(config.store, config.mysqlUri);
  const app = await buildApp({ config, store });

  app.log.info(describeConfig(config), 'app-config');

  const onShutdown = async (signal: string) => {
    app.log.info({ signal }, 'shutting-down');
    process.exit(await shutdown(app, close));
  };
  process.on('SIGINT', () => void onShutdown('SIGINT'));
  process.on('SIGTERM', () => void onShutdown('SIGTERM'));

  await app.listen({ port: config.port, host: config.host });
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('Fatal boot error', err);
  process.exit(1);
});
