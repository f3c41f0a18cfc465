import dotenv from 'dotenv';
import { createApp } from './app';
import { loadConfig } from './config';
import { connectDatabase } from './database';
import { InstrumentRegistry } from './modules/surveys/registry';
import { MongoResultStore } from './modules/surveys/store';
import { MongoUserStore } from './modules/users/store';
import { safeLogger } from './security/safeLogger';

dotenv.config();

async function main() {
  const config = loadConfig();
  // Band tables are checked here, before anything listens.
  const registry = new InstrumentRegistry();
  const connection = await connectDatabase(config.databaseUrl);

  const app = createApp({
    config,
    registry,
    userStore: new MongoUserStore(connection),
    resultStore: new MongoResultStore(connection, registry),
  });

  app.listen(config.port, () => {
    safeLogger.info('server.started', {
      port: config.port,
      instruments: registry.list().map((instrument) => instrument.name),
    });
  });
}

main().catch((err: unknown) => {
  safeLogger.error('server.start.failed', { message: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
