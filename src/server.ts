import { config as loadEnv } from 'dotenv';
import { buildApp } from './app';
import { loadConfig } from './lib/config';
import { createLogger } from './lib/logger';
import { connectMongo, disconnectMongo } from './lib/mongo';
import { createServices } from './services';
loadEnv();

const config = loadConfig();
const logger = createLogger(config.logLevel);

// Counters go to MongoDB only when it is configured; connect before serving.
if (config.mongodbUri) {
  try {
    await connectMongo(config.mongodbUri, logger);
  } catch (err) {
    logger.error('Failed to connect to MongoDB: ' + (err instanceof Error ? err.message : String(err)));
    process.exit(1);
  }
}

const app = await buildApp(createServices(config, logger), { logLevel: config.logLevel });
app.addHook('onClose', async () => {
  await disconnectMongo();
});

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      }
    );
  });
}

app.listen({ port: config.port, host: config.host }).catch((err) => {
  app.log.error(err);
  process.exit(1);
});
