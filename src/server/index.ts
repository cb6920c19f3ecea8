import 'dotenv/config';
import config from '../config/index.js';
import { RecordStore, loadRecordsFile } from '../modules/records/store.js';
import { buildServer } from './app.js';

async function main() {
  const store = new RecordStore();
  const fastify = await buildServer({ store });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    fastify.log.info(`Received ${signal}, shutting down gracefully...`);
    await fastify.close();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  try {
    if (config.RECORDS_FILE) {
      fastify.log.info(`Loading records from ${config.RECORDS_FILE}...`);
      const records = await loadRecordsFile(config.RECORDS_FILE, fastify.log);
      for (const record of records) store.create(record);
    }

    await fastify.listen({
      port: config.PORT,
      host: config.HOST,
    });

    fastify.log.info(`Server listening on ${config.HOST}:${config.PORT} (${store.size} records)`);
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
}

void main();
