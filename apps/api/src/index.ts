import 'dotenv/config';
import { loadConfig } from './config.js';
import { openDatabase } from './db.js';
import { buildServer } from './server.js';

const config = loadConfig();
const db = openDatabase(config.databasePath);
const server = await buildServer({ config, db });

server.addHook('onClose', async () => {
  db.close();
});

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    server.log.info({ signal }, 'shutting down');
    server.close().then(
      () => process.exit(0),
      err => {
        server.log.error(err);
        process.exit(1);
      }
    );
  });
}

try {
  await server.listen({ port: config.port, host: config.host });
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
