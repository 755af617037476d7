// Load Env Variables First
import { config } from 'dotenv';
import { resolve } from 'path';
config({ path: resolve(__dirname, '../.env') });

import { loadConfig } from './config';
import { createPool, createSessionFactory, verifyConnection } from './model/db';
import { ensureUsersTable } from './model/schema';
import createApp from './app';

const main = async () => {
  const appConfig = loadConfig();
  const pool = createPool(appConfig.db);

  await verifyConnection(pool);
  await ensureUsersTable(pool);

  const app = createApp(createSessionFactory(pool), appConfig.allowedOrigins);
  const server = app.listen(appConfig.port, () => {
    console.log(`🚀 Listening on port ${appConfig.port}`);
  });

  process.on('SIGINT', () => {
    server.close();
    pool
      .end()
      .then(() => {
        console.log('🔌 MySQL pool closed');
        process.exit(0);
      })
      .catch((err) => {
        console.error('Error while closing MySQL pool:', err);
        process.exit(1);
      });
  });
};

main().catch((err) => {
  console.error('❌ Unable to start server:', err);
  process.exit(1);
});
