import { createApp } from './app.js';
import { ENV } from './config/env.js';
import { ensureStorageDir, initSequelize, sequelize } from './config/sequelize.js';
import { migrate } from './scripts/migrate.js';
import { createServices } from './services/index.js';

async function start() {
  ensureStorageDir();
  // Schema comes from the SQL migrations, never from sync()
  await migrate(sequelize);
  await initSequelize(sequelize);

  const services = createServices(sequelize);
  const seeded = await services.achievements.seedCatalog();
  console.log(`[server] achievement catalog: ${seeded} entries`);
  console.log(`[server] games: ${services.registry.list().map(g => g.type).join(', ')}`);

  const app = createApp(sequelize, services);
  const port = Number(ENV.PORT);
  const server = app.listen(port, () => {
    console.log(`[server] listening on :${port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`[server] ${signal} received, closing`);
    server.close(() => {
      sequelize.close().then(
        () => process.exit(0),
        (e: unknown) => {
          console.error('[server] closing database failed:', e instanceof Error ? e.message : e);
          process.exit(1);
        }
      );
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

start().catch(e => {
  console.error('[server] startup failed:', e instanceof Error ? e.message : e);
  process.exit(1);
});
