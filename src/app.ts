import express from 'express';
import helmet from 'helmet';
import type { Sequelize } from 'sequelize';
import { createCorsMiddleware } from './config/cors.js';
import { ENV } from './config/env.js';
import { requireApiKey } from './middleware/auth.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createAchievementRouter } from './routes/achievementRoutes.js';
import { createGameRouter } from './routes/gameRoutes.js';
import { createUserRouter } from './routes/userRoutes.js';
import type { AppServices } from './services/index.js';

export interface AppOptions {
  apiKey?: string;
  corsOrigins?: string;
}

export function createApp(sequelize: Sequelize, services: AppServices, options: AppOptions = {}) {
  const app = express();
  app.use(helmet());
  app.use(createCorsMiddleware(options.corsOrigins ?? ENV.CORS_ORIGINS));
  app.use(express.json());

  app.get('/health', async (_req, res) => {
    try {
      await sequelize.authenticate();
      res.json({ ok: true });
    } catch (e) {
      res.status(500).json({ ok: false, error: e instanceof Error ? e.message : String(e) });
    }
  });

  // API prefix
  const auth = requireApiKey(options.apiKey ?? ENV.API_KEY);
  app.use('/api/users', auth, createUserRouter(services));
  app.use('/api/achievements', auth, createAchievementRouter(services.achievements));
  app.use('/api', auth, createGameRouter(services.games));

  // Global error handler (must be after routes)
  app.use(errorHandler);
  return app;
}
