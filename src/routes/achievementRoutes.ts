import { Router } from 'express';
import { z } from 'zod';
import type { AchievementService } from '../services/achievementService.js';
import { AppError } from '../utils/errors.js';
import { achievementView } from './views.js';

export function createAchievementRouter(achievements: AchievementService) {
  const router = Router();

  router.get('/', async (req, res, next) => {
    try {
      const { category } = z.object({ category: z.string().min(1).optional() }).parse(req.query);
      const list = category ? await achievements.listByCategory(category) : await achievements.list();
      res.json({ achievements: list.filter(a => !a.isHidden).map(achievementView) });
    } catch (e) { next(e); }
  });

  router.get('/:id', async (req, res, next) => {
    try {
      const achievement = await achievements.get(req.params.id);
      if (!achievement || achievement.isHidden) throw new AppError('achievement_not_found', `Achievement ${req.params.id} not found`);
      res.json({ achievement: achievementView(achievement) });
    } catch (e) { next(e); }
  });

  return router;
}
