import { Router } from 'express';
import { z } from 'zod';
import { ROOM_STATUSES } from '../models/gameRoom.js';
import type { AppServices } from '../services/index.js';
import { AppError } from '../utils/errors.js';
import { achievementView, checkInView, userView } from './views.js';

const pageSchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
  offset: z.coerce.number().int().min(0).default(0),
});

export function createUserRouter({ users, checkIns, achievements, records, games }: AppServices) {
  const router = Router();

  router.get('/leaderboard', async (req, res, next) => {
    try {
      const { limit, offset } = pageSchema.parse(req.query);
      res.json({ leaderboard: await users.getLeaderboard(limit, offset) });
    } catch (e) { next(e); }
  });

  router.get('/:userId', async (req, res, next) => {
    try {
      const info = await users.getUserInfo(req.params.userId);
      if (!info) throw new AppError('user_not_found', `User ${req.params.userId} not found`);
      res.json({ user: userView(info.user), rank: info.rank, profitRate: info.profitRate });
    } catch (e) { next(e); }
  });

  router.get('/:userId/rooms', async (req, res, next) => {
    try {
      const { status } = z.object({ status: z.enum(ROOM_STATUSES).optional() }).parse(req.query);
      res.json({ rooms: await games.listUserRooms(req.params.userId, status) });
    } catch (e) { next(e); }
  });

  router.post('/:userId/check-in', async (req, res, next) => {
    try {
      const body = z.object({
        username: z.string().min(1).max(64),
        coins: z.number().int().min(0),
        bonusCoins: z.number().int().min(0).optional(),
      }).parse(req.body);
      const result = await checkIns.checkIn(req.params.userId, body.username, { coins: body.coins, bonusCoins: body.bonusCoins });
      res.json({
        user: userView(result.user),
        record: checkInView(result.record),
        consecutiveDays: result.consecutiveDays,
        totalReward: result.totalReward,
        isNewUser: result.isNewUser,
      });
    } catch (e) { next(e); }
  });

  router.get('/:userId/check-ins', async (req, res, next) => {
    try {
      const { limit } = z.object({ limit: z.coerce.number().int().min(1).max(100).default(30) }).parse(req.query);
      const list = await checkIns.listCheckIns(req.params.userId, limit);
      const stats = await checkIns.getStats(req.params.userId);
      res.json({
        checkIns: list.map(checkInView),
        stats: stats && { ...stats, recent: stats.recent.map(checkInView) },
      });
    } catch (e) { next(e); }
  });

  router.get('/:userId/achievements', async (req, res, next) => {
    try {
      const owned = await achievements.listUserAchievements(req.params.userId);
      const progress = await achievements.getProgress(req.params.userId);
      res.json({
        achievements: owned.map(ua => ({
          achievedAt: ua.achievedAt,
          notified: !!ua.notified,
          achievement: ua.achievement ? achievementView(ua.achievement) : null,
        })),
        progress,
      });
    } catch (e) { next(e); }
  });

  // Returns achievements the user has not been told about yet and marks them told
  router.post('/:userId/achievements/notifications', async (req, res, next) => {
    try {
      const fresh = await achievements.takeUnnotified(req.params.userId);
      res.json({ achievements: fresh.map(achievementView) });
    } catch (e) { next(e); }
  });

  router.post('/:userId/achievements/:id', async (req, res, next) => {
    try {
      const { achievement, awarded } = await achievements.award(req.params.userId, req.params.id);
      res.status(awarded ? 201 : 200).json({ achievement: achievementView(achievement), awarded });
    } catch (e) { next(e); }
  });

  router.get('/:userId/records', async (req, res, next) => {
    try {
      const { gameType, limit } = z.object({
        gameType: z.string().min(1).optional(),
        limit: z.coerce.number().int().min(1).max(200).default(50),
      }).parse(req.query);
      res.json({ records: await records.listForUser(req.params.userId, { gameType, limit }) });
    } catch (e) { next(e); }
  });

  router.get('/:userId/stats/:gameType', async (req, res, next) => {
    try {
      res.json({ stats: await records.statsForUser(req.params.userId, req.params.gameType) });
    } catch (e) { next(e); }
  });

  return router;
}
