import fs from 'fs';
import { z } from 'zod';
import type { Sequelize } from 'sequelize';
import { Achievement, UserAchievement } from '../models/index.js';
import { AppError } from '../utils/errors.js';
import { resolveSourcePath } from '../utils/paths.js';
import type { UserService } from './userService.js';

const catalogEntrySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  category: z.string().min(1),
  conditionType: z.string().min(1),
  conditionValue: z.number().int().nonnegative(),
  rewardCoins: z.number().int().nonnegative().default(0),
  rewardTitle: z.string().nullable().default(null),
  icon: z.string().nullable().default(null),
  isHidden: z.boolean().default(false),
});

export type CatalogEntry = z.infer<typeof catalogEntrySchema>;

export const catalogSchema = z.array(catalogEntrySchema);

export interface AwardResult {
  achievement: Achievement;
  awarded: boolean;
}

export interface CategoryProgress {
  total: number;
  completed: number;
  achievements: { id: string; name: string; completed: boolean }[];
}

export interface AchievementProgress {
  total: number;
  completed: number;
  completionRate: number;
  categories: Record<string, CategoryProgress>;
}

export function loadCatalog(file: string = resolveSourcePath('data', 'achievements.json')): CatalogEntry[] {
  return catalogSchema.parse(JSON.parse(fs.readFileSync(file, 'utf8')));
}

// Unlock rules live with the host: callers decide when to award
export class AchievementService {
  constructor(
    private readonly sequelize: Sequelize,
    private readonly users: UserService
  ) {}

  /** Inserts or refreshes every catalog entry; returns how many were written. */
  async seedCatalog(entries: CatalogEntry[] = loadCatalog()): Promise<number> {
    await this.sequelize.transaction(async transaction => {
      for (const entry of entries) {
        await Achievement.upsert(entry, { transaction });
      }
    });
    return entries.length;
  }

  list(options: { includeHidden?: boolean } = {}) {
    return Achievement.findAll({
      where: options.includeHidden ? {} : { isHidden: false },
      order: [['category', 'ASC'], ['conditionValue', 'ASC'], ['id', 'ASC']],
    });
  }

  get(id: string) {
    return Achievement.findByPk(id);
  }

  listByCategory(category: string) {
    return Achievement.findAll({ where: { category }, order: [['conditionValue', 'ASC'], ['id', 'ASC']] });
  }

  async hasAchievement(userId: string, achievementId: string): Promise<boolean> {
    const row = await UserAchievement.findOne({ where: { userId, achievementId } });
    return row !== null;
  }

  /** Records the achievement once and pays its rewards; a repeat award changes nothing. */
  award(userId: string, achievementId: string): Promise<AwardResult> {
    return this.sequelize.transaction(async transaction => {
      const achievement = await Achievement.findByPk(achievementId, { transaction });
      if (!achievement) throw new AppError('achievement_not_found', `Achievement ${achievementId} not found`);
      await this.users.requireUser(userId, { transaction });

      const existing = await UserAchievement.findOne({ where: { userId, achievementId }, transaction });
      if (existing) return { achievement, awarded: false };

      await UserAchievement.create({ userId, achievementId }, { transaction });
      if (achievement.rewardCoins > 0) await this.users.addCoins(userId, achievement.rewardCoins, { transaction });
      if (achievement.rewardTitle) await this.users.setTitle(userId, achievement.rewardTitle, { transaction });
      return { achievement, awarded: true };
    });
  }

  listUserAchievements(userId: string) {
    return UserAchievement.findAll({
      where: { userId },
      include: [{ model: Achievement, as: 'achievement' }],
      order: [['achievedAt', 'DESC'], ['achievementId', 'ASC']],
    });
  }

  /** Returns achievements not yet announced to the user and marks them notified. */
  takeUnnotified(userId: string): Promise<Achievement[]> {
    return this.sequelize.transaction(async transaction => {
      const rows = await UserAchievement.findAll({
        where: { userId, notified: false },
        include: [{ model: Achievement, as: 'achievement' }],
        order: [['achievedAt', 'ASC'], ['achievementId', 'ASC']],
        transaction,
      });
      if (!rows.length) return [];
      await UserAchievement.update(
        { notified: true },
        { where: { userId, achievementId: rows.map(r => r.achievementId) }, transaction }
      );
      return rows.flatMap(r => (r.achievement ? [r.achievement] : []));
    });
  }

  async getProgress(userId: string): Promise<AchievementProgress> {
    const [all, owned] = await Promise.all([this.list({ includeHidden: true }), UserAchievement.findAll({ where: { userId } })]);
    const done = new Set(owned.map(o => o.achievementId));
    const categories: Record<string, CategoryProgress> = {};
    for (const a of all) {
      const bucket = (categories[a.category] ??= { total: 0, completed: 0, achievements: [] });
      const completed = done.has(a.id);
      bucket.total += 1;
      if (completed) bucket.completed += 1;
      // hidden ones show up only once earned
      if (!a.isHidden || completed) bucket.achievements.push({ id: a.id, name: a.name, completed });
    }
    const completed = all.filter(a => done.has(a.id)).length;
    return { total: all.length, completed, completionRate: all.length ? completed / all.length : 0, categories };
  }
}
