import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { Sequelize } from 'sequelize';
import { createTestDb } from '../../__tests__/helpers.js';
import { AchievementService, catalogSchema, loadCatalog } from '../achievementService.js';
import { UserService } from '../userService.js';

describe('AchievementService', () => {
  let sequelize: Sequelize;
  let users: UserService;
  let service: AchievementService;

  beforeEach(async () => {
    sequelize = await createTestDb();
    users = new UserService(sequelize, 1000);
    service = new AchievementService(sequelize, users);
    await service.seedCatalog();
    await users.getOrCreateUser('u1', 'Alice');
  });

  afterEach(async () => {
    await sequelize.close();
  });

  it('seeds the bundled catalog', async () => {
    expect(loadCatalog()).toHaveLength(20);
    expect(await service.list()).toHaveLength(19);
    expect(await service.list({ includeHidden: true })).toHaveLength(20);
    expect((await service.listByCategory('level')).map(a => a.id)).toEqual(['level_5', 'level_10', 'level_20', 'level_50']);
    const a = await service.get('level_5');
    expect([a?.rewardCoins, a?.rewardTitle]).toEqual([200, null]);
  });

  it('updates entries when seeded again', async () => {
    const entry = { id: 'helper', name: 'Helper', description: 'Helped out', category: 'misc', conditionType: 'manual', conditionValue: 1 };
    await service.seedCatalog(catalogSchema.parse([entry]));
    await service.seedCatalog(catalogSchema.parse([{ ...entry, rewardCoins: 10 }]));
    expect((await service.get('helper'))?.rewardCoins).toBe(10);
    expect(await service.listByCategory('misc')).toHaveLength(1);
  });

  it('awards once and pays the reward', async () => {
    const first = await service.award('u1', 'first_thousand');
    expect(first.awarded).toBe(true);
    let user = await users.requireUser('u1');
    expect([user.coins, user.totalEarned, user.title]).toEqual([1200, 200, 'Well-off']);

    const again = await service.award('u1', 'first_thousand');
    expect(again.awarded).toBe(false);
    user = await users.requireUser('u1');
    expect(user.coins).toBe(1200);
    expect(await service.hasAchievement('u1', 'first_thousand')).toBe(true);
    expect(await service.hasAchievement('u1', 'level_5')).toBe(false);
  });

  it('rejects unknown achievements and users', async () => {
    await expect(service.award('u1', 'nope')).rejects.toMatchObject({ code: 'achievement_not_found', status: 404 });
    await expect(service.award('ghost', 'level_5')).rejects.toMatchObject({ code: 'user_not_found' });
    expect(await service.hasAchievement('ghost', 'level_5')).toBe(false);
  });

  it('hands out unnotified achievements once', async () => {
    await service.award('u1', 'level_5');
    await service.award('u1', 'check_in_7');

    expect((await service.takeUnnotified('u1')).map(a => a.id).sort()).toEqual(['check_in_7', 'level_5']);
    expect(await service.takeUnnotified('u1')).toEqual([]);

    const owned = await service.listUserAchievements('u1');
    expect(owned.map(o => [o.achievementId, !!o.notified, o.achievement?.name]).sort()).toEqual([
      ['check_in_7', true, 'Daily Habit'],
      ['level_5', true, 'Fresh Out'],
    ]);
  });

  it('summarises progress per category', async () => {
    await service.award('u1', 'first_hundred');
    const progress = await service.getProgress('u1');
    expect(progress.total).toBe(20);
    expect(progress.completed).toBe(1);
    expect(progress.completionRate).toBe(0.05);
    expect(progress.categories.coins).toMatchObject({ total: 7, completed: 1 });
    expect(progress.categories.game?.total).toBe(3);
    // the hidden one stays out of the list until earned
    expect(progress.categories.game?.achievements.map(a => a.id)).toEqual(['roulette_first_win', 'roulette_win_10']);
  });
});
