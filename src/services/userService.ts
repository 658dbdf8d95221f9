import { QueryTypes, type Sequelize } from 'sequelize';
import { ENV } from '../config/env.js';
import { User } from '../models/index.js';
import { AppError } from '../utils/errors.js';
import { withTransaction, type TxOptions } from '../utils/transaction.js';

export interface LeaderboardEntry {
  rank: number;
  userId: string;
  username: string;
  score: number;
  title: string;
}

export interface UserInfo {
  user: User;
  rank: number | null;
  profitRate: number;
}

function assertPositiveAmount(amount: number) {
  if (!Number.isInteger(amount) || amount <= 0) {
    throw new AppError('bad_request', 'Amount must be a positive whole number of coins');
  }
}

export class UserService {
  constructor(
    private readonly sequelize: Sequelize,
    private readonly startingCoins: number = ENV.STARTING_COINS
  ) {}

  async getOrCreateUser(userId: string, username: string, opts: TxOptions = {}): Promise<{ user: User; created: boolean }> {
    const { transaction } = opts;
    const existing = await User.findByPk(userId, { transaction });
    if (existing) {
      if (existing.username !== username) {
        existing.username = username;
        await existing.save({ transaction });
      }
      return { user: existing, created: false };
    }
    const user = await User.create({ userId, username, coins: this.startingCoins }, { transaction });
    return { user, created: true };
  }

  getUser(userId: string, opts: TxOptions = {}) {
    return User.findByPk(userId, { transaction: opts.transaction });
  }

  async requireUser(userId: string, opts: TxOptions = {}): Promise<User> {
    const user = await this.getUser(userId, opts);
    if (!user) throw new AppError('user_not_found', `User ${userId} not found`);
    return user;
  }

  async addCoins(userId: string, amount: number, opts: TxOptions = {}): Promise<User> {
    assertPositiveAmount(amount);
    return withTransaction(this.sequelize, opts, async transaction => {
      const user = await this.requireUser(userId, { transaction });
      user.coins += amount;
      user.totalEarned += amount;
      await user.save({ transaction });
      return user;
    });
  }

  async spendCoins(userId: string, amount: number, opts: TxOptions = {}): Promise<User> {
    assertPositiveAmount(amount);
    return withTransaction(this.sequelize, opts, async transaction => {
      const user = await this.requireUser(userId, { transaction });
      if (user.coins < amount) {
        throw new AppError('insufficient_balance', `Insufficient balance: you have ${user.coins} coins, ${amount} needed`);
      }
      user.coins -= amount;
      user.totalSpent += amount;
      await user.save({ transaction });
      return user;
    });
  }

  /** Gives back coins taken by spendCoins without counting them as earnings. */
  async refundCoins(userId: string, amount: number, opts: TxOptions = {}): Promise<User> {
    assertPositiveAmount(amount);
    return withTransaction(this.sequelize, opts, async transaction => {
      const user = await this.requireUser(userId, { transaction });
      user.coins += amount;
      user.totalSpent = Math.max(0, user.totalSpent - amount);
      await user.save({ transaction });
      return user;
    });
  }

  async transferCoins(fromUserId: string, toUserId: string, amount: number, opts: TxOptions = {}) {
    if (fromUserId === toUserId) throw new AppError('bad_request', 'Cannot transfer coins to yourself');
    return withTransaction(this.sequelize, opts, async transaction => {
      await this.requireUser(toUserId, { transaction });
      const from = await this.spendCoins(fromUserId, amount, { transaction });
      const to = await this.addCoins(toUserId, amount, { transaction });
      return { from, to };
    });
  }

  // Each level needs 100 * level experience
  async addExperience(userId: string, exp: number, opts: TxOptions = {}) {
    assertPositiveAmount(exp);
    return withTransaction(this.sequelize, opts, async transaction => {
      const user = await this.requireUser(userId, { transaction });
      const startLevel = user.level;
      user.experience += exp;
      while (user.experience >= 100 * user.level) {
        user.experience -= 100 * user.level;
        user.level += 1;
      }
      await user.save({ transaction });
      return { user, leveledUp: user.level > startLevel };
    });
  }

  async setTitle(userId: string, title: string, opts: TxOptions = {}): Promise<User> {
    const user = await this.requireUser(userId, opts);
    user.title = title;
    await user.save({ transaction: opts.transaction });
    return user;
  }

  async getLeaderboard(limit = 10, offset = 0): Promise<LeaderboardEntry[]> {
    const rows = await this.sequelize.query<{ rank: number; userId: string; username: string; coins: number; title: string | null }>(
      `SELECT ROW_NUMBER() OVER (ORDER BY coins DESC, user_id ASC) AS rank, user_id AS userId, username, coins, title
       FROM users
       ORDER BY coins DESC, user_id ASC
       LIMIT :limit OFFSET :offset`,
      { replacements: { limit, offset }, type: QueryTypes.SELECT }
    );
    return rows.map(r => ({ rank: Number(r.rank), userId: r.userId, username: r.username, score: Number(r.coins), title: r.title ?? '' }));
  }

  async getUserRank(userId: string): Promise<number | null> {
    const row = await this.sequelize.query<{ rank: number }>(
      `WITH ranked AS (
         SELECT user_id, ROW_NUMBER() OVER (ORDER BY coins DESC, user_id ASC) AS rank FROM users
       )
       SELECT rank FROM ranked WHERE user_id = :userId`,
      { replacements: { userId }, type: QueryTypes.SELECT, plain: true }
    );
    return row ? Number(row.rank) : null;
  }

  async getUserInfo(userId: string): Promise<UserInfo | null> {
    const user = await this.getUser(userId);
    if (!user) return null;
    const rank = await this.getUserRank(userId);
    const profitRate = user.totalSpent > 0 ? (user.totalEarned - user.totalSpent) / user.totalSpent : 0;
    return { user, rank, profitRate };
  }
}
