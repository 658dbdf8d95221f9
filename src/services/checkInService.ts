import { UniqueConstraintError, type Sequelize } from 'sequelize';
import { ENV } from '../config/env.js';
import { CheckInRecord, type User } from '../models/index.js';
import { AppError } from '../utils/errors.js';
import type { UserService } from './userService.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CheckInReward {
  coins: number;
  bonusCoins?: number;
}

export interface CheckInResult {
  user: User;
  record: CheckInRecord;
  consecutiveDays: number;
  totalReward: number;
  isNewUser: boolean;
}

export interface CheckInStats {
  consecutiveDays: number;
  totalCheckIns: number;
  canCheckIn: boolean;
  nextCheckInDate: string;
  recentCoinsEarned: number;
  recent: CheckInRecord[];
}

/** Calendar date (YYYY-MM-DD) of an instant in the given IANA time zone. */
export function dateKey(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', { timeZone, year: 'numeric', month: '2-digit', day: '2-digit' }).formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find(p => p.type === type)?.value ?? '';
  return `${part('year')}-${part('month')}-${part('day')}`;
}

export function daysBetween(from: string, to: string): number {
  return Math.round((Date.parse(`${to}T00:00:00Z`) - Date.parse(`${from}T00:00:00Z`)) / DAY_MS);
}

export function addDays(day: string, days: number): string {
  return new Date(Date.parse(`${day}T00:00:00Z`) + days * DAY_MS).toISOString().slice(0, 10);
}

export class CheckInService {
  private readonly timeZone: string;
  private readonly now: () => Date;

  constructor(
    private readonly sequelize: Sequelize,
    private readonly users: UserService,
    options: { timeZone?: string; now?: () => Date } = {}
  ) {
    this.timeZone = options.timeZone ?? ENV.CHECK_IN_TIME_ZONE;
    this.now = options.now ?? (() => new Date());
  }

  private lastCheckInDay(user: User): string | null {
    return user.lastCheckIn ? dateKey(new Date(user.lastCheckIn), this.timeZone) : null;
  }

  async canCheckIn(userId: string): Promise<boolean> {
    const user = await this.users.getUser(userId);
    if (!user) return true;
    return this.lastCheckInDay(user) !== dateKey(this.now(), this.timeZone);
  }

  async checkIn(userId: string, username: string, reward: CheckInReward): Promise<CheckInResult> {
    const bonusCoins = reward.bonusCoins ?? 0;
    if (!Number.isInteger(reward.coins) || reward.coins < 0 || !Number.isInteger(bonusCoins) || bonusCoins < 0) {
      throw new AppError('bad_request', 'Check-in rewards must be non-negative whole numbers');
    }
    const now = this.now();
    const today = dateKey(now, this.timeZone);

    try {
      return await this.sequelize.transaction(async transaction => {
        const { user, created } = await this.users.getOrCreateUser(userId, username, { transaction });
        const last = this.lastCheckInDay(user);
        if (last === today) throw new AppError('already_checked_in', 'Already checked in today');

        const consecutiveDays = last !== null && daysBetween(last, today) === 1 ? user.checkInCount + 1 : 1;
        const totalReward = reward.coins + bonusCoins;

        user.lastCheckIn = now;
        user.checkInCount = consecutiveDays;
        user.totalCheckIns += 1;
        user.coins += totalReward;
        user.totalEarned += totalReward;
        await user.save({ transaction });

        const record = await CheckInRecord.create(
          { userId, checkInDate: today, coinsEarned: reward.coins, consecutiveDays, bonusCoins },
          { transaction }
        );
        return { user, record, consecutiveDays, totalReward, isNewUser: created };
      });
    } catch (e) {
      // (user_id, check_in_date) is unique; a racing second check-in lands here
      if (e instanceof UniqueConstraintError) throw new AppError('already_checked_in', 'Already checked in today');
      throw e;
    }
  }

  listCheckIns(userId: string, limit = 30) {
    return CheckInRecord.findAll({ where: { userId }, order: [['checkInDate', 'DESC']], limit });
  }

  countCheckIns(userId: string) {
    return CheckInRecord.count({ where: { userId } });
  }

  async getStats(userId: string): Promise<CheckInStats | null> {
    const user = await this.users.getUser(userId);
    if (!user) return null;
    const records = await this.listCheckIns(userId, 30);
    const totalCheckIns = await this.countCheckIns(userId);
    const today = dateKey(this.now(), this.timeZone);
    const last = this.lastCheckInDay(user);
    return {
      consecutiveDays: user.checkInCount,
      totalCheckIns,
      canCheckIn: last !== today,
      nextCheckInDate: last !== null && last >= today ? addDays(last, 1) : today,
      recentCoinsEarned: records.reduce((sum, r) => sum + r.coinsEarned + r.bonusCoins, 0),
      recent: records.slice(0, 7),
    };
  }
}
