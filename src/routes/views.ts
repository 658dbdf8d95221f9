import type { Achievement, CheckInRecord, User } from '../models/index.js';

// JSON shapes of model rows
export function userView(u: User) {
  return {
    userId: u.userId,
    username: u.username,
    coins: u.coins,
    totalEarned: u.totalEarned,
    totalSpent: u.totalSpent,
    checkInCount: u.checkInCount,
    lastCheckIn: u.lastCheckIn,
    totalCheckIns: u.totalCheckIns,
    level: u.level,
    experience: u.experience,
    title: u.title,
  };
}

export function checkInView(r: CheckInRecord) {
  return {
    checkInDate: r.checkInDate,
    coinsEarned: r.coinsEarned,
    bonusCoins: r.bonusCoins,
    consecutiveDays: r.consecutiveDays,
  };
}

export function achievementView(a: Achievement) {
  return {
    id: a.id,
    name: a.name,
    description: a.description,
    category: a.category,
    rewardCoins: a.rewardCoins,
    rewardTitle: a.rewardTitle,
    icon: a.icon,
  };
}
