import { DataTypes, Model, type Sequelize, type Optional } from 'sequelize';
import type { Achievement } from './achievement.js';

export interface UserAchievementAttributes {
  userId: string;
  achievementId: string;
  achievedAt: Date;
  notified: boolean;
}

export type UserAchievementCreationAttributes = Optional<UserAchievementAttributes, 'achievedAt' | 'notified'>;

export class UserAchievement extends Model<UserAchievementAttributes, UserAchievementCreationAttributes> implements UserAchievementAttributes {
  declare userId: string;
  declare achievementId: string;
  declare achievedAt: Date;
  declare notified: boolean;
  declare achievement?: Achievement;
}

export function initUserAchievementModel(sequelize: Sequelize) {
  UserAchievement.init(
    {
      userId: { field: 'user_id', type: DataTypes.TEXT, primaryKey: true },
      achievementId: { field: 'achievement_id', type: DataTypes.TEXT, primaryKey: true },
      achievedAt: { field: 'achieved_at', type: DataTypes.DATE, allowNull: false, defaultValue: DataTypes.NOW },
      notified: { type: DataTypes.BOOLEAN, allowNull: false, defaultValue: false },
    },
    { sequelize, tableName: 'user_achievements', underscored: true, timestamps: false }
  );
}
