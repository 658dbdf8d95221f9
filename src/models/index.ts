import type { Sequelize } from 'sequelize';
import { initUserModel, User } from './user.js';
import { initAchievementModel, Achievement } from './achievement.js';
import { initUserAchievementModel, UserAchievement } from './userAchievement.js';
import { initCheckInRecordModel, CheckInRecord } from './checkInRecord.js';
import { initGameRecordModel, GameRecord } from './gameRecord.js';
import { initGameRoomModel, GameRoom } from './gameRoom.js';

export function registerModels(sequelize: Sequelize) {
  initUserModel(sequelize);
  initAchievementModel(sequelize);
  initUserAchievementModel(sequelize);
  initCheckInRecordModel(sequelize);
  initGameRecordModel(sequelize);
  initGameRoomModel(sequelize);

  // Associations
  if (!UserAchievement.associations.achievement) {
    UserAchievement.belongsTo(Achievement, { foreignKey: 'achievementId', as: 'achievement', constraints: false });
  }
  // game_rooms has no foreign key to users: migrated rows may seat players who never registered
}

export { User, Achievement, UserAchievement, CheckInRecord, GameRecord, GameRoom };
