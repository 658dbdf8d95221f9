import { DataTypes, Model, type Sequelize, type Optional } from 'sequelize';

export interface AchievementAttributes {
  id: string;
  name: string;
  description: string;
  category: string;
  conditionType: string;
  conditionValue: number;
  rewardCoins: number;
  rewardTitle: string | null;
  icon: string | null;
  isHidden: boolean;
  createdAt?: Date;
}

export type AchievementCreationAttributes = Optional<AchievementAttributes, 'rewardCoins' | 'rewardTitle' | 'icon' | 'isHidden' | 'createdAt'>;

export class Achievement extends Model<AchievementAttributes, AchievementCreationAttributes> implements AchievementAttributes {
  declare id: string;
  declare name: string;
  declare description: string;
  declare category: string;
  declare conditionType: string;
  declare conditionValue: number;
  declare rewardCoins: number;
  declare rewardTitle: string | null;
  declare icon: string | null;
  declare isHidden: boolean;
  declare readonly createdAt: Date;
}

export function initAchievementModel(sequelize: Sequelize) {
  Achievement.init(
    {
      id: { type: DataTypes.TEXT, primaryKey: true },
      name: { type: DataTypes.TEXT, allowNull: false },
      description: { type: DataTypes.TEXT, allowNull: false },
      category: { type: DataTypes.TEXT, allowNull: false },
      conditionType: { field: 'condition_type', type: DataTypes.TEXT, allowNull: false },
      conditionValue: { field: 'condition_value', type: DataTypes.INTEGER, allowNull: false },
      rewardCoins: { field: 'reward_coins', type: DataTypes.INTEGER, allowNull: false, defaultValue: 0 },
      rewardTitle: { field: 'reward_title', type: DataTypes.TEXT, allowNull: true },
      icon: { type: DataTypes.TEXT, allowNull: true },
      isHidden: { field: 'is_hidden', type: DataTypes.BOOLEAN, allowNull: false, defaultValue: false },
    },
    { sequelize, tableName: 'achievements', underscored: true, updatedAt: false }
  );
}
