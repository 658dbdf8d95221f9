import { DataTypes, Model, type Sequelize, type Optional } from 'sequelize';

export const DEFAULT_TITLE = '新人';

export interface UserAttributes {
  userId: string;
  username: string;
  coins: number;
  totalEarned: number;
  totalSpent: number;
  checkInCount: number;
  lastCheckIn: Date | null;
  totalCheckIns: number;
  level: number;
  experience: number;
  title: string;
  createdAt?: Date;
  updatedAt?: Date;
}

export type UserCreationAttributes = Optional<
  UserAttributes,
  'coins' | 'totalEarned' | 'totalSpent' | 'checkInCount' | 'lastCheckIn' | 'totalCheckIns' | 'level' | 'experience' | 'title' | 'createdAt' | 'updatedAt'
>;

export class User extends Model<UserAttributes, UserCreationAttributes> implements UserAttributes {
  declare userId: string;
  declare username: string;
  declare coins: number;
  declare totalEarned: number;
  declare totalSpent: number;
  declare checkInCount: number;
  declare lastCheckIn: Date | null;
  declare totalCheckIns: number;
  declare level: number;
  declare experience: number;
  declare title: string;
  declare readonly createdAt: Date;
  declare readonly updatedAt: Date;
}

export function initUserModel(sequelize: Sequelize) {
  User.init(
    {
      userId: { field: 'user_id', type: DataTypes.TEXT, primaryKey: true },
      username: { type: DataTypes.TEXT, allowNull: false },
      coins: { type: DataTypes.INTEGER, allowNull: false, defaultValue: 0 },
      totalEarned: { field: 'total_earned', type: DataTypes.INTEGER, allowNull: false, defaultValue: 0 },
      totalSpent: { field: 'total_spent', type: DataTypes.INTEGER, allowNull: false, defaultValue: 0 },
      checkInCount: { field: 'check_in_count', type: DataTypes.INTEGER, allowNull: false, defaultValue: 0 },
      lastCheckIn: { field: 'last_check_in', type: DataTypes.DATE, allowNull: true },
      totalCheckIns: { field: 'total_check_ins', type: DataTypes.INTEGER, allowNull: false, defaultValue: 0 },
      level: { type: DataTypes.INTEGER, allowNull: false, defaultValue: 1 },
      experience: { type: DataTypes.INTEGER, allowNull: false, defaultValue: 0 },
      title: { type: DataTypes.TEXT, allowNull: false, defaultValue: DEFAULT_TITLE },
    },
    {
      sequelize,
      tableName: 'users',
      underscored: true,
    }
  );
}
