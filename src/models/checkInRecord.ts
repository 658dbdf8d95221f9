import { DataTypes, Model, type Sequelize, type Optional } from 'sequelize';

export interface CheckInRecordAttributes {
  id: number;
  userId: string;
  checkInDate: string; // YYYY-MM-DD
  coinsEarned: number;
  consecutiveDays: number;
  bonusCoins: number;
  createdAt?: Date;
}

export type CheckInRecordCreationAttributes = Optional<CheckInRecordAttributes, 'id' | 'bonusCoins' | 'createdAt'>;

export class CheckInRecord extends Model<CheckInRecordAttributes, CheckInRecordCreationAttributes> implements CheckInRecordAttributes {
  declare id: number;
  declare userId: string;
  declare checkInDate: string;
  declare coinsEarned: number;
  declare consecutiveDays: number;
  declare bonusCoins: number;
  declare readonly createdAt: Date;
}

export function initCheckInRecordModel(sequelize: Sequelize) {
  CheckInRecord.init(
    {
      id: { type: DataTypes.INTEGER, autoIncrement: true, primaryKey: true },
      userId: { field: 'user_id', type: DataTypes.TEXT, allowNull: false },
      checkInDate: { field: 'check_in_date', type: DataTypes.DATEONLY, allowNull: false },
      coinsEarned: { field: 'coins_earned', type: DataTypes.INTEGER, allowNull: false },
      consecutiveDays: { field: 'consecutive_days', type: DataTypes.INTEGER, allowNull: false },
      bonusCoins: { field: 'bonus_coins', type: DataTypes.INTEGER, allowNull: false, defaultValue: 0 },
    },
    {
      sequelize,
      tableName: 'check_in_records',
      underscored: true,
      updatedAt: false,
      indexes: [{ unique: true, fields: ['user_id', 'check_in_date'] }],
    }
  );
}
