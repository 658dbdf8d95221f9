import { DataTypes, Model, type Sequelize, type Optional } from 'sequelize';

export type GameResult = 'win' | 'lose' | 'draw';

export interface GameRecordAttributes {
  id: number;
  userId: string;
  gameType: string;
  coinsBet: number;
  coinsWon: number;
  result: GameResult;
  details: string | null; // JSON
  createdAt?: Date;
}

export type GameRecordCreationAttributes = Optional<GameRecordAttributes, 'id' | 'coinsBet' | 'coinsWon' | 'details' | 'createdAt'>;

export class GameRecord extends Model<GameRecordAttributes, GameRecordCreationAttributes> implements GameRecordAttributes {
  declare id: number;
  declare userId: string;
  declare gameType: string;
  declare coinsBet: number;
  declare coinsWon: number;
  declare result: GameResult;
  declare details: string | null;
  declare readonly createdAt: Date;
}

export function initGameRecordModel(sequelize: Sequelize) {
  GameRecord.init(
    {
      id: { type: DataTypes.INTEGER, autoIncrement: true, primaryKey: true },
      userId: { field: 'user_id', type: DataTypes.TEXT, allowNull: false },
      gameType: { field: 'game_type', type: DataTypes.TEXT, allowNull: false },
      coinsBet: { field: 'coins_bet', type: DataTypes.INTEGER, allowNull: false, defaultValue: 0 },
      coinsWon: { field: 'coins_won', type: DataTypes.INTEGER, allowNull: false, defaultValue: 0 },
      result: { type: DataTypes.TEXT, allowNull: false },
      details: { type: DataTypes.TEXT, allowNull: true },
    },
    {
      sequelize,
      tableName: 'game_records',
      underscored: true,
      updatedAt: false,
      indexes: [{ fields: ['user_id', 'game_type'] }, { fields: ['created_at'] }],
    }
  );
}
