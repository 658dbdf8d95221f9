import { DataTypes, Model, type Sequelize, type Optional } from 'sequelize';

export const ROOM_STATUSES = ['waiting', 'playing', 'finished', 'cancelled'] as const;
export type RoomStatus = (typeof ROOM_STATUSES)[number];

// players, game_data and settings are JSON text; GameService owns (de)serialization
export interface GameRoomAttributes {
  id: string;
  gameType: string;
  channelId: string;
  creatorId: string;
  creatorName: string;
  betAmount: number;
  status: RoomStatus;
  maxPlayers: number;
  minPlayers: number;
  players: string;
  gameData: string | null;
  settings: string | null;
  createdAt?: Date;
  startedAt: Date | null;
  finishedAt: Date | null;
  version?: number;
}

export type GameRoomCreationAttributes = Optional<
  GameRoomAttributes,
  'status' | 'maxPlayers' | 'minPlayers' | 'players' | 'gameData' | 'settings' | 'createdAt' | 'startedAt' | 'finishedAt' | 'version'
>;

export class GameRoom extends Model<GameRoomAttributes, GameRoomCreationAttributes> implements GameRoomAttributes {
  declare id: string;
  declare gameType: string;
  declare channelId: string;
  declare creatorId: string;
  declare creatorName: string;
  declare betAmount: number;
  declare status: RoomStatus;
  declare maxPlayers: number;
  declare minPlayers: number;
  declare players: string;
  declare gameData: string | null;
  declare settings: string | null;
  declare readonly createdAt: Date;
  declare startedAt: Date | null;
  declare finishedAt: Date | null;
  declare version: number;
}

export function initGameRoomModel(sequelize: Sequelize) {
  GameRoom.init(
    {
      id: { type: DataTypes.TEXT, primaryKey: true },
      gameType: { field: 'game_type', type: DataTypes.TEXT, allowNull: false },
      channelId: { field: 'channel_id', type: DataTypes.TEXT, allowNull: false },
      creatorId: { field: 'creator_id', type: DataTypes.TEXT, allowNull: false },
      creatorName: { field: 'creator_name', type: DataTypes.TEXT, allowNull: false },
      betAmount: { field: 'bet_amount', type: DataTypes.INTEGER, allowNull: false },
      status: { type: DataTypes.TEXT, allowNull: false, defaultValue: 'waiting' },
      maxPlayers: { field: 'max_players', type: DataTypes.INTEGER, allowNull: false, defaultValue: 6 },
      minPlayers: { field: 'min_players', type: DataTypes.INTEGER, allowNull: false, defaultValue: 2 },
      players: { type: DataTypes.TEXT, allowNull: false, defaultValue: '[]' },
      gameData: { field: 'game_data', type: DataTypes.TEXT, allowNull: true, defaultValue: '{}' },
      settings: { type: DataTypes.TEXT, allowNull: true, defaultValue: '{}' },
      startedAt: { field: 'started_at', type: DataTypes.DATE, allowNull: true },
      finishedAt: { field: 'finished_at', type: DataTypes.DATE, allowNull: true },
    },
    {
      sequelize,
      tableName: 'game_rooms',
      underscored: true,
      updatedAt: false,
      // UPDATE ... WHERE version = ?; a stale row raises OptimisticLockError
      version: true,
      indexes: [{ fields: ['channel_id', 'status'] }, { fields: ['creator_id'] }, { fields: ['game_type', 'status'] }],
    }
  );
}
