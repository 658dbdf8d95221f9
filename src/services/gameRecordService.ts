import { QueryTypes, type Sequelize, type WhereOptions } from 'sequelize';
import { GameRecord } from '../models/index.js';
import type { GameRecordAttributes, GameResult } from '../models/gameRecord.js';
import { jsonObjectSchema, parseJsonColumn, type JsonObject } from '../utils/json.js';
import type { TxOptions } from '../utils/transaction.js';

export interface NewGameRecord {
  userId: string;
  gameType: string;
  coinsBet: number;
  coinsWon: number;
  result: GameResult;
  details?: JsonObject | null;
}

export interface GameRecordView {
  id: number;
  userId: string;
  gameType: string;
  coinsBet: number;
  coinsWon: number;
  result: GameResult;
  details: JsonObject | null;
  createdAt: Date | null;
}

export interface GameStats {
  totalGames: number;
  wins: number;
  totalBet: number;
  totalWon: number;
  netProfit: number;
  avgProfit: number;
  maxWin: number;
  worstLoss: number;
  winRate: number;
}

interface StatsRow {
  totalGames: number | null;
  wins: number | null;
  totalBet: number | null;
  totalWon: number | null;
  netProfit: number | null;
  avgProfit: number | null;
  maxWin: number | null;
  worstLoss: number | null;
}

function toView(r: GameRecord): GameRecordView {
  return {
    id: r.id,
    userId: r.userId,
    gameType: r.gameType,
    coinsBet: r.coinsBet,
    coinsWon: r.coinsWon,
    result: r.result,
    details: parseJsonColumn(r.details, jsonObjectSchema, null),
    createdAt: r.createdAt ?? null,
  };
}

export class GameRecordService {
  constructor(private readonly sequelize: Sequelize) {}

  async create(record: NewGameRecord, opts: TxOptions = {}): Promise<GameRecordView> {
    const row = await GameRecord.create(
      {
        userId: record.userId,
        gameType: record.gameType,
        coinsBet: record.coinsBet,
        coinsWon: record.coinsWon,
        result: record.result,
        details: record.details ? JSON.stringify(record.details) : null,
      },
      { transaction: opts.transaction }
    );
    return toView(row);
  }

  async listForUser(userId: string, options: { gameType?: string; limit?: number } = {}): Promise<GameRecordView[]> {
    const where: WhereOptions<GameRecordAttributes> = options.gameType ? { userId, gameType: options.gameType } : { userId };
    const rows = await GameRecord.findAll({ where, order: [['createdAt', 'DESC'], ['id', 'DESC']], limit: options.limit ?? 50 });
    return rows.map(toView);
  }

  async statsForUser(userId: string, gameType: string): Promise<GameStats> {
    const row = await this.sequelize.query<StatsRow>(
      `SELECT
         COUNT(*) AS totalGames,
         SUM(CASE WHEN result = 'win' THEN 1 ELSE 0 END) AS wins,
         SUM(coins_bet) AS totalBet,
         SUM(coins_won) AS totalWon,
         SUM(coins_won - coins_bet) AS netProfit,
         AVG(coins_won - coins_bet) AS avgProfit,
         MAX(coins_won) AS maxWin,
         MIN(coins_won - coins_bet) AS worstLoss
       FROM game_records
       WHERE user_id = :userId AND game_type = :gameType`,
      { replacements: { userId, gameType }, type: QueryTypes.SELECT, plain: true }
    );
    const totalGames = Number(row?.totalGames ?? 0);
    const wins = Number(row?.wins ?? 0);
    return {
      totalGames,
      wins,
      totalBet: Number(row?.totalBet ?? 0),
      totalWon: Number(row?.totalWon ?? 0),
      netProfit: Number(row?.netProfit ?? 0),
      avgProfit: Number(row?.avgProfit ?? 0),
      maxWin: Number(row?.maxWin ?? 0),
      worstLoss: Number(row?.worstLoss ?? 0),
      winRate: totalGames > 0 ? wins / totalGames : 0,
    };
  }
}
