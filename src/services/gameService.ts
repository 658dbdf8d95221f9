import { EventEmitter } from 'events';
import { z } from 'zod';
import { Op, OptimisticLockError, type Sequelize, type Transaction, type WhereOptions } from 'sequelize';
import { GameRoom } from '../models/index.js';
import type { GameRoomAttributes, RoomStatus } from '../models/gameRoom.js';
import type { GameEngine, GameOutcome } from '../games/gameEngine.js';
import type { GameEngineRegistry } from '../games/registry.js';
import { ACTIVE_STATUSES, assertTransition, isSeated } from '../games/roomLifecycle.js';
import { roomPlayerSchema, type GameDescriptor, type GameRoomState } from '../games/types.js';
import { AppError } from '../utils/errors.js';
import { newRoomId } from '../utils/ids.js';
import { jsonObjectSchema, parseJsonColumn, type JsonObject } from '../utils/json.js';
import type { GameRecordService } from './gameRecordService.js';
import type { UserService } from './userService.js';

const playersSchema = z.array(roomPlayerSchema);

export interface CreateRoomInput {
  gameType: string;
  channelId: string;
  creatorId: string;
  creatorName: string;
  betAmount: number;
  settings?: JsonObject;
}

export interface JoinResult {
  room: GameRoomState;
  canStart: boolean;
}

export interface StepResult {
  room: GameRoomState;
  message: string;
}

export interface ActionResult extends StepResult {
  finished: boolean;
  outcome: GameOutcome | null;
}

type RoomListener = (room: GameRoomState) => void;
type FinishedListener = (room: GameRoomState, outcome: GameOutcome) => void;

export function toRoomState(row: GameRoom): GameRoomState {
  return {
    id: row.id,
    gameType: row.gameType,
    channelId: row.channelId,
    creatorId: row.creatorId,
    creatorName: row.creatorName,
    betAmount: row.betAmount,
    status: row.status,
    maxPlayers: row.maxPlayers,
    minPlayers: row.minPlayers,
    players: parseJsonColumn(row.players, playersSchema, []),
    gameData: parseJsonColumn<JsonObject>(row.gameData, jsonObjectSchema, {}),
    settings: parseJsonColumn<JsonObject>(row.settings, jsonObjectSchema, {}),
    createdAt: row.createdAt ?? null,
    startedAt: row.startedAt ?? null,
    finishedAt: row.finishedAt ?? null,
    version: row.version ?? 0,
  };
}

/**
 * Room lifecycle against the engine registered for each room's game type.
 * Each operation runs in one transaction; listeners hear about it after commit.
 */
export class GameService {
  private emitter = new EventEmitter();

  constructor(
    private readonly sequelize: Sequelize,
    private readonly registry: GameEngineRegistry,
    private readonly users: UserService,
    private readonly records: GameRecordService
  ) {}

  on(event: 'update', listener: RoomListener): void;
  on(event: 'finished', listener: FinishedListener): void;
  on(event: 'update' | 'finished', listener: RoomListener | FinishedListener) {
    this.emitter.on(event, listener);
  }

  removeListener(event: 'update', listener: RoomListener): void;
  removeListener(event: 'finished', listener: FinishedListener): void;
  removeListener(event: 'update' | 'finished', listener: RoomListener | FinishedListener) {
    this.emitter.removeListener(event, listener);
  }

  private emitUpdate(room: GameRoomState) {
    this.emitter.emit('update', room);
  }

  private async run<T>(work: (t: Transaction) => Promise<T>): Promise<T> {
    try {
      return await this.sequelize.transaction(work);
    } catch (e) {
      if (e instanceof OptimisticLockError) throw new AppError('conflict', 'The room was changed by another request; try again');
      throw e;
    }
  }

  private async requireRow(roomId: string, transaction?: Transaction): Promise<GameRoom> {
    const row = await GameRoom.findByPk(roomId, { transaction });
    if (!row) throw new AppError('room_not_found', `Room ${roomId} not found`);
    return row;
  }

  listGames(): GameDescriptor[] {
    return this.registry.list();
  }

  rules(gameType: string): string {
    return this.registry.require(gameType).rules();
  }

  async createRoom(input: CreateRoomInput): Promise<GameRoomState> {
    const engine = this.registry.require(input.gameType);
    const { betAmount } = input;
    if (!Number.isInteger(betAmount) || betAmount < engine.minBet || betAmount > engine.maxBet) {
      throw new AppError('invalid_bet', `Bet must be a whole number between ${engine.minBet} and ${engine.maxBet} coins`);
    }

    const room = await this.run(async transaction => {
      await this.users.getOrCreateUser(input.creatorId, input.creatorName, { transaction });
      const active = await this.findActiveRoomsFor(input.creatorId, transaction);
      if (active.length) {
        throw new AppError('active_room_exists', `You already have an active room (#${active[0]?.id}); finish or cancel it first`);
      }
      await this.users.spendCoins(input.creatorId, betAmount, { transaction });

      const now = new Date();
      const draft: GameRoomState = {
        id: newRoomId(),
        gameType: engine.gameType,
        channelId: input.channelId,
        creatorId: input.creatorId,
        creatorName: input.creatorName,
        betAmount,
        status: 'waiting',
        maxPlayers: engine.maxPlayers,
        minPlayers: engine.minPlayers,
        players: [{ user_id: input.creatorId, username: input.creatorName, joined_at: now.toISOString() }],
        gameData: {},
        settings: input.settings ?? {},
        createdAt: now,
        startedAt: null,
        finishedAt: null,
        version: 0,
      };
      const row = await GameRoom.create(
        {
          id: draft.id,
          gameType: draft.gameType,
          channelId: draft.channelId,
          creatorId: draft.creatorId,
          creatorName: draft.creatorName,
          betAmount,
          status: 'waiting',
          maxPlayers: draft.maxPlayers,
          minPlayers: draft.minPlayers,
          players: JSON.stringify(draft.players),
          gameData: JSON.stringify(engine.initializeGameData(draft)),
          settings: JSON.stringify(draft.settings),
          startedAt: null,
          finishedAt: null,
        },
        { transaction }
      );
      return toRoomState(row);
    });
    this.emitUpdate(room);
    return room;
  }

  async joinRoom(roomId: string, userId: string, username: string): Promise<JoinResult> {
    const room = await this.run(async transaction => {
      const row = await this.requireRow(roomId, transaction);
      this.registry.require(row.gameType);
      const state = toRoomState(row);
      if (state.status !== 'waiting') throw new AppError('room_not_joinable', `Room #${roomId} is ${state.status} and cannot be joined`);
      if (isSeated(state.players, userId)) throw new AppError('already_joined', `You are already in room #${roomId}`);
      if (state.players.length >= state.maxPlayers) throw new AppError('room_full', `Room #${roomId} is full (${state.maxPlayers} players)`);

      await this.users.getOrCreateUser(userId, username, { transaction });
      await this.users.spendCoins(userId, state.betAmount, { transaction });

      const players = [...state.players, { user_id: userId, username, joined_at: new Date().toISOString() }];
      row.players = JSON.stringify(players);
      await row.save({ transaction });
      return toRoomState(row);
    });
    this.emitUpdate(room);
    return { room, canStart: room.players.length >= room.minPlayers };
  }

  async startRoom(roomId: string, userId: string): Promise<StepResult> {
    const result = await this.run(async transaction => {
      const row = await this.requireRow(roomId, transaction);
      const engine = this.registry.require(row.gameType);
      const state = toRoomState(row);
      if (state.creatorId !== userId) throw new AppError('not_room_creator', 'Only the room creator can start the game');
      assertTransition(state.status, 'playing');
      if (state.players.length < state.minPlayers || !engine.canStart(state)) {
        throw new AppError('not_enough_players', `At least ${state.minPlayers} players are needed to start`);
      }

      const step = engine.start(state);
      row.status = 'playing';
      row.startedAt = new Date();
      row.players = JSON.stringify(step.players);
      row.gameData = JSON.stringify(step.gameData);
      await row.save({ transaction });
      return { room: toRoomState(row), message: step.message };
    });
    this.emitUpdate(result.room);
    return result;
  }

  async recordAction(roomId: string, userId: string, action: string, params: JsonObject = {}): Promise<ActionResult> {
    const result = await this.run(async transaction => {
      const row = await this.requireRow(roomId, transaction);
      const engine = this.registry.require(row.gameType);
      const state = toRoomState(row);
      if (state.status !== 'playing') throw new AppError('room_not_playing', `Room #${roomId} is ${state.status}`);

      const step = engine.applyAction(state, userId, action, params);
      if (!step.ok) throw new AppError('action_rejected', step.message);

      row.players = JSON.stringify(step.players);
      row.gameData = JSON.stringify(step.gameData);
      const next = { ...state, players: step.players, gameData: step.gameData };
      if (step.finished || engine.isFinished(next)) {
        const outcome = engine.outcome(next);
        const room = await this.settle(row, next, engine, outcome, transaction);
        return { room, message: step.message, finished: true, outcome };
      }
      await row.save({ transaction });
      return { room: toRoomState(row), message: step.message, finished: false, outcome: null };
    });
    this.emitUpdate(result.room);
    if (result.outcome) this.emitter.emit('finished', result.room, result.outcome);
    return result;
  }

  /** Ends a playing room and pays out; without an outcome the engine decides the winners. */
  async finishRoom(roomId: string, outcome?: GameOutcome): Promise<{ room: GameRoomState; outcome: GameOutcome }> {
    const result = await this.run(async transaction => {
      const row = await this.requireRow(roomId, transaction);
      const engine = this.registry.require(row.gameType);
      const state = toRoomState(row);
      assertTransition(state.status, 'finished');
      const final = outcome ?? engine.outcome(state);
      const room = await this.settle(row, state, engine, final, transaction);
      return { room, outcome: final };
    });
    this.emitUpdate(result.room);
    this.emitter.emit('finished', result.room, result.outcome);
    return result;
  }

  // Pot split evenly (floor) among winners; no winners refunds every stake as a draw
  private async settle(row: GameRoom, state: GameRoomState, engine: GameEngine, outcome: GameOutcome, transaction: Transaction) {
    const winners = [...new Set(outcome.winners)];
    const stranger = winners.find(id => !isSeated(state.players, id));
    if (stranger !== undefined) throw new AppError('bad_request', `Winner ${stranger} is not seated in room #${state.id}`);

    const pot = state.betAmount * state.players.length;
    const prize = winners.length ? Math.floor(pot / winners.length) : 0;

    for (const player of state.players) {
      await this.users.getOrCreateUser(player.user_id, player.username, { transaction });
      const won = winners.includes(player.user_id);
      if (!winners.length) {
        if (state.betAmount > 0) await this.users.refundCoins(player.user_id, state.betAmount, { transaction });
      } else if (won && prize > 0) {
        await this.users.addCoins(player.user_id, prize, { transaction });
      }
      await this.records.create(
        {
          userId: player.user_id,
          gameType: engine.gameType,
          coinsBet: state.betAmount,
          coinsWon: !winners.length ? state.betAmount : won ? prize : 0,
          result: !winners.length ? 'draw' : won ? 'win' : 'lose',
          details: {
            room_id: state.id,
            total_players: state.players.length,
            game_result: { winners, ...outcome.summary },
          },
        },
        { transaction }
      );
    }

    row.status = 'finished';
    row.finishedAt = new Date();
    await row.save({ transaction });
    return toRoomState(row);
  }

  async cancelRoom(roomId: string, userId: string): Promise<GameRoomState> {
    const room = await this.run(async transaction => {
      const row = await this.requireRow(roomId, transaction);
      const state = toRoomState(row);
      if (state.creatorId !== userId) throw new AppError('not_room_creator', 'Only the room creator can cancel the game');
      assertTransition(state.status, 'cancelled');

      for (const player of state.players) {
        await this.users.getOrCreateUser(player.user_id, player.username, { transaction });
        if (state.betAmount > 0) await this.users.refundCoins(player.user_id, state.betAmount, { transaction });
      }
      row.status = 'cancelled';
      row.finishedAt = new Date();
      await row.save({ transaction });
      return toRoomState(row);
    });
    this.emitUpdate(room);
    return room;
  }

  async getRoom(roomId: string): Promise<GameRoomState | null> {
    const row = await GameRoom.findByPk(roomId);
    return row ? toRoomState(row) : null;
  }

  async requireRoom(roomId: string): Promise<GameRoomState> {
    return toRoomState(await this.requireRow(roomId));
  }

  /** Rooms of a channel, newest first; without a status only waiting and playing rooms. */
  async listChannelRooms(channelId: string, filter: { gameType?: string; status?: RoomStatus } = {}): Promise<GameRoomState[]> {
    const where: WhereOptions<GameRoomAttributes> = {
      channelId,
      status: filter.status ?? { [Op.in]: [...ACTIVE_STATUSES] },
      ...(filter.gameType ? { gameType: filter.gameType } : {}),
    };
    const rows = await GameRoom.findAll({ where, order: [['createdAt', 'DESC'], ['id', 'ASC']] });
    return rows.map(toRoomState);
  }

  async listUserRooms(userId: string, status?: RoomStatus | readonly RoomStatus[], transaction?: Transaction): Promise<GameRoomState[]> {
    // LIKE narrows the scan; the parsed player list decides
    const where: WhereOptions<GameRoomAttributes> = {
      [Op.or]: [{ creatorId: userId }, { players: { [Op.like]: `%${userId}%` } }],
      ...(status ? { status: typeof status === 'string' ? status : { [Op.in]: [...status] } } : {}),
    };
    const rows = await GameRoom.findAll({ where, order: [['createdAt', 'DESC'], ['id', 'ASC']], transaction });
    return rows.map(toRoomState).filter(r => r.creatorId === userId || isSeated(r.players, userId));
  }

  findActiveRoomsFor(userId: string, transaction?: Transaction): Promise<GameRoomState[]> {
    return this.listUserRooms(userId, ACTIVE_STATUSES, transaction);
  }

  describeRoom(room: GameRoomState): string {
    const engine = this.registry.get(room.gameType);
    if (!engine) return `Room #${room.id} (${room.gameType}) is ${room.status}`;
    if (room.status === 'waiting') {
      return [
        `${engine.displayName} #${room.id}`,
        `Creator: ${room.creatorName}`,
        `Bet: ${room.betAmount} coins`,
        `Players: ${room.players.length}/${room.maxPlayers} (${room.players.map(p => p.username).join(', ')})`,
      ].join('\n');
    }
    return engine.describe(room);
  }
}
