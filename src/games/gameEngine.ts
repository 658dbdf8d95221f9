import type { JsonObject } from '../utils/json.js';
import type { GameRoomState, RoomPlayer } from './types.js';

export interface EngineStep {
  players: RoomPlayer[];
  gameData: JsonObject;
  message: string;
  finished: boolean;
}

export type EngineResult = ({ ok: true } & EngineStep) | { ok: false; message: string };

export interface GameOutcome {
  /** user ids that split the pot; empty means everyone is refunded */
  winners: string[];
  summary: JsonObject;
}

/**
 * Rules for one game type. Engines hold no state of their own: every call gets the room
 * snapshot and returns the next `players` / `game_data` values for GameService to persist.
 */
export interface GameEngine {
  readonly gameType: string;
  readonly displayName: string;
  readonly minPlayers: number;
  readonly maxPlayers: number;
  readonly minBet: number;
  readonly maxBet: number;

  rules(): string;
  initializeGameData(room: GameRoomState): JsonObject;
  canStart(room: GameRoomState): boolean;
  start(room: GameRoomState): EngineStep;
  applyAction(room: GameRoomState, userId: string, action: string, params: JsonObject): EngineResult;
  describe(room: GameRoomState): string;
  isFinished(room: GameRoomState): boolean;
  outcome(room: GameRoomState): GameOutcome;
}
