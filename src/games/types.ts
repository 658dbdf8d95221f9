import { z } from 'zod';
import type { RoomStatus } from '../models/gameRoom.js';
import { jsonValueSchema, type JsonObject, type JsonValue } from '../utils/json.js';

/** One seat in a room. Engines may keep their own per-player fields next to the base ones. */
export interface RoomPlayer {
  user_id: string;
  username: string;
  joined_at: string;
  [key: string]: JsonValue;
}

export const roomPlayerSchema = z
  .object({
    user_id: z.string(),
    username: z.string(),
    joined_at: z.string().default(''),
  })
  .catchall(jsonValueSchema);

export interface GameRoomState {
  id: string;
  gameType: string;
  channelId: string;
  creatorId: string;
  creatorName: string;
  betAmount: number;
  status: RoomStatus;
  maxPlayers: number;
  minPlayers: number;
  players: RoomPlayer[];
  gameData: JsonObject;
  settings: JsonObject;
  createdAt: Date | null;
  startedAt: Date | null;
  finishedAt: Date | null;
  version: number;
}

export interface GameDescriptor {
  type: string;
  name: string;
  minPlayers: number;
  maxPlayers: number;
  minBet: number;
  maxBet: number;
}
