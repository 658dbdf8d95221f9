import crypto from 'crypto';
import { z } from 'zod';
import { jsonValueSchema, type JsonObject } from '../utils/json.js';
import type { EngineResult, EngineStep, GameEngine, GameOutcome } from './gameEngine.js';
import type { GameRoomState, RoomPlayer } from './types.js';

export type RandomInt = (maxExclusive: number) => number;

const DEFAULT_CHAMBERS = 6;
const MIN_CHAMBERS = 2;
const MAX_CHAMBERS = 12;
const MAX_SHOTS_PER_TURN = 3;

// Rows migrated from the legacy table carry only the first three fields
const rouletteDataSchema = z.object({
  bullet_position: z.number().int(),
  current_position: z.number().int(),
  current_player_index: z.number().int(),
  chamber_count: z.number().int().min(MIN_CHAMBERS).default(DEFAULT_CHAMBERS),
  bullets_count: z.number().int().default(1),
});

type RouletteData = z.infer<typeof rouletteDataSchema>;

const roulettePlayerSchema = z
  .object({
    user_id: z.string(),
    username: z.string(),
    joined_at: z.string().default(''),
    is_alive: z.boolean().default(true),
    shots_fired: z.number().int().default(0),
  })
  .catchall(jsonValueSchema);

type RoulettePlayer = z.infer<typeof roulettePlayerSchema>;

const shotsSchema = z.coerce.number().int().min(1).max(MAX_SHOTS_PER_TURN).default(1);
const chamberSettingSchema = z.number().int().min(MIN_CHAMBERS).max(MAX_CHAMBERS);

export class RussianRouletteEngine implements GameEngine {
  readonly gameType = 'russian_roulette';
  readonly displayName = 'Russian Roulette';
  readonly minPlayers = 2;
  readonly maxPlayers = 6;
  readonly minBet = 100;
  readonly maxBet = 10000;

  constructor(private readonly randomInt: RandomInt = max => crypto.randomInt(max)) {}

  rules(): string {
    return [
      `${this.displayName} rules`,
      '',
      '- The cylinder holds one bullet; players take turns pulling the trigger',
      `- Each turn a player fires 1-${MAX_SHOTS_PER_TURN} shots`,
      '- Whoever is hit is out and the last survivor takes the pot',
      `- Players: ${this.minPlayers}-${this.maxPlayers}`,
      `- Bet: ${this.minBet}-${this.maxBet} coins, taken when you create or join`,
      '- A cancelled room refunds every player',
    ].join('\n');
  }

  initializeGameData(room: GameRoomState): JsonObject {
    const chambers = chamberSettingSchema.safeParse(room.settings.chamber_count);
    const data: RouletteData = {
      bullet_position: 0, // drawn at start
      current_position: 1,
      current_player_index: 0,
      chamber_count: chambers.success ? chambers.data : DEFAULT_CHAMBERS,
      bullets_count: 1,
    };
    return data;
  }

  canStart(room: GameRoomState): boolean {
    return room.players.length >= this.minPlayers;
  }

  start(room: GameRoomState): EngineStep {
    const parsed = rouletteDataSchema.safeParse(room.gameData);
    const base = parsed.success ? parsed.data : rouletteDataSchema.parse(this.initializeGameData(room));
    const data: RouletteData = {
      ...base,
      bullet_position: this.randomInt(base.chamber_count) + 1,
      current_position: 1,
      current_player_index: 0,
    };

    const players = this.shuffle(room.players).map(p => ({ ...p, is_alive: true, shots_fired: 0 }));
    const first = players[0];
    const message = [
      `${this.displayName} #${room.id} has started!`,
      '',
      `Players: ${players.map(p => p.username).join(', ')}`,
      `Pot: ${room.betAmount * players.length} coins`,
      `Cylinder: ${data.chamber_count} chambers, ${data.bullets_count} bullet`,
      '',
      `${first ? first.username : 'Nobody'} shoots first.`,
    ].join('\n');
    return { players, gameData: data, message, finished: false };
  }

  applyAction(room: GameRoomState, userId: string, action: string, params: JsonObject): EngineResult {
    if (action !== 'shoot') return { ok: false, message: `Unknown action "${action}"; the only action is "shoot"` };

    const state = this.readState(room);
    if (!state) return { ok: false, message: 'This game has no valid cylinder state' };
    const { data, players } = state;

    const shooter = players[data.current_player_index];
    if (!shooter) return { ok: false, message: 'This game has no valid cylinder state' };
    if (shooter.user_id !== userId) return { ok: false, message: `It is ${shooter.username}'s turn` };

    const shots = shotsSchema.safeParse(params.shots);
    if (!shots.success) return { ok: false, message: `You can fire 1-${MAX_SHOTS_PER_TURN} shots per turn` };

    const lines: string[] = [];
    let hit = false;
    let fired = 0;
    for (let i = 1; i <= shots.data; i++) {
      fired = i;
      if (data.current_position === data.bullet_position) {
        hit = true;
        shooter.is_alive = false;
        lines.push(`Shot ${i}: BANG! ${shooter.username} is out.`);
        break;
      }
      lines.push(`Shot ${i}: click. ${shooter.username} is safe.`);
      data.current_position = data.current_position >= data.chamber_count ? 1 : data.current_position + 1;
    }
    shooter.shots_fired += fired;

    const alive = players.filter(p => p.is_alive);
    if (hit || alive.length <= 1) {
      return { ok: true, players, gameData: data, message: lines.join('\n'), finished: true };
    }

    data.current_player_index = this.nextAliveIndex(players, data.current_player_index);
    const next = players[data.current_player_index];
    lines.push('', `${next ? next.username : shooter.username} is up next.`);
    return { ok: true, players, gameData: data, message: lines.join('\n'), finished: false };
  }

  describe(room: GameRoomState): string {
    if (room.status !== 'playing') return `${this.displayName} #${room.id} is ${room.status}`;
    const state = this.readState(room);
    if (!state) return `${this.displayName} #${room.id} is playing`;
    const { data, players } = state;
    const current = players[data.current_player_index];
    const alive = players.filter(p => p.is_alive);
    const dead = players.filter(p => !p.is_alive);

    const lines = [
      `${this.displayName} #${room.id} in progress`,
      `Pot: ${room.betAmount * players.length} coins`,
      `Cylinder: ${data.current_position}/${data.chamber_count}`,
      '',
      `Alive (${alive.length}):`,
      ...alive.map(p => `${current && p.user_id === current.user_id ? '> ' : '  '}${p.username} (${p.shots_fired} shots)`),
    ];
    if (dead.length) {
      lines.push('', `Out (${dead.length}):`, ...dead.map(p => `  ${p.username} (${p.shots_fired} shots)`));
    }
    if (current) lines.push('', `Waiting for ${current.username} to shoot`);
    return lines.join('\n');
  }

  isFinished(room: GameRoomState): boolean {
    if (room.status === 'waiting') return false;
    const state = this.readState(room);
    if (!state) return false;
    return state.players.filter(p => p.is_alive).length <= 1;
  }

  outcome(room: GameRoomState): GameOutcome {
    const state = this.readState(room);
    if (!state) return { winners: [], summary: { total_players: room.players.length } };
    const alive = state.players.filter(p => p.is_alive);
    return {
      winners: alive.map(p => p.user_id),
      summary: {
        total_players: state.players.length,
        bullet_position: state.data.bullet_position,
        final_position: state.data.current_position,
        winner_names: alive.map(p => p.username),
      },
    };
  }

  private readState(room: GameRoomState): { data: RouletteData; players: RoulettePlayer[] } | null {
    const data = rouletteDataSchema.safeParse(room.gameData);
    const players = z.array(roulettePlayerSchema).safeParse(room.players);
    if (!data.success || !players.success) return null;
    return { data: { ...data.data }, players: players.data.map(p => ({ ...p })) };
  }

  private nextAliveIndex(players: RoulettePlayer[], from: number): number {
    for (let step = 1; step <= players.length; step++) {
      const idx = (from + step) % players.length;
      if (players[idx]?.is_alive) return idx;
    }
    return from;
  }

  // Fisher-Yates over a copy
  private shuffle(players: RoomPlayer[]): RoomPlayer[] {
    const out = [...players];
    for (let i = out.length - 1; i > 0; i--) {
      const j = this.randomInt(i + 1);
      const a = out[i];
      const b = out[j];
      if (a === undefined || b === undefined) continue;
      out[i] = b;
      out[j] = a;
    }
    return out;
  }
}
