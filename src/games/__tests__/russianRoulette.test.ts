import { describe, expect, it } from 'vitest';
import { RussianRouletteEngine } from '../russianRoulette.js';
import type { GameRoomState } from '../types.js';
import { lastIndex, scriptedRandom } from '../../__tests__/helpers.js';

function room(overrides: Partial<GameRoomState> = {}): GameRoomState {
  return {
    id: 'r1',
    gameType: 'russian_roulette',
    channelId: 'group-1',
    creatorId: 'a',
    creatorName: 'Alice',
    betAmount: 100,
    status: 'waiting',
    maxPlayers: 6,
    minPlayers: 2,
    players: [
      { user_id: 'a', username: 'Alice', joined_at: '' },
      { user_id: 'b', username: 'Bob', joined_at: '' },
    ],
    gameData: {},
    settings: {},
    createdAt: null,
    startedAt: null,
    finishedAt: null,
    version: 0,
    ...overrides,
  };
}

function started(engine: RussianRouletteEngine, base: GameRoomState = room()): GameRoomState {
  const waiting = { ...base, gameData: engine.initializeGameData(base) };
  const step = engine.start(waiting);
  return { ...waiting, status: 'playing', players: step.players, gameData: step.gameData };
}

describe('RussianRouletteEngine', () => {
  it('reads the cylinder size from settings', () => {
    const engine = new RussianRouletteEngine(lastIndex);
    expect(engine.initializeGameData(room({ settings: { chamber_count: 8 } }))).toEqual({
      bullet_position: 0,
      current_position: 1,
      current_player_index: 0,
      chamber_count: 8,
      bullets_count: 1,
    });
    expect(engine.initializeGameData(room({ settings: { chamber_count: 20 } })).chamber_count).toBe(6);
  });

  it('needs two players to start', () => {
    const engine = new RussianRouletteEngine(lastIndex);
    expect(engine.canStart(room({ players: [{ user_id: 'a', username: 'Alice', joined_at: '' }] }))).toBe(false);
    expect(engine.canStart(room())).toBe(true);
  });

  it('loads the bullet and shuffles the seats on start', () => {
    const engine = new RussianRouletteEngine(scriptedRandom([2, 0]));
    const base = room();
    const step = engine.start({ ...base, gameData: engine.initializeGameData(base) });
    expect(step.gameData).toEqual({ bullet_position: 3, current_position: 1, current_player_index: 0, chamber_count: 6, bullets_count: 1 });
    expect(step.players.map(p => [p.user_id, p.is_alive, p.shots_fired])).toEqual([
      ['b', true, 0],
      ['a', true, 0],
    ]);
    expect(step.message.split('\n').at(-1)).toBe('Bob shoots first.');
    expect(step.finished).toBe(false);
  });

  it('plays a game until someone is hit', () => {
    const engine = new RussianRouletteEngine(lastIndex);
    let state = started(engine);
    expect(state.gameData.bullet_position).toBe(6);

    const first = engine.applyAction(state, 'a', 'shoot', { shots: 3 });
    if (!first.ok) throw new Error(first.message);
    expect(first.message).toBe(
      'Shot 1: click. Alice is safe.\nShot 2: click. Alice is safe.\nShot 3: click. Alice is safe.\n\nBob is up next.'
    );
    expect(first.finished).toBe(false);
    expect(first.gameData).toMatchObject({ current_position: 4, current_player_index: 1 });
    state = { ...state, players: first.players, gameData: first.gameData };

    const second = engine.applyAction(state, 'b', 'shoot', { shots: 3 });
    if (!second.ok) throw new Error(second.message);
    expect(second.message).toBe('Shot 1: click. Bob is safe.\nShot 2: click. Bob is safe.\nShot 3: BANG! Bob is out.');
    expect(second.finished).toBe(true);
    state = { ...state, players: second.players, gameData: second.gameData };

    expect(engine.isFinished(state)).toBe(true);
    expect(engine.outcome(state)).toEqual({
      winners: ['a'],
      summary: { total_players: 2, bullet_position: 6, final_position: 6, winner_names: ['Alice'] },
    });
    expect(state.players.map(p => p.shots_fired)).toEqual([3, 3]);
  });

  it('wraps the cylinder back to the first chamber', () => {
    const engine = new RussianRouletteEngine(lastIndex);
    const state = room({
      status: 'playing',
      gameData: { bullet_position: 1, current_position: 2, current_player_index: 0, chamber_count: 2, bullets_count: 1 },
    });
    const result = engine.applyAction(state, 'a', 'shoot', { shots: 2 });
    if (!result.ok) throw new Error(result.message);
    expect(result.message).toBe('Shot 1: click. Alice is safe.\nShot 2: BANG! Alice is out.');
    expect(engine.outcome({ ...state, players: result.players, gameData: result.gameData }).winners).toEqual(['b']);
  });

  it('rejects out-of-turn shots, unknown actions and bad shot counts', () => {
    const engine = new RussianRouletteEngine(lastIndex);
    const state = started(engine);
    expect(engine.applyAction(state, 'b', 'shoot', {})).toEqual({ ok: false, message: "It is Alice's turn" });
    expect(engine.applyAction(state, 'a', 'spin', {})).toEqual({ ok: false, message: 'Unknown action "spin"; the only action is "shoot"' });
    expect(engine.applyAction(state, 'a', 'shoot', { shots: 4 })).toEqual({ ok: false, message: 'You can fire 1-3 shots per turn' });
  });

  it('fires one shot by default and accepts numeric strings', () => {
    const engine = new RussianRouletteEngine(lastIndex);
    const state = started(engine);
    const one = engine.applyAction(state, 'a', 'shoot', {});
    expect(one.ok && one.gameData.current_position).toBe(2);
    const two = engine.applyAction(state, 'a', 'shoot', { shots: '2' });
    expect(two.ok && two.gameData.current_position).toBe(3);
  });

  it('describes a room migrated without cylinder size or player flags', () => {
    const engine = new RussianRouletteEngine(lastIndex);
    const state = room({ status: 'playing', gameData: { bullet_position: 3, current_position: 2, current_player_index: 1 } });
    expect(engine.describe(state)).toBe(
      [
        'Russian Roulette #r1 in progress',
        'Pot: 200 coins',
        'Cylinder: 2/6',
        '',
        'Alive (2):',
        '  Alice (0 shots)',
        '> Bob (0 shots)',
        '',
        'Waiting for Bob to shoot',
      ].join('\n')
    );
    expect(engine.isFinished(room())).toBe(false);
  });
});
