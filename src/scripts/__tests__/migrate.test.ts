import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { QueryTypes, type Sequelize } from 'sequelize';
import { createSequelize } from '../../config/sequelize.js';
import { resolveSourcePath } from '../../utils/paths.js';
import { applySql, migrate, splitSqlStatements } from '../migrate.js';

const MIGRATIONS = ['001_initial_schema.sql', '002_unified_game_rooms.sql', '003_game_rooms_version.sql'];

function readMigration(name: string) {
  return fs.readFileSync(resolveSourcePath('migrations', name), 'utf8');
}

async function count(sequelize: Sequelize, table: string): Promise<number> {
  const row = await sequelize.query<{ n: number }>(`SELECT COUNT(*) AS n FROM ${table}`, { type: QueryTypes.SELECT, plain: true });
  return Number(row?.n ?? 0);
}

async function tableExists(sequelize: Sequelize, name: string) {
  const rows = await sequelize.query<{ name: string }>(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = :name`, {
    replacements: { name },
    type: QueryTypes.SELECT,
  });
  return rows.length > 0;
}

describe('splitSqlStatements', () => {
  it('drops line comments and splits on semicolons', () => {
    const sql = '-- header\nCREATE TABLE a (x INT); -- trailing\nINSERT INTO a VALUES (1);\n';
    expect(splitSqlStatements(sql)).toEqual(['CREATE TABLE a (x INT)', 'INSERT INTO a VALUES (1)']);
  });

  it('returns nothing for a comment-only file', () => {
    expect(splitSqlStatements('-- nothing here\n\n')).toEqual([]);
  });
});

describe('migrate', () => {
  let sequelize: Sequelize;

  afterEach(async () => {
    vi.restoreAllMocks();
    await sequelize.close();
  });

  it('applies every migration once on a fresh database', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    sequelize = createSequelize(':memory:');
    expect(await migrate(sequelize)).toEqual(MIGRATIONS);
    expect(await migrate(sequelize)).toEqual([]);
    expect(await count(sequelize, 'migrations')).toBe(3);
    expect(await tableExists(sequelize, 'game_rooms')).toBe(true);
    expect(await tableExists(sequelize, 'roulette_games')).toBe(false);
  });

  it('moves legacy roulette rows into game_rooms', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    sequelize = createSequelize(':memory:');
    await applySql(sequelize, readMigration('001_initial_schema.sql'));
    await sequelize.query(`CREATE TABLE roulette_games (
      id TEXT PRIMARY KEY, channel_id TEXT NOT NULL, creator_id TEXT NOT NULL, creator_name TEXT NOT NULL,
      bet_amount INTEGER NOT NULL, status TEXT NOT NULL DEFAULT 'waiting', max_players INTEGER NOT NULL DEFAULT 6,
      players TEXT NOT NULL DEFAULT '[]', bullet_position INTEGER NOT NULL DEFAULT 0, current_position INTEGER NOT NULL DEFAULT 1,
      current_player_index INTEGER NOT NULL DEFAULT 0, created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
      started_at TIMESTAMP NULL, finished_at TIMESTAMP NULL)`);
    await sequelize.query(`INSERT INTO roulette_games
      (id, channel_id, creator_id, creator_name, bet_amount, status, max_players, players, bullet_position, current_position, current_player_index)
      VALUES ('a1b2c3d4', 'group-1', 'u1', 'Alice', 100, 'playing', 6, '[{"user_id": "u1", "username": "Alice"}]', 3, 2, 1)`);

    await migrate(sequelize);

    const row = await sequelize.query<{ game_type: string; min_players: number; game_data: string; settings: string; status: string; version: number }>(
      `SELECT game_type, min_players, game_data, settings, status, version FROM game_rooms WHERE id = 'a1b2c3d4'`,
      { type: QueryTypes.SELECT, plain: true }
    );
    expect(row).toEqual({
      game_type: 'russian_roulette',
      min_players: 2,
      game_data: '{"bullet_position":3,"current_position":2,"current_player_index":1}',
      settings: '{}',
      status: 'playing',
      version: 0,
    });
    expect(await tableExists(sequelize, 'roulette_games')).toBe(false);
  });

  it('cannot duplicate rooms when the copy runs again', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    sequelize = createSequelize(':memory:');
    await migrate(sequelize);
    await sequelize.query(`INSERT INTO game_rooms (id, game_type, channel_id, creator_id, creator_name, bet_amount) VALUES ('r1', 'russian_roulette', 'g', 'u1', 'Alice', 100)`);
    await sequelize.query(`CREATE TABLE roulette_games (
      id TEXT PRIMARY KEY, channel_id TEXT NOT NULL, creator_id TEXT NOT NULL, creator_name TEXT NOT NULL,
      bet_amount INTEGER NOT NULL, status TEXT NOT NULL DEFAULT 'waiting', max_players INTEGER NOT NULL DEFAULT 6,
      players TEXT NOT NULL DEFAULT '[]', bullet_position INTEGER NOT NULL DEFAULT 0, current_position INTEGER NOT NULL DEFAULT 1,
      current_player_index INTEGER NOT NULL DEFAULT 0, created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
      started_at TIMESTAMP NULL, finished_at TIMESTAMP NULL)`);
    await sequelize.query(`INSERT INTO roulette_games (id, channel_id, creator_id, creator_name, bet_amount) VALUES ('r1', 'g', 'u1', 'Alice', 500)`);

    await applySql(sequelize, readMigration('002_unified_game_rooms.sql'));

    expect(await count(sequelize, 'game_rooms')).toBe(1);
    const row = await sequelize.query<{ bet_amount: number }>(`SELECT bet_amount FROM game_rooms WHERE id = 'r1'`, { type: QueryTypes.SELECT, plain: true });
    expect(row?.bet_amount).toBe(100);
  });

  it('skips files an earlier runner recorded in schema_migrations', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'migrations-'));
    fs.writeFileSync(path.join(dir, '001_base.sql'), 'THIS IS NOT SQL;');
    fs.writeFileSync(path.join(dir, '002_extra.sql'), 'CREATE TABLE t2 (id INTEGER);');
    sequelize = createSequelize(':memory:');
    await sequelize.query('CREATE TABLE schema_migrations (version TEXT PRIMARY KEY, applied_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP)');
    await sequelize.query(`INSERT INTO schema_migrations (version) VALUES ('001_base')`);

    expect(await migrate(sequelize, dir)).toEqual(['002_extra.sql']);
    expect(await tableExists(sequelize, 't2')).toBe(true);
    expect(await migrate(sequelize, dir)).toEqual([]);
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('rolls back a failing file and stops there', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'migrations-'));
    fs.writeFileSync(path.join(dir, '001_ok.sql'), 'CREATE TABLE t1 (id INTEGER);');
    fs.writeFileSync(path.join(dir, '002_bad.sql'), 'CREATE TABLE t2 (id INTEGER);\nTHIS IS NOT SQL;');
    fs.writeFileSync(path.join(dir, '003_later.sql'), 'CREATE TABLE t3 (id INTEGER);');
    sequelize = createSequelize(':memory:');

    await expect(migrate(sequelize, dir)).rejects.toThrow();

    const rows = await sequelize.query<{ filename: string }>('SELECT filename FROM migrations', { type: QueryTypes.SELECT });
    expect(rows.map(r => r.filename)).toEqual(['001_ok.sql']);
    expect(await tableExists(sequelize, 't1')).toBe(true);
    expect(await tableExists(sequelize, 't2')).toBe(false);
    expect(await tableExists(sequelize, 't3')).toBe(false);
    expect(error).toHaveBeenCalledTimes(1);
    fs.rmSync(dir, { recursive: true, force: true });
  });
});
