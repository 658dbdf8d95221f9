import fs from 'fs';
import path from 'path';
import { QueryTypes, type Sequelize, type Transaction } from 'sequelize';
import { resolveSourcePath } from '../utils/paths.js';

export function splitSqlStatements(sql: string): string[] {
  return sql
    .split('\n')
    .map(line => {
      const idx = line.indexOf('--');
      return idx >= 0 ? line.slice(0, idx) : line;
    })
    .join('\n')
    .split(';')
    .map(s => s.trim())
    .filter(Boolean);
}

async function ensureMigrationsTable(sequelize: Sequelize) {
  await sequelize.query(
    `CREATE TABLE IF NOT EXISTS migrations (id INTEGER PRIMARY KEY AUTOINCREMENT, filename TEXT NOT NULL UNIQUE, executed_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP)`
  );
}

// Databases upgraded by the bot's earlier runner list applied files in schema_migrations(version), without .sql
async function legacyApplied(sequelize: Sequelize): Promise<string[]> {
  const tables = await sequelize.query<{ name: string }>(
    `SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_migrations'`,
    { type: QueryTypes.SELECT }
  );
  if (!tables.length) return [];
  const rows = await sequelize.query<{ version: string }>(`SELECT version FROM schema_migrations`, { type: QueryTypes.SELECT });
  return rows.map(r => `${r.version}.sql`);
}

async function applied(sequelize: Sequelize): Promise<Set<string>> {
  const rows = await sequelize.query<{ filename: string }>(`SELECT filename FROM migrations`, { type: QueryTypes.SELECT });
  return new Set([...rows.map(r => r.filename), ...(await legacyApplied(sequelize))]);
}

export async function applySql(sequelize: Sequelize, sql: string, transaction?: Transaction) {
  for (const statement of splitSqlStatements(sql)) {
    await sequelize.query(statement, { transaction });
  }
}

/** Applies every pending *.sql file in name order; returns the files applied by this run. */
export async function migrate(sequelize: Sequelize, dir: string = resolveSourcePath('migrations')): Promise<string[]> {
  await ensureMigrationsTable(sequelize);
  const done = await applied(sequelize);
  const files = fs.readdirSync(dir).filter(f => f.endsWith('.sql')).sort();
  const ran: string[] = [];
  for (const f of files) {
    if (done.has(f)) continue;
    const sql = fs.readFileSync(path.join(dir, f), 'utf8');
    console.log(`[migrate] applying ${f}`);
    try {
      await sequelize.transaction(async t => {
        await applySql(sequelize, sql, t);
        await sequelize.query('INSERT INTO migrations (filename) VALUES (:filename)', { replacements: { filename: f }, transaction: t });
      });
    } catch (e) {
      console.error(`[migrate] ${f} failed: ${e instanceof Error ? e.message : String(e)}`);
      throw e;
    }
    ran.push(f);
  }
  return ran;
}

// Run only when invoked directly (CLI)
const invokedDirectly = process.argv[1] && /migrate\.(ts|js)$/.test(process.argv[1]);
if (invokedDirectly) {
  const { sequelize, ensureStorageDir } = await import('../config/sequelize.js');
  ensureStorageDir();
  try {
    const ran = await migrate(sequelize);
    console.log(ran.length ? `[migrate] applied ${ran.length} migration(s)` : '[migrate] up to date');
  } catch {
    process.exitCode = 1;
  } finally {
    await sequelize.close();
  }
}
