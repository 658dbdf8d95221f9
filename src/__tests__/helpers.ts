import type { Sequelize } from 'sequelize';
import { createSequelize } from '../config/sequelize.js';
import { registerModels } from '../models/index.js';
import { migrate } from '../scripts/migrate.js';
import { createServices, type ServiceOptions } from '../services/index.js';
import { RussianRouletteEngine, type RandomInt } from '../games/russianRoulette.js';
import { GameEngineRegistry } from '../games/registry.js';

/** Fresh in-memory database built by the real migrations. */
export async function createTestDb(): Promise<Sequelize> {
  const sequelize = createSequelize(':memory:');
  await migrate(sequelize);
  registerModels(sequelize);
  return sequelize;
}

/** Bullet in the last chamber; the shuffle keeps seats in join order. */
export const lastIndex: RandomInt = max => max - 1;

/** Plays back the given draws, then behaves like lastIndex. */
export function scriptedRandom(draws: number[]): RandomInt {
  const queue = [...draws];
  return max => {
    const next = queue.shift();
    return next === undefined ? max - 1 : next;
  };
}

export async function createTestServices(options: ServiceOptions & { random?: RandomInt } = {}) {
  const sequelize = await createTestDb();
  const registry = new GameEngineRegistry().register(new RussianRouletteEngine(options.random ?? lastIndex));
  const services = createServices(sequelize, { startingCoins: 1000, registry, ...options });
  return { sequelize, ...services };
}
