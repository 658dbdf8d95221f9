import type { Sequelize } from 'sequelize';
import { GameEngineRegistry } from '../games/registry.js';
import { RussianRouletteEngine } from '../games/russianRoulette.js';
import { AchievementService } from './achievementService.js';
import { CheckInService } from './checkInService.js';
import { GameRecordService } from './gameRecordService.js';
import { GameService } from './gameService.js';
import { UserService } from './userService.js';

export interface AppServices {
  users: UserService;
  checkIns: CheckInService;
  achievements: AchievementService;
  records: GameRecordService;
  registry: GameEngineRegistry;
  games: GameService;
}

export interface ServiceOptions {
  startingCoins?: number;
  timeZone?: string;
  now?: () => Date;
  registry?: GameEngineRegistry;
}

export function defaultRegistry() {
  return new GameEngineRegistry().register(new RussianRouletteEngine());
}

export function createServices(sequelize: Sequelize, options: ServiceOptions = {}): AppServices {
  const users = new UserService(sequelize, options.startingCoins);
  const records = new GameRecordService(sequelize);
  const registry = options.registry ?? defaultRegistry();
  return {
    users,
    checkIns: new CheckInService(sequelize, users, { timeZone: options.timeZone, now: options.now }),
    achievements: new AchievementService(sequelize, users),
    records,
    registry,
    games: new GameService(sequelize, registry, users, records),
  };
}
