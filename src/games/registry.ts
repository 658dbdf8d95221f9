import { AppError } from '../utils/errors.js';
import type { GameEngine } from './gameEngine.js';
import type { GameDescriptor } from './types.js';

export class GameEngineRegistry {
  private engines = new Map<string, GameEngine>();

  register(engine: GameEngine) {
    if (this.engines.has(engine.gameType)) {
      throw new Error(`Game engine already registered: ${engine.gameType}`);
    }
    this.engines.set(engine.gameType, engine);
    return this;
  }

  get(gameType: string): GameEngine | undefined {
    return this.engines.get(gameType);
  }

  require(gameType: string): GameEngine {
    const engine = this.engines.get(gameType);
    if (!engine) throw new AppError('unknown_game_type', `Unsupported game type: ${gameType}`);
    return engine;
  }

  list(): GameDescriptor[] {
    return [...this.engines.values()].map(e => ({
      type: e.gameType,
      name: e.displayName,
      minPlayers: e.minPlayers,
      maxPlayers: e.maxPlayers,
      minBet: e.minBet,
      maxBet: e.maxBet,
    }));
  }
}
