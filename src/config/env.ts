import dotenv from 'dotenv';

dotenv.config();

export const ENV = {
  PORT: process.env.PORT || '4000',
  DB_STORAGE: process.env.DB_STORAGE || 'data/games.db',
  DB_LOGGING: (process.env.DB_LOGGING || 'false').toLowerCase() === 'true',
  // Shared secret the bot adapter sends as a bearer token; empty disables the check
  API_KEY: process.env.API_KEY || '',
  CORS_ORIGINS: process.env.CORS_ORIGINS || '',
  STARTING_COINS: parseInt(process.env.STARTING_COINS || '1000', 10),
  CHECK_IN_TIME_ZONE: process.env.CHECK_IN_TIME_ZONE || 'Asia/Shanghai',
};
