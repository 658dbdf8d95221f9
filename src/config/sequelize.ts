import fs from 'fs';
import path from 'path';
import { Sequelize, Transaction } from 'sequelize';
import { ENV } from './env.js';
import { registerModels } from '../models/index.js';

export function createSequelize(storage: string = ENV.DB_STORAGE): Sequelize {
  return new Sequelize({
    dialect: 'sqlite',
    storage,
    logging: ENV.DB_LOGGING ? (sql: string) => console.debug('[sql]', sql) : false,
    // Take the write lock when a transaction begins so two writers on one room serialize
    transactionType: Transaction.TYPES.IMMEDIATE,
    define: {
      underscored: true,
      freezeTableName: true,
    },
  });
}

export const sequelize = createSequelize();

export function ensureStorageDir(storage: string = ENV.DB_STORAGE) {
  if (storage === ':memory:') return;
  const dir = path.dirname(path.resolve(process.cwd(), storage));
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
}

export async function initSequelize(instance: Sequelize = sequelize) {
  await instance.authenticate();
  registerModels(instance);
}
