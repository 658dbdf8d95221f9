import type { Sequelize, Transaction } from 'sequelize';

export interface TxOptions {
  transaction?: Transaction;
}

/** Joins the caller's transaction when there is one, otherwise opens a new one. */
export function withTransaction<T>(sequelize: Sequelize, opts: TxOptions, work: (t: Transaction) => Promise<T>): Promise<T> {
  return opts.transaction ? work(opts.transaction) : sequelize.transaction(work);
}
