import { Sequelize } from 'sequelize';
import { BetterSqliteDatabase } from './BetterSqliteDatabase.js';

export interface SqliteSequelizeOptions {
  /** Passed to Sequelize. Default: `false`. */
  readonly logging?: false | ((sql: string) => void);
}

/**
 * Sequelize instance on a SQLite file (or `':memory:'`) driven by
 * better-sqlite3, with a single pooled connection.
 */
export function createSqliteSequelize(storage: string, options: SqliteSequelizeOptions = {}): Sequelize {
  return new Sequelize({
    dialect: 'sqlite',
    storage,
    logging: options.logging ?? false,
    dialectModule: { Database: BetterSqliteDatabase },
    pool: {
      max: 1,
      min: 1,
      idle: 30000,
      acquire: 60000,
      evict: 30000,
    },
  });
}
