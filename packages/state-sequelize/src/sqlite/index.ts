export { BetterSqliteDatabase } from './BetterSqliteDatabase.js';
export { createSqliteSequelize } from './createSqliteSequelize.js';
export type { SqliteSequelizeOptions } from './createSqliteSequelize.js';
