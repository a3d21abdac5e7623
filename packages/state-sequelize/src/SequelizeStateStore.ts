import type { Sequelize } from 'sequelize';
import type { StateRecord, StateStore } from '@cadencekit/core';
import { defineStateRecordModel } from './models/StateRecordModel.js';
import type { StateRecordModel } from './models/StateRecordModel.js';
import * as StateRecordMapper from './mappers/StateRecordMapper.js';

export interface SequelizeStateStoreOptions {
  /** Table holding the state records. Default: `'cadencekit_state'`. */
  readonly tableName?: string;
}

/**
 * Sequelize-based StateStore adapter for `@cadencekit/core`.
 *
 * Keeps progress, quota and pacing records in one table of a relational
 * database using Sequelize v6, one row per key. Works with any dialect
 * Sequelize supports (PostgreSQL, MySQL, MariaDB, SQLite, MS SQL Server).
 *
 * Call `initialize()` after construction to create the table.
 */
export class SequelizeStateStore implements StateStore {
  private readonly sequelize: Sequelize;
  private readonly Record: StateRecordModel;

  constructor(sequelize: Sequelize, options?: SequelizeStateStoreOptions) {
    this.sequelize = sequelize;
    this.Record = defineStateRecordModel(this.sequelize, options?.tableName);
  }

  async initialize(): Promise<void> {
    await this.Record.sync();
  }

  async read(key: string): Promise<StateRecord | null> {
    const row = await this.Record.findByPk(key);
    if (!row) return null;
    return StateRecordMapper.toDomain(row.get({ plain: true }));
  }

  async write(key: string, record: StateRecord): Promise<void> {
    const row = StateRecordMapper.toRow(key, record);
    await this.sequelize.transaction(async (transaction) => {
      const existing = await this.Record.findByPk(key, { transaction, lock: true });
      if (existing) {
        await existing.update(row, { transaction });
      } else {
        await this.Record.create(row, { transaction });
      }
    });
  }

  async delete(key: string): Promise<void> {
    await this.Record.destroy({ where: { key } });
  }

  /** Keys currently stored, sorted. */
  async keys(): Promise<string[]> {
    const rows = await this.Record.findAll({ attributes: ['key'], order: [['key', 'ASC']] });
    return rows.map((row) => row.key);
  }
}
