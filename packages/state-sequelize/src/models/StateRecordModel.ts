import { DataTypes } from 'sequelize';
import type { Model, ModelStatic, Sequelize } from 'sequelize';

export interface StateRecordRow {
  key: string;
  version: number;
  kind: string;
  namespace: string;
  data: unknown;
  /** BIGINT columns come back as strings on some dialects. */
  savedAt: number | string;
}

export interface StateRecordInstance extends Model<StateRecordRow>, StateRecordRow {}

export type StateRecordModel = ModelStatic<StateRecordInstance>;

export const DEFAULT_STATE_TABLE = 'cadencekit_state';

export function defineStateRecordModel(sequelize: Sequelize, tableName: string = DEFAULT_STATE_TABLE): StateRecordModel {
  return sequelize.define<StateRecordInstance>(
    'CadenceStateRecord',
    {
      key: {
        type: DataTypes.STRING(255),
        primaryKey: true,
        allowNull: false,
      },
      version: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      kind: {
        type: DataTypes.STRING(20),
        allowNull: false,
      },
      namespace: {
        type: DataTypes.STRING(255),
        allowNull: false,
      },
      data: {
        type: DataTypes.JSON,
        allowNull: false,
      },
      savedAt: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
    },
    {
      tableName,
      timestamps: false,
    },
  );
}
