export { SequelizeStateStore } from './SequelizeStateStore.js';
export type { SequelizeStateStoreOptions } from './SequelizeStateStore.js';
export { defineStateRecordModel, DEFAULT_STATE_TABLE } from './models/StateRecordModel.js';
export type { StateRecordRow, StateRecordInstance, StateRecordModel } from './models/StateRecordModel.js';
