export { SequelizeStateStore } from './SequelizeStateStore.js';
export type { SequelizeStateStoreOptions } from './SequelizeStateStore.js';
