export {
  PostgresRecordStore,
  createPostgresStoreFactory,
  toPoolConfig,
} from './record-store.js';
export { COLLECTION_NAME_PATTERN, type PostgresConfig, type RecordRow } from './types.js';
