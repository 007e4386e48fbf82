/**
 * TypeORM Storage Adapter for PostgreSQL
 */

export { TypeORMStorageAdapter } from './typeorm-storage.adapter';
export {
  createDataSource,
  createTypeORMConfig,
  TRACKING_ENTITIES,
} from './typeorm.config';
export * from './entities';
