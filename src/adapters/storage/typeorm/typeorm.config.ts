import { DataSource } from 'typeorm';
import { PostgresConnectionOptions } from 'typeorm/driver/postgres/PostgresConnectionOptions';
import {
  AutomationInvocationEntity,
  AutomationRuleEntity,
  ShipmentEntity,
  StatusAuditEntity,
  TrackingEventEntity,
  UnresolvedEventEntity,
} from './entities';

export const TRACKING_ENTITIES = [
  ShipmentEntity,
  TrackingEventEntity,
  StatusAuditEntity,
  AutomationRuleEntity,
  AutomationInvocationEntity,
  UnresolvedEventEntity,
];

/**
 * TypeORM configuration for the tracking store
 */
export const createTypeORMConfig = (
  options: Partial<PostgresConnectionOptions> = {},
): PostgresConnectionOptions => {
  const defaultConfig: PostgresConnectionOptions = {
    type: 'postgres',
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    username: process.env.DB_USERNAME || 'trackline',
    password: process.env.DB_PASSWORD || 'trackline',
    database: process.env.DB_NAME || 'trackline',
    entities: TRACKING_ENTITIES,
    synchronize: process.env.NODE_ENV === 'development',
    logging: process.env.DB_LOGGING === 'true',
    // Connection pool settings
    extra: {
      max: parseInt(process.env.DB_POOL_SIZE || '10', 10),
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    },
  };

  return {
    ...defaultConfig,
    ...options,
    type: 'postgres',
  };
};

/**
 * Create TypeORM DataSource
 */
export const createDataSource = (
  options?: Partial<PostgresConnectionOptions>,
): DataSource => {
  return new DataSource(createTypeORMConfig(options));
};
