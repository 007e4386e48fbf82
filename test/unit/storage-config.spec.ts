import { createConnection } from 'mongoose';
import {
  MongooseArchiveAdapter,
  TRACKING_ENTITIES,
  TypeORMStorageAdapter,
  createDataSource,
  createTypeORMConfig,
} from '../../src';

describe('createTypeORMConfig', () => {
  it('should register every tracking entity', () => {
    const config = createTypeORMConfig();

    expect(config.type).toBe('postgres');
    expect(config.entities).toEqual(TRACKING_ENTITIES);
    expect(TRACKING_ENTITIES).toHaveLength(6);
  });

  it('should let overrides win over defaults', () => {
    const config = createTypeORMConfig({
      host: 'db.internal',
      port: 6543,
      password: 'test-secret',
      synchronize: false,
    });

    expect(config).toMatchObject({
      host: 'db.internal',
      port: 6543,
      password: 'test-secret',
      synchronize: false,
    });
  });

  it('should build a data source without connecting', () => {
    const dataSource = createDataSource({ host: 'db.internal' });

    expect(dataSource.isInitialized).toBe(false);
    expect(dataSource.options.type).toBe('postgres');
  });
});

describe('TypeORMStorageAdapter exclusive sections', () => {
  const LOCK = 'SELECT pg_advisory_lock(hashtext($1))';
  const UNLOCK = 'SELECT pg_advisory_unlock(hashtext($1))';

  const setup = () => {
    const dataSource = createDataSource({ host: 'db.internal' });
    const queryRunner = dataSource.createQueryRunner();
    const connect = jest.spyOn(queryRunner, 'connect').mockResolvedValue(undefined);
    const query = jest.spyOn(queryRunner, 'query').mockResolvedValue([]);
    const release = jest.spyOn(queryRunner, 'release').mockResolvedValue(undefined);
    jest.spyOn(dataSource, 'createQueryRunner').mockReturnValue(queryRunner);

    return { adapter: new TypeORMStorageAdapter(dataSource), connect, query, release };
  };

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should hold an advisory lock on the shipment while the work runs', async () => {
    const { adapter, connect, query, release } = setup();
    const seen: unknown[][] = [];

    const result = await adapter.runExclusive('shp-1', async () => {
      seen.push(...query.mock.calls);
      return 'done';
    });

    expect(result).toBe('done');
    expect(connect).toHaveBeenCalledTimes(1);
    expect(seen).toEqual([[LOCK, ['shp-1']]]);
    expect(query.mock.calls).toEqual([
      [LOCK, ['shp-1']],
      [UNLOCK, ['shp-1']],
    ]);
    expect(release).toHaveBeenCalledTimes(1);
  });

  it('should unlock and release the connection when the work fails', async () => {
    const { adapter, query, release } = setup();

    await expect(
      adapter.runExclusive('shp-1', async () => {
        throw new Error('insert failed');
      }),
    ).rejects.toThrow('insert failed');

    expect(query.mock.calls[1]).toEqual([UNLOCK, ['shp-1']]);
    expect(release).toHaveBeenCalledTimes(1);
  });
});

describe('MongooseArchiveAdapter', () => {
  it('should report an unopened connection as unhealthy', async () => {
    const connection = createConnection();
    const adapter = new MongooseArchiveAdapter(connection);

    expect(await adapter.isHealthy()).toBe(false);
    await adapter.close();
  });
});
