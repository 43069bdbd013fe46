import { Config } from '../config';
import { createPool } from '../db/client';
import { JobsRepository } from '../db/jobs';
import { LoadedModels, loadModels } from '../ml';
import { createJobSource } from '../sources';
import { Logger } from '../utils/logger';
import { JobStore, PgJobStore } from './job-store';
import { RefreshService } from './refresh';

/**
 * Everything a request handler may use. Built once at start-up.
 */
export interface AppServices {
  logger: Logger;
  store: JobStore;
  refresh: RefreshService;
  models: LoadedModels;
}

export interface ServiceContainer extends AppServices {
  close(): Promise<void>;
}

export function createServices(config: Config, logger: Logger): ServiceContainer {
  const pool = createPool(config.database, logger.child('db'));
  const store = new PgJobStore(pool, new JobsRepository(logger.child('db')), logger.child('store'));
  const source = createJobSource(config, logger);

  return {
    logger,
    store,
    refresh: new RefreshService(source, store, logger.child('refresh')),
    models: loadModels(config.modelsDir, logger.child('ml')),
    close: () => pool.end(),
  };
}
