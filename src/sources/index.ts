import { JobSource } from './base';
import { AdzunaSource } from './adzuna';
import { Config } from '../config';
import { Logger } from '../utils/logger';

/**
 * Factory for the configured upstream source
 */
export function createJobSource(config: Config, logger: Logger): JobSource {
  if (!config.adzuna.appId || !config.adzuna.apiKey) {
    logger.warn('ADZUNA_APP_ID / ADZUNA_API_KEY not set; refresh will fetch nothing');
  }
  return new AdzunaSource(config.adzuna, logger.child('adzuna'));
}
