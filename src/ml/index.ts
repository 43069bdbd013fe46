import { existsSync } from 'fs';
import { join } from 'path';
import { JobClassifier } from './job-classifier';
import { SalaryPredictor } from './salary-predictor';
import { Logger } from '../utils/logger';

export const SALARY_MODEL_FILE = 'salary-model.json';
export const JOB_CLASSIFIER_FILE = 'job-classifier.json';

export interface LoadedModels {
  salaryPredictor: SalaryPredictor | null;
  jobClassifier: JobClassifier | null;
}

function loadIfPresent<T>(path: string, load: (path: string) => T, logger: Logger): T | null {
  if (!existsSync(path)) {
    logger.warn('Model artifact not found; its endpoints are disabled', { path });
    return null;
  }
  const model = load(path);
  logger.info('Model artifact loaded', { path });
  return model;
}

/**
 * Loads both artifacts once at start-up. A missing file disables that model;
 * a malformed one throws.
 */
export function loadModels(modelsDir: string, logger: Logger): LoadedModels {
  return {
    salaryPredictor: loadIfPresent(join(modelsDir, SALARY_MODEL_FILE), SalaryPredictor.fromFile, logger),
    jobClassifier: loadIfPresent(join(modelsDir, JOB_CLASSIFIER_FILE), JobClassifier.fromFile, logger),
  };
}

export { JobClassifier, SalaryPredictor };
