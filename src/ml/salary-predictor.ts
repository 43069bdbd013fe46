import { SalaryModelArtifact, salaryModelSchema, readArtifact } from './artifacts';
import { predictRegression, validateForest } from './forest';
import { UnknownCategoryError } from '../utils/errors';
import { roundTo } from '../utils/round';

export const SALARY_FEATURES = ['title', 'location', 'company'] as const;
export type SalaryFeature = typeof SALARY_FEATURES[number];

export interface SalaryPrediction {
  predicted_salary: number;
  title: string;
  location: string;
  company: string;
}

export interface SalaryModelStats {
  model_type: string;
  features: SalaryFeature[];
  num_trees: number;
  unique_titles: number;
  unique_locations: number;
  unique_companies: number;
}

/**
 * Predicts an average salary from (title, location, company).
 * Each input is label-encoded against the classes seen during training.
 */
export class SalaryPredictor {
  private readonly encoders: Record<SalaryFeature, Map<string, number>>;

  constructor(private readonly artifact: SalaryModelArtifact) {
    validateForest(artifact.forest, SALARY_FEATURES.length, 1);
    const toIndex = (classes: string[]) =>
      new Map(classes.map((label, i): [string, number] => [label, i]));
    this.encoders = {
      title: toIndex(artifact.encoders.title),
      location: toIndex(artifact.encoders.location),
      company: toIndex(artifact.encoders.company),
    };
  }

  static fromFile(path: string): SalaryPredictor {
    return new SalaryPredictor(readArtifact(salaryModelSchema, path));
  }

  encode(feature: SalaryFeature, value: string): number {
    const encoded = this.encoders[feature].get(value);
    if (encoded === undefined) {
      throw new UnknownCategoryError(feature, value);
    }
    return encoded;
  }

  /**
   * @throws UnknownCategoryError when any input was not seen during training
   */
  predict(title: string, location: string, company: string): SalaryPrediction {
    const features = [
      this.encode('title', title),
      this.encode('location', location),
      this.encode('company', company),
    ];

    return {
      predicted_salary: roundTo(predictRegression(this.artifact.forest, features), 2),
      title,
      location,
      company,
    };
  }

  stats(): SalaryModelStats {
    return {
      model_type: this.artifact.model_type,
      features: [...SALARY_FEATURES],
      num_trees: this.artifact.forest.trees.length,
      unique_titles: this.artifact.encoders.title.length,
      unique_locations: this.artifact.encoders.location.length,
      unique_companies: this.artifact.encoders.company.length,
    };
  }
}
