import { JobClassifierArtifact, jobClassifierSchema, readArtifact } from './artifacts';
import { argmax, predictProbabilities, validateForest } from './forest';
import { TfidfVectorizer } from './tfidf';
import { ModelFormatError } from '../utils/errors';
import { roundTo } from '../utils/round';

export interface JobClassification {
  predicted_category: string;
  /** Probability per category, in percent with one decimal */
  confidence: Record<string, number>;
  title: string;
}

/**
 * Classifies a posting into a job category from its title and description
 */
export class JobClassifier {
  private readonly vectorizer: TfidfVectorizer;

  constructor(private readonly artifact: JobClassifierArtifact) {
    if (artifact.vectorizer.idf.length === 0) {
      throw new ModelFormatError('Classifier vectorizer has an empty vocabulary');
    }
    this.vectorizer = new TfidfVectorizer(artifact.vectorizer);
    validateForest(artifact.forest, this.vectorizer.size, artifact.classes.length);
  }

  static fromFile(path: string): JobClassifier {
    return new JobClassifier(readArtifact(jobClassifierSchema, path));
  }

  get categories(): readonly string[] {
    return this.artifact.classes;
  }

  classify(title: string, description: string = ''): JobClassification {
    const features = this.vectorizer.transform(`${title} ${description}`);
    const probabilities = predictProbabilities(this.artifact.forest, features, this.artifact.classes.length);

    const confidence: Record<string, number> = {};
    this.artifact.classes.forEach((category, i) => {
      confidence[category] = roundTo(probabilities[i] * 100, 1);
    });

    return {
      predicted_category: this.artifact.classes[argmax(probabilities)],
      confidence,
      title,
    };
  }

  stats(): { model_type: string; num_trees: number; categories: string[]; vocabulary_size: number } {
    return {
      model_type: this.artifact.model_type,
      num_trees: this.artifact.forest.trees.length,
      categories: [...this.categories],
      vocabulary_size: this.vectorizer.size,
    };
  }
}
