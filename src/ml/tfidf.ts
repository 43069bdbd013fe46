import { VectorizerArtifact } from './artifacts';
import { ModelFormatError } from '../utils/errors';

// Runs of two or more word characters, as tokenized at training time
const TOKEN_PATTERN = /[\p{L}\p{N}_]{2,}/gu;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

/**
 * TF-IDF transform with a fixed, pre-fitted vocabulary
 */
export class TfidfVectorizer {
  private readonly vocabulary: Map<string, number>;
  private readonly stopWords: Set<string>;

  constructor(private readonly artifact: VectorizerArtifact) {
    this.vocabulary = new Map(Object.entries(artifact.vocabulary));
    for (const [term, index] of this.vocabulary) {
      if (index >= artifact.idf.length) {
        throw new ModelFormatError(`Vocabulary term '${term}' maps to column ${index}, idf has ${artifact.idf.length}`);
      }
    }
    this.stopWords = new Set(artifact.stop_words);
  }

  get size(): number {
    return this.artifact.idf.length;
  }

  transform(text: string): number[] {
    const vector = new Array<number>(this.size).fill(0);

    for (const token of tokenize(text)) {
      if (this.stopWords.has(token)) continue;
      const index = this.vocabulary.get(token);
      if (index !== undefined) {
        vector[index] += 1;
      }
    }

    for (let i = 0; i < vector.length; i++) {
      if (vector[i] === 0) continue;
      const tf = this.artifact.sublinear_tf ? 1 + Math.log(vector[i]) : vector[i];
      vector[i] = tf * this.artifact.idf[i];
    }

    if (this.artifact.norm === 'l2') {
      const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
      if (norm > 0) {
        for (let i = 0; i < vector.length; i++) vector[i] /= norm;
      }
    }

    return vector;
  }
}
