import { DecisionTree, Forest } from './artifacts';
import { ModelFormatError } from '../utils/errors';

/**
 * Walks one tree from the root and returns the value of the leaf reached
 */
export function evaluateTree(tree: DecisionTree, features: ArrayLike<number>): number[] {
  let index = 0;

  // A well-formed tree never visits more nodes than it has
  for (let step = 0; step < tree.nodes.length; step++) {
    const node = tree.nodes[index];
    if (!node) {
      throw new ModelFormatError(`Tree references missing node ${index}`);
    }
    if (node.feature < 0) {
      return node.value;
    }
    if (node.feature >= features.length) {
      throw new ModelFormatError(`Tree splits on feature ${node.feature}, input has ${features.length}`);
    }
    const x = features[node.feature];
    index = x <= node.threshold ? node.left : node.right;
  }

  throw new ModelFormatError('Tree traversal did not reach a leaf');
}

/**
 * Checks the structure of every tree against the model's inputs and outputs.
 * Children must point forward inside their tree, so every walk ends at a leaf.
 */
export function validateForest(forest: Forest, featureCount: number, leafWidth: number): void {
  forest.trees.forEach((tree, t) => {
    tree.nodes.forEach((node, n) => {
      const where = `tree ${t} node ${n}`;
      if (node.feature < 0) {
        if (node.value.length !== leafWidth) {
          throw new ModelFormatError(`${where}: leaf has ${node.value.length} values, expected ${leafWidth}`);
        }
        return;
      }
      if (node.feature >= featureCount) {
        throw new ModelFormatError(`${where}: splits on feature ${node.feature}, model has ${featureCount} features`);
      }
      for (const child of [node.left, node.right]) {
        if (child <= n || child >= tree.nodes.length) {
          throw new ModelFormatError(`${where}: child ${child} is out of range`);
        }
      }
    });
  });
}

/**
 * Mean of the per-tree regression outputs
 */
export function predictRegression(forest: Forest, features: ArrayLike<number>): number {
  const total = forest.trees.reduce((sum, tree) => sum + evaluateTree(tree, features)[0], 0);
  return total / forest.trees.length;
}

/**
 * Average of the per-tree class distributions. Each leaf's weights are
 * normalized to proportions before averaging.
 */
export function predictProbabilities(
  forest: Forest,
  features: ArrayLike<number>,
  classCount: number
): number[] {
  const probabilities = new Array<number>(classCount).fill(0);

  for (const tree of forest.trees) {
    const leaf = evaluateTree(tree, features);
    if (leaf.length !== classCount) {
      throw new ModelFormatError(`Leaf has ${leaf.length} class weights, expected ${classCount}`);
    }
    const total = leaf.reduce((sum, weight) => sum + weight, 0);
    if (total <= 0) continue;
    leaf.forEach((weight, i) => {
      probabilities[i] += weight / total / forest.trees.length;
    });
  }

  return probabilities;
}

/**
 * Index of the largest value; the first one wins on ties
 */
export function argmax(values: readonly number[]): number {
  let best = 0;
  for (let i = 1; i < values.length; i++) {
    if (values[i] > values[best]) best = i;
  }
  return best;
}
