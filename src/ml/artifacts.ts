import { readFileSync } from 'fs';
import { z } from 'zod';
import { ModelFormatError } from '../utils/errors';

/**
 * Artifact formats written by the offline training jobs.
 *
 * Trees use the flat node layout of a fitted decision tree: a node with
 * `feature < 0` is a leaf; otherwise samples with `x[feature] <= threshold`
 * go to `left`, the rest to `right`. Leaf `value` holds the regression
 * output (one number) or the per-class sample weights.
 */

const treeNodeSchema = z.object({
  feature: z.number().int(),
  threshold: z.number(),
  left: z.number().int(),
  right: z.number().int(),
  value: z.array(z.number()).min(1),
});

const decisionTreeSchema = z.object({
  nodes: z.array(treeNodeSchema).min(1),
});

const forestSchema = z.object({
  trees: z.array(decisionTreeSchema).min(1),
});

export const salaryModelSchema = z.object({
  kind: z.literal('salary-regressor'),
  model_type: z.string().default('Random Forest Regressor'),
  encoders: z.object({
    title: z.array(z.string()),
    location: z.array(z.string()),
    company: z.array(z.string()),
  }),
  forest: forestSchema,
});

export const jobClassifierSchema = z.object({
  kind: z.literal('job-classifier'),
  model_type: z.string().default('Random Forest Classifier'),
  vectorizer: z.object({
    vocabulary: z.record(z.number().int().nonnegative()),
    idf: z.array(z.number()),
    stop_words: z.array(z.string()).default([]),
    sublinear_tf: z.boolean().default(false),
    norm: z.enum(['l2', 'none']).default('l2'),
  }),
  classes: z.array(z.string()).min(1),
  forest: forestSchema,
});

export type TreeNode = z.infer<typeof treeNodeSchema>;
export type DecisionTree = z.infer<typeof decisionTreeSchema>;
export type Forest = z.infer<typeof forestSchema>;
export type SalaryModelArtifact = z.infer<typeof salaryModelSchema>;
export type JobClassifierArtifact = z.infer<typeof jobClassifierSchema>;
export type VectorizerArtifact = JobClassifierArtifact['vectorizer'];

export function parseArtifact<T extends z.ZodTypeAny>(
  schema: T,
  content: string,
  source: string
): z.infer<T> {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ModelFormatError(`${source} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ModelFormatError(`${source} does not match the expected format: ${issues}`);
  }
  return parsed.data;
}

export function readArtifact<T extends z.ZodTypeAny>(schema: T, path: string): z.infer<T> {
  return parseArtifact(schema, readFileSync(path, 'utf-8'), path);
}
