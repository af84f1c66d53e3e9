import { readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { POLLUTANT_FIELDS } from "../info/pollutants";

export const MODEL_FILES = {
  classifier: "aqi-random-forest.json",
  labelEncoder: "aqi-label-encoder.json",
  featureNames: "feature-names.json",
} as const;

export interface Classifier {
  predict(features: readonly number[]): number;
  predictProba(features: readonly number[]): number[];
}

export interface LabelDecoder {
  inverseTransform(index: number): string;
}

export interface ModelArtifacts {
  readonly classifier: Classifier;
  readonly decoder: LabelDecoder;
  readonly featureNames: readonly string[];
}

// Flattened decision tree: node i is a leaf when children_left[i] === -1,
// otherwise samples with x[feature[i]] <= threshold[i] go left.
const TreeSchema = z
  .object({
    children_left: z.array(z.number().int()),
    children_right: z.array(z.number().int()),
    feature: z.array(z.number().int()),
    threshold: z.array(z.number()),
    value: z.array(z.array(z.number().nonnegative())),
  })
  .superRefine((tree, ctx) => {
    const size = tree.children_left.length;
    if (size === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "tree has no nodes" });
      return;
    }
    const lengths = [
      tree.children_right.length,
      tree.feature.length,
      tree.threshold.length,
      tree.value.length,
    ];
    if (lengths.some((length) => length !== size)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "tree node arrays differ in length",
      });
      return;
    }
    tree.children_left.forEach((left, node) => {
      const right = tree.children_right[node];
      if (left === -1) {
        if (right !== -1) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `node ${node} has only one child`,
          });
        }
        if (tree.value[node].reduce((sum, count) => sum + count, 0) <= 0) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `leaf ${node} has an empty class distribution`,
          });
        }
        return;
      }
      // Children always come after their parent, so traversal terminates
      if (left <= node || left >= size || right <= node || right >= size) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `node ${node} points outside the tree`,
        });
      }
    });
  });

const ForestSchema = z
  .object({
    estimator: z.literal("RandomForestClassifier"),
    n_features: z.number().int().positive(),
    n_classes: z.number().int().positive(),
    trees: z.array(TreeSchema).min(1),
  })
  .superRefine((forest, ctx) => {
    forest.trees.forEach((tree, index) => {
      const size = tree.children_left.length;
      if (tree.feature.length !== size || tree.value.length !== size) return;
      tree.children_left.forEach((left, node) => {
        if (left === -1) {
          if (tree.value[node].length !== forest.n_classes) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              message: `tree ${index} leaf ${node} does not cover ${forest.n_classes} classes`,
            });
          }
        } else if (tree.feature[node] < 0 || tree.feature[node] >= forest.n_features) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `tree ${index} node ${node} splits on unknown feature ${tree.feature[node]}`,
          });
        }
      });
    });
  });

const LabelEncoderSchema = z.object({
  classes: z.array(z.string().min(1)).min(1),
});

const FeatureNamesSchema = z.array(z.string());

type ForestModel = z.infer<typeof ForestSchema>;
type DecisionTree = ForestModel["trees"][number];

export function argmax(values: readonly number[]): number {
  let best = 0;
  for (let i = 1; i < values.length; i++) {
    if (values[i] > values[best]) best = i;
  }
  return best;
}

export class RandomForestClassifier implements Classifier {
  constructor(private readonly model: ForestModel) {}

  get classCount(): number {
    return this.model.n_classes;
  }

  predict(features: readonly number[]): number {
    return argmax(this.predictProba(features));
  }

  /**
   * Mean of the per-tree leaf class distributions.
   */
  predictProba(features: readonly number[]): number[] {
    if (features.length !== this.model.n_features) {
      throw new Error(
        `expected ${this.model.n_features} features, received ${features.length}`
      );
    }

    const proba = new Array<number>(this.model.n_classes).fill(0);
    for (const tree of this.model.trees) {
      const counts = tree.value[this.leafFor(tree, features)];
      const total = counts.reduce((sum, count) => sum + count, 0);
      counts.forEach((count, k) => {
        proba[k] += count / total;
      });
    }
    return proba.map((p) => p / this.model.trees.length);
  }

  private leafFor(tree: DecisionTree, features: readonly number[]): number {
    let node = 0;
    while (tree.children_left[node] !== -1) {
      node =
        features[tree.feature[node]] <= tree.threshold[node]
          ? tree.children_left[node]
          : tree.children_right[node];
    }
    return node;
  }
}

export class LabelEncoder implements LabelDecoder {
  constructor(readonly classes: readonly string[]) {}

  inverseTransform(index: number): string {
    if (!Number.isInteger(index) || index < 0 || index >= this.classes.length) {
      throw new RangeError(
        `label index ${index} is outside 0..${this.classes.length - 1}`
      );
    }
    return this.classes[index];
  }
}

function parseArtifact<T extends z.ZodTypeAny>(
  schema: T,
  raw: unknown,
  name: string
): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new Error(`invalid ${name}${where}: ${issue.message}`);
  }
  return result.data;
}

/**
 * Build artifacts from already-parsed JSON values.
 */
export function createModelArtifacts(
  rawClassifier: unknown,
  rawEncoder: unknown,
  rawFeatureNames: unknown
): ModelArtifacts {
  const forest = parseArtifact(ForestSchema, rawClassifier, MODEL_FILES.classifier);
  const encoder = parseArtifact(LabelEncoderSchema, rawEncoder, MODEL_FILES.labelEncoder);
  const featureNames = parseArtifact(
    FeatureNamesSchema,
    rawFeatureNames,
    MODEL_FILES.featureNames
  );

  const expected = POLLUTANT_FIELDS.join(", ");
  if (featureNames.join(", ") !== expected) {
    throw new Error(
      `feature order mismatch: model expects [${featureNames.join(", ")}], service sends [${expected}]`
    );
  }
  if (forest.n_features !== featureNames.length) {
    throw new Error(
      `classifier takes ${forest.n_features} features but ${featureNames.length} are named`
    );
  }
  if (forest.n_classes !== encoder.classes.length) {
    throw new Error(
      `classifier has ${forest.n_classes} classes but the label encoder has ${encoder.classes.length}`
    );
  }

  return Object.freeze({
    classifier: new RandomForestClassifier(forest),
    decoder: new LabelEncoder(Object.freeze([...encoder.classes])),
    featureNames: Object.freeze([...featureNames]),
  });
}

function readJson(dir: string, file: string): unknown {
  const text = readFileSync(join(dir, file), "utf8");
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new Error(`${file} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export function loadModelArtifacts(dir: string): ModelArtifacts {
  return createModelArtifacts(
    readJson(dir, MODEL_FILES.classifier),
    readJson(dir, MODEL_FILES.labelEncoder),
    readJson(dir, MODEL_FILES.featureNames)
  );
}
