import type { ModelName, ModelPerformanceStats, ModelType } from "./types.js";

export const MODEL_VERSION = "1.0.0";
export const MODEL_CREATED_AT = "2024-01-01T00:00:00Z";

export interface ModelRun {
  prediction: unknown;
  confidence: number;
}

export interface ModelDefinition {
  name: ModelName;
  type: ModelType;
  /** `null` accepts any non-empty feature vector. */
  featureCount: number | null;
  inputFeatures: string[];
  performance: Omit<ModelPerformanceStats, "model_name">;
  run(features: readonly number[]): ModelRun | Promise<ModelRun>;
}

const CLASS_COUNT = 3;
const REGRESSION_WEIGHTS = [0.3, 0.25, 0.2, 0.15, 0.1] as const;

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Class k scores the features at positions i with i % 3 === k at full weight
 * and the rest at a quarter. Softmax over the three scores gives confidence.
 */
export function classify(features: readonly number[]): { prediction: number; confidence: number } {
  const scores = Array.from({ length: CLASS_COUNT }, (_, classIndex) =>
    features.reduce((sum, value, index) => sum + value * (index % CLASS_COUNT === classIndex ? 1 : 0.25), 0),
  );
  if (!scores.every((score) => Number.isFinite(score))) {
    throw new RangeError("Classification scores are not finite.");
  }
  const maxScore = Math.max(...scores);
  const exponents = scores.map((score) => Math.exp(score - maxScore));
  const total = exponents.reduce((sum, value) => sum + value, 0);
  const prediction = scores.indexOf(maxScore);
  return {
    prediction,
    confidence: round((exponents[prediction] ?? 0) / total, 4),
  };
}

export function regress(features: readonly number[]): { prediction: number; confidence: number } {
  const prediction = features.reduce(
    (sum, value, index) => sum + value * (REGRESSION_WEIGHTS[index] ?? 0),
    0,
  );
  return { prediction: round(prediction, 6), confidence: 0.85 };
}

export const MODEL_CATALOG: readonly ModelDefinition[] = [
  {
    name: "recommendation",
    type: "recommendation",
    featureCount: null,
    inputFeatures: ["user_id", "item_features"],
    performance: {
      accuracy: 0.9,
      precision: 0.88,
      recall: 0.86,
      f1_score: 0.87,
      inference_time_ms: 31,
      total_predictions: 0,
    },
    run: () => ({ prediction: { recommended_items: [1, 2, 3, 4, 5] }, confidence: 0.9 }),
  },
  {
    name: "sentiment",
    type: "nlp",
    featureCount: null,
    inputFeatures: ["text"],
    performance: {
      accuracy: 0.91,
      precision: 0.9,
      recall: 0.89,
      f1_score: 0.89,
      inference_time_ms: 12,
      total_predictions: 0,
    },
    run: () => ({ prediction: "positive", confidence: 0.9 }),
  },
  {
    name: "classification",
    type: "classification",
    featureCount: 10,
    inputFeatures: Array.from({ length: 10 }, (_, index) => `feature_${index + 1}`),
    performance: {
      accuracy: 0.92,
      precision: 0.89,
      recall: 0.91,
      f1_score: 0.9,
      inference_time_ms: 25.5,
      total_predictions: 0,
    },
    run: classify,
  },
  {
    name: "regression",
    type: "regression",
    featureCount: 5,
    inputFeatures: ["value_1", "value_2", "value_3", "value_4", "value_5"],
    performance: {
      accuracy: 0.9,
      precision: 0.87,
      recall: 0.88,
      f1_score: 0.87,
      inference_time_ms: 18,
      total_predictions: 0,
    },
    run: regress,
  },
];
