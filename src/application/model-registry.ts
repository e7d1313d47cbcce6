import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { MODEL_CATALOG, MODEL_CREATED_AT, MODEL_VERSION, type ModelDefinition } from "../domain/models.js";
import type { ModelInfo, ModelOutput, ModelSummary } from "../domain/types.js";
import { AppError, NotFoundError, ValidationError } from "../infra/app-error.js";
import type { ClockPort } from "../infra/clock.js";
import type { Logger } from "../infra/logger.js";

export class ModelRegistry {
  private readonly models = new Map<string, ModelDefinition>();
  private loaded = false;

  constructor(
    private readonly clock: ClockPort,
    private readonly logger: Logger,
    private readonly catalog: readonly ModelDefinition[] = MODEL_CATALOG,
  ) {}

  get modelsLoaded(): boolean {
    return this.loaded;
  }

  async load(): Promise<void> {
    this.logger.info("Loading ML models...");
    for (const definition of this.catalog) {
      this.models.set(definition.name, definition);
    }
    this.loaded = true;
    this.logger.info({ models: [...this.models.keys()] }, "All ML models loaded");
  }

  activeModelCount(): number {
    return this.models.size;
  }

  /** Throws `NotFoundError` for unknown models and `ValidationError` for a wrong feature count. */
  resolve(modelName: string, featureCount: number): ModelDefinition {
    if (!this.loaded) {
      throw new AppError(503, "models_not_loaded", "Models are not loaded yet.", "upstream_unavailable");
    }
    const definition = this.models.get(modelName);
    if (!definition) {
      throw new NotFoundError("model_not_found", `Model not found: ${modelName}`);
    }
    if (definition.featureCount !== null && definition.featureCount !== featureCount) {
      throw new ValidationError(
        "invalid_feature_count",
        `Model ${modelName} expects ${definition.featureCount} features, got ${featureCount}.`,
      );
    }
    return definition;
  }

  /** Yields once so a burst of computations does not monopolise the event loop. */
  async predict(definition: ModelDefinition, features: readonly number[]): Promise<ModelOutput> {
    await yieldToEventLoop();
    const { prediction, confidence } = await definition.run(features);
    return {
      prediction,
      confidence,
      model_version: MODEL_VERSION,
      features_used: features.length,
    };
  }

  list(): ModelSummary[] {
    const lastUpdated = this.clock.nowIso();
    return [...this.models.values()].map((definition): ModelSummary => ({
      name: definition.name,
      type: definition.type,
      version: MODEL_VERSION,
      status: "active",
      last_updated: lastUpdated,
    }));
  }

  has(modelName: string): boolean {
    return this.models.has(modelName);
  }

  definition(modelName: string): ModelDefinition | undefined {
    return this.models.get(modelName);
  }

  info(modelName: string): ModelInfo {
    const definition = this.models.get(modelName);
    if (!definition) {
      throw new NotFoundError("model_not_found", `Model not found: ${modelName}`);
    }
    return {
      name: definition.name,
      type: definition.type,
      version: MODEL_VERSION,
      description: `ML model for ${definition.name} tasks`,
      input_features: [...definition.inputFeatures],
      expected_feature_count: definition.featureCount,
      output_format: "prediction with confidence score",
      performance_metrics: {
        accuracy: definition.performance.accuracy,
        precision: definition.performance.precision,
        recall: definition.performance.recall,
      },
      created_at: MODEL_CREATED_AT,
      last_updated: this.clock.nowIso(),
    };
  }
}
