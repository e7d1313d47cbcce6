import { performance } from "node:perf_hooks";
import { analyzeSentiment } from "../domain/sentiment.js";
import { generateRecommendations } from "../domain/recommendations.js";
import type {
  ModelInfo,
  ModelSummary,
  PredictionInput,
  PredictionResponse,
  RecommendationInput,
  RecommendationResponse,
  SentimentInput,
  SentimentResponse,
} from "../domain/types.js";
import type { ClockPort } from "../infra/clock.js";
import { cacheKeys, hashPayload } from "../infra/fingerprint.js";
import type { CacheAsideOrchestrator } from "./cache-aside.js";
import type { BackgroundEventEmitter } from "./event-emitter.js";
import type { ModelRegistry } from "./model-registry.js";
import type { UsageAccountant } from "./usage-accountant.js";

export const USAGE_ENDPOINTS = {
  predict: "/predict",
  recommend: "/recommend",
  sentiment: "/sentiment",
} as const;

export const RECOMMENDATION_ALGORITHM = "collaborative_filtering_v2";
export const DEFAULT_RECOMMENDATION_COUNT = 10;
const EVENT_SAMPLE_SIZE = 5;

export interface InferenceServiceOptions {
  predictionTtlSeconds: number;
  recommendationTtlSeconds: number;
}

export interface RequestContext {
  /** Authenticated subject, used when the body carries no user id. */
  subject?: string;
  signal?: AbortSignal;
}

export interface Served<TBody> {
  body: TBody;
  cached: boolean;
}

export class InferenceService {
  constructor(
    private readonly models: ModelRegistry,
    private readonly cacheAside: CacheAsideOrchestrator,
    private readonly usage: UsageAccountant,
    private readonly events: BackgroundEventEmitter,
    private readonly clock: ClockPort,
    private readonly options: InferenceServiceOptions,
  ) {}

  async predict(input: PredictionInput, context: RequestContext = {}): Promise<Served<PredictionResponse>> {
    await this.usage.record(USAGE_ENDPOINTS.predict, input.user_id ?? context.subject);
    const startedAt = performance.now();
    const definition = this.models.resolve(input.model_name, input.features.length);

    const result = await this.cacheAside.getOrCompute<PredictionResponse>({
      operation: "predict",
      key: cacheKeys.prediction(input.model_name, {
        features: input.features,
        context: input.context ?? null,
      }),
      ttlSeconds: this.options.predictionTtlSeconds,
      ...(context.signal ? { signal: context.signal } : {}),
      compute: async () => {
        const output = await this.models.predict(definition, input.features);
        return {
          prediction: output.prediction,
          confidence: output.confidence,
          model_version: output.model_version,
          processing_time_ms: Math.round((performance.now() - startedAt) * 1000) / 1000,
          timestamp: this.clock.nowIso(),
        };
      },
    });

    if (!result.cached) {
      this.events.publish("prediction_made", {
        model_name: input.model_name,
        prediction: result.value,
      });
    }
    return { body: result.value, cached: result.cached };
  }

  async recommend(
    input: RecommendationInput,
    context: RequestContext = {},
  ): Promise<Served<RecommendationResponse>> {
    await this.usage.record(USAGE_ENDPOINTS.recommend, input.user_id);
    const count = input.num_recommendations ?? DEFAULT_RECOMMENDATION_COUNT;
    const filters = input.filters ?? {};
    const filtersHash = Object.keys(filters).length > 0 ? hashPayload(filters) : undefined;

    const result = await this.cacheAside.getOrCompute<RecommendationResponse>({
      operation: "recommend",
      key: cacheKeys.recommendations(input.user_id, input.item_type, count, filtersHash),
      ttlSeconds: this.options.recommendationTtlSeconds,
      ...(context.signal ? { signal: context.signal } : {}),
      compute: async () => ({
        user_id: input.user_id,
        recommendations: generateRecommendations(input.item_type, count, filters),
        generated_at: this.clock.nowIso(),
        algorithm: RECOMMENDATION_ALGORITHM,
      }),
    });

    if (!result.cached) {
      const { recommendations } = result.value;
      this.events.publish("recommendations_generated", {
        user_id: input.user_id,
        recommendations_count: recommendations.length,
        recommendations: recommendations.slice(0, EVENT_SAMPLE_SIZE),
      });
    }
    return { body: result.value, cached: result.cached };
  }

  async analyzeSentiment(input: SentimentInput, context: RequestContext = {}): Promise<SentimentResponse> {
    await this.usage.record(USAGE_ENDPOINTS.sentiment, input.user_id ?? context.subject);
    const analysis = analyzeSentiment(input.text);
    return {
      text: input.text,
      ...analysis,
      language: input.language ?? "en",
      processed_at: this.clock.nowIso(),
    };
  }

  listModels(): ModelSummary[] {
    return this.models.list();
  }

  modelInfo(modelName: string): ModelInfo {
    return this.models.info(modelName);
  }
}
