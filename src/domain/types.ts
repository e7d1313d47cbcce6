export type ModelName = "classification" | "regression" | "recommendation" | "sentiment";
export type ModelType = "classification" | "regression" | "recommendation" | "nlp";

export type JsonObject = Record<string, unknown>;

export interface PredictionInput {
  model_name: string;
  features: number[];
  user_id?: string;
  context?: JsonObject;
}

export interface ModelOutput {
  prediction: unknown;
  confidence: number;
  model_version: string;
  features_used: number;
}

export interface PredictionResponse {
  prediction: unknown;
  confidence: number;
  model_version: string;
  processing_time_ms: number;
  timestamp: string;
}

export interface RecommendationFilters {
  min_score?: number;
  exclude_item_ids?: string[];
}

export interface RecommendationInput {
  user_id: string;
  item_type: string;
  num_recommendations?: number;
  filters?: RecommendationFilters;
}

export interface RecommendationItem {
  item_id: string;
  title: string;
  score: number;
  category: string;
  reason: string;
}

export interface RecommendationResponse {
  user_id: string;
  recommendations: RecommendationItem[];
  generated_at: string;
  algorithm: string;
}

export type SentimentLabel = "positive" | "negative" | "neutral";

export interface EmotionScores {
  joy: number;
  sadness: number;
  anger: number;
  fear: number;
}

export interface SentimentAnalysis {
  sentiment: SentimentLabel;
  confidence: number;
  emotions: EmotionScores;
}

export interface SentimentInput {
  text: string;
  language?: string;
  user_id?: string;
}

export interface SentimentResponse extends SentimentAnalysis {
  text: string;
  language: string;
  processed_at: string;
}

export interface ModelSummary {
  name: ModelName;
  type: ModelType;
  version: string;
  status: "active";
  last_updated: string;
}

export interface ModelPerformanceStats {
  model_name: string;
  accuracy: number;
  precision: number;
  recall: number;
  f1_score: number;
  inference_time_ms: number;
  total_predictions: number;
}

export interface ModelInfo {
  name: ModelName;
  type: ModelType;
  version: string;
  description: string;
  input_features: string[];
  expected_feature_count: number | null;
  output_format: string;
  performance_metrics: {
    accuracy: number;
    precision: number;
    recall: number;
  };
  created_at: string;
  last_updated: string;
}

/** Immutable once built; handed to the event emitter on publish. */
export interface ServiceEvent {
  readonly id: string;
  readonly event_type: string;
  readonly timestamp: string;
  readonly service: string;
  readonly data: Readonly<JsonObject>;
}

export interface UsageStats {
  endpoint: string;
  request_count: number;
  window_request_count: number;
  average_daily_usage: number;
}

export type TrendMetric = "requests" | "predictions" | "recommendations" | "sentiment";
export type TrendPeriod = "7d" | "30d";

export interface TrendPoint {
  date: string;
  value: number;
  metric: TrendMetric;
}

export type HealthStatus = "healthy" | "degraded" | "unhealthy";
