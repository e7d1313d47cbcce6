import cors from "@fastify/cors";
import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify";
import { ServiceContainer, type ContainerOverrides } from "./container.js";
import type { RequestContext } from "./application/inference-service.js";
import { AppError, UnauthorizedError } from "./infra/app-error.js";
import { loadRuntimeConfig, type RuntimeConfig } from "./infra/config.js";
import { verifyJwt } from "./infra/jwt.js";
import type { RateLimitDecision } from "./infra/rate-limiter.js";
import {
  assertModelName,
  assertPredictionInput,
  assertRecommendationInput,
  assertSentimentInput,
  normalizeModelName,
  normalizeTrendMetric,
  normalizeTrendPeriod,
  normalizeUsageDays,
  sanitizeEventPayload,
} from "./api/validators.js";

declare module "fastify" {
  interface FastifyRequest {
    startedAtNs?: bigint;
    /** `sub` of a verified bearer token. */
    subject?: string;
  }
}

const PUBLIC_PATHS = new Set(["/", "/health", "/health/ready", "/metrics"]);

function requestPath(url: string): string {
  return url.split("?")[0] ?? url;
}

function requireBearerToken(headers: Record<string, unknown>): string {
  const authorization = headers.authorization;
  if (typeof authorization !== "string" || !authorization.startsWith("Bearer ")) {
    throw new UnauthorizedError("missing_token", "Authorization header with Bearer token is required.");
  }
  const token = authorization.slice("Bearer ".length).trim();
  if (!token) {
    throw new UnauthorizedError("missing_token", "Authorization header with Bearer token is required.");
  }
  return token;
}

function setRateLimitHeaders(
  reply: { header(name: string, value: string): unknown },
  decision: RateLimitDecision,
): void {
  const limit = String(decision.limit);
  const remaining = String(decision.remaining);
  const reset = String(decision.resetSeconds);
  reply.header("RateLimit-Limit", limit);
  reply.header("RateLimit-Remaining", remaining);
  reply.header("RateLimit-Reset", reset);
  reply.header("X-RateLimit-Limit", limit);
  reply.header("X-RateLimit-Remaining", remaining);
  reply.header("X-RateLimit-Reset", reset);
}

function setCacheHeader(reply: { header(name: string, value: string): unknown }, cached: boolean): void {
  reply.header("X-Cache", cached ? "HIT" : "MISS");
}

/**
 * The signal aborts when the request outlives `timeoutMs` or the client goes
 * away before the response is written.
 */
function requestContext(request: FastifyRequest, reply: FastifyReply, timeoutMs: number): RequestContext {
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort();
  }, timeoutMs);
  timer.unref();
  reply.raw.once("finish", () => {
    clearTimeout(timer);
  });
  reply.raw.once("close", () => {
    clearTimeout(timer);
    if (!reply.raw.writableFinished) {
      controller.abort();
    }
  });
  return {
    signal: controller.signal,
    ...(request.subject ? { subject: request.subject } : {}),
  };
}

export function buildApp(
  config: RuntimeConfig = loadRuntimeConfig(),
  overrides: ContainerOverrides = {},
): FastifyInstance {
  const app = Fastify({
    logger: config.logLevel === "silent" ? false : { level: config.logLevel },
  });
  const container = new ServiceContainer(config, app.log, overrides);
  const { metrics, inference, analytics, models, cacheStore, rateLimiter, clock } = container;

  void app.register(cors, {
    origin: config.corsOrigins.includes("*") ? true : config.corsOrigins,
  });

  app.addHook("onReady", async () => {
    await container.open();
  });

  app.addHook("onClose", async () => {
    await container.close();
  });

  app.addHook("onRequest", async (request, reply) => {
    request.startedAtNs = process.hrtime.bigint();
    reply.header("X-Request-Id", request.id);
    if (request.method === "OPTIONS" || PUBLIC_PATHS.has(requestPath(request.url))) {
      return;
    }

    if (config.authEnabled) {
      const token = requireBearerToken(request.headers);
      const claims = verifyJwt(token, config.jwtSecret, Math.floor(clock.nowMs() / 1000));
      if (claims.sub) {
        request.subject = claims.sub;
      }
    }

    if (!config.rateLimitEnabled) {
      return;
    }
    const decision = await rateLimiter.consume(request.subject ?? request.ip);
    setRateLimitHeaders(reply, decision);
    if (!decision.allowed) {
      if (config.metricsEnabled) {
        metrics.recordRateLimitRejection(request.subject ? "subject" : "ip");
      }
      reply.header("Retry-After", String(decision.retryAfterSeconds));
      throw new AppError(429, "rate_limit_exceeded", "Rate limit exceeded. Retry later.");
    }
  });

  app.addHook("onResponse", async (request, reply) => {
    if (!config.metricsEnabled || request.startedAtNs === undefined) {
      return;
    }
    const durationSeconds = Number(process.hrtime.bigint() - request.startedAtNs) / 1_000_000_000;
    const route = request.routeOptions.url ?? "unmatched";
    metrics.recordHttpRequest(request.method, route, reply.statusCode, durationSeconds);
  });

  app.get("/", async (_request, reply) => {
    return reply.status(200).send({
      service: config.serviceName,
      version: config.serviceVersion,
      status: "running",
    });
  });

  app.get("/health", async (_request, reply) => {
    return reply.status(200).send({
      status: "healthy",
      service: config.serviceName,
      models_loaded: models.modelsLoaded,
    });
  });

  app.get("/health/ready", async (request, reply) => {
    let cacheReachable = true;
    try {
      await cacheStore.ping();
    } catch (error) {
      request.log.warn({ err: error }, "Readiness cache check failed");
      cacheReachable = false;
    }
    const ready = models.modelsLoaded && cacheReachable;
    return reply.status(ready ? 200 : 503).send({
      status: ready ? "ready" : "not_ready",
      checks: {
        models_loaded: models.modelsLoaded,
        cache: cacheReachable ? "reachable" : "unreachable",
      },
    });
  });

  app.post("/api/v1/ml/predict", async (request, reply) => {
    assertPredictionInput(request.body);
    const result = await inference.predict(request.body, requestContext(request, reply, config.requestTimeoutMs));
    setCacheHeader(reply, result.cached);
    return reply.status(200).send(result.body);
  });

  app.post("/api/v1/ml/recommend", async (request, reply) => {
    assertRecommendationInput(request.body);
    const result = await inference.recommend(request.body, requestContext(request, reply, config.requestTimeoutMs));
    setCacheHeader(reply, result.cached);
    return reply.status(200).send(result.body);
  });

  app.post("/api/v1/ml/sentiment", async (request, reply) => {
    assertSentimentInput(request.body);
    const body = await inference.analyzeSentiment(
      request.body,
      requestContext(request, reply, config.requestTimeoutMs),
    );
    return reply.status(200).send(body);
  });

  app.get("/api/v1/ml/models", async (_request, reply) => {
    return reply.status(200).send(inference.listModels());
  });

  app.get<{ Params: { modelName: string } }>("/api/v1/ml/models/:modelName/info", async (request, reply) => {
    const { modelName } = request.params;
    assertModelName(modelName);
    return reply.status(200).send(inference.modelInfo(modelName));
  });

  app.get<{ Querystring: { days?: string } }>("/api/v1/analytics/usage", async (request, reply) => {
    const days = normalizeUsageDays(request.query.days);
    return reply.status(200).send(await analytics.usageStatistics(days));
  });

  app.get("/api/v1/analytics/performance", async (_request, reply) => {
    return reply.status(200).send(await analytics.performance());
  });

  app.get<{ Querystring: { model_name?: string } }>(
    "/api/v1/analytics/models/performance",
    async (request, reply) => {
      const modelName = normalizeModelName(request.query.model_name);
      const body = modelName ? await analytics.modelPerformance(modelName) : await analytics.modelPerformance();
      return reply.status(200).send(body);
    },
  );

  app.get<{ Querystring: { metric?: string; period?: string } }>(
    "/api/v1/analytics/trends",
    async (request, reply) => {
      const metric = normalizeTrendMetric(request.query.metric);
      const period = normalizeTrendPeriod(request.query.period);
      return reply.status(200).send(await analytics.trends(metric, period));
    },
  );

  app.get("/api/v1/analytics/dashboard", async (_request, reply) => {
    return reply.status(200).send(await analytics.dashboard());
  });

  app.post("/api/v1/analytics/events/track", async (request, reply) => {
    const payload = sanitizeEventPayload(request.body);
    return reply.status(200).send(await analytics.trackEvent(payload));
  });

  app.get("/api/v1/analytics/health-check", async (_request, reply) => {
    return reply.status(200).send(await analytics.healthCheck());
  });

  if (config.metricsEnabled) {
    app.get("/metrics", async (_request, reply) => {
      const payload = metrics.renderPrometheus();
      return reply
        .header("Content-Type", "text/plain; version=0.0.4; charset=utf-8")
        .status(200)
        .send(payload);
    });
  }

  app.setNotFoundHandler(async (request, reply) => {
    return reply.status(404).send({
      error: {
        code: "resource_not_found",
        category: "not_found",
        message: "Route not found.",
        request_id: request.id,
      },
    });
  });

  app.setErrorHandler(async (error, request, reply) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error.cause ?? error, code: error.code }, error.message);
      }
      return reply.status(error.statusCode).send({
        error: {
          code: error.code,
          category: error.category,
          message: error.message,
          request_id: request.id,
        },
      });
    }
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: {
          code: "invalid_request_body",
          category: "validation",
          message: error.message,
          request_id: request.id,
        },
      });
    }
    request.log.error({ err: error }, "Unhandled error");
    return reply.status(500).send({
      error: {
        code: "internal_server_error",
        category: "internal",
        message: "Unexpected error.",
        request_id: request.id,
      },
    });
  });

  return app;
}
