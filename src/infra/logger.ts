import type { FastifyBaseLogger } from "fastify";

export type Logger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
