type LabelSet = Record<string, string>;

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/\n/g, "\\n").replace(/"/g, '\\"');
}

function buildLabelKey(labelNames: string[], labels: LabelSet): string {
  return labelNames.map((name) => `${name}=${labels[name] ?? ""}`).join("|");
}

function parseLabelKey(labelNames: string[], key: string): LabelSet {
  const parts = key.split("|");
  const labels: LabelSet = {};
  for (const [index, name] of labelNames.entries()) {
    const value = parts[index];
    labels[name] = value ? value.slice(name.length + 1) : "";
  }
  return labels;
}

function formatLabels(labels: LabelSet): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) {
    return "";
  }
  const inner = entries.map(([name, value]) => `${name}="${escapeLabelValue(value)}"`).join(",");
  return `{${inner}}`;
}

class CounterMetric {
  private readonly values = new Map<string, number>();

  constructor(
    private readonly name: string,
    private readonly help: string,
    private readonly labelNames: string[],
  ) {}

  inc(labels: LabelSet, value = 1): void {
    const key = buildLabelKey(this.labelNames, labels);
    const current = this.values.get(key) ?? 0;
    this.values.set(key, current + value);
  }

  /** Sum over every series whose labels satisfy `predicate`. */
  sum(predicate: (labels: LabelSet) => boolean = () => true): number {
    let total = 0;
    for (const [key, value] of this.values.entries()) {
      if (predicate(parseLabelKey(this.labelNames, key))) {
        total += value;
      }
    }
    return total;
  }

  render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} counter`];
    for (const [key, value] of this.values.entries()) {
      const labels = parseLabelKey(this.labelNames, key);
      lines.push(`${this.name}${formatLabels(labels)} ${value}`);
    }
    return lines;
  }
}

class HistogramMetric {
  private readonly values = new Map<string, { count: number; sum: number; buckets: number[] }>();

  constructor(
    private readonly name: string,
    private readonly help: string,
    private readonly labelNames: string[],
    private readonly buckets: number[],
  ) {}

  observe(labels: LabelSet, value: number): void {
    const key = buildLabelKey(this.labelNames, labels);
    const current =
      this.values.get(key) ?? {
        count: 0,
        sum: 0,
        buckets: this.buckets.map(() => 0),
      };
    current.count += 1;
    current.sum += value;
    for (const [index, bucket] of this.buckets.entries()) {
      if (value <= bucket) {
        current.buckets[index] = (current.buckets[index] ?? 0) + 1;
      }
    }
    this.values.set(key, current);
  }

  totals(): { count: number; sum: number } {
    let count = 0;
    let sum = 0;
    for (const stats of this.values.values()) {
      count += stats.count;
      sum += stats.sum;
    }
    return { count, sum };
  }

  render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} histogram`];
    for (const [key, stats] of this.values.entries()) {
      const baseLabels = parseLabelKey(this.labelNames, key);
      for (const [index, bucket] of this.buckets.entries()) {
        lines.push(
          `${this.name}_bucket${formatLabels({ ...baseLabels, le: String(bucket) })} ${stats.buckets[index] ?? 0}`,
        );
      }
      lines.push(`${this.name}_bucket${formatLabels({ ...baseLabels, le: "+Inf" })} ${stats.count}`);
      lines.push(`${this.name}_sum${formatLabels(baseLabels)} ${stats.sum}`);
      lines.push(`${this.name}_count${formatLabels(baseLabels)} ${stats.count}`);
    }
    return lines;
  }
}

export type CacheLookupOutcome = "hit" | "miss" | "error";
export type EventOutcome = "published" | "failed" | "dropped";

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export class ServiceMetricsRegistry {
  private readonly httpRequests = new CounterMetric(
    "aiml_http_requests_total",
    "Total number of HTTP requests handled by route, method, and status code.",
    ["method", "route", "status_code"],
  );
  private readonly httpDuration = new HistogramMetric(
    "aiml_http_request_duration_seconds",
    "HTTP request duration in seconds by route and method.",
    ["method", "route"],
    [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
  );
  private readonly rateLimitRejections = new CounterMetric(
    "aiml_http_rate_limited_total",
    "Total number of HTTP requests rejected by rate limiting.",
    ["scope"],
  );
  private readonly cacheLookups = new CounterMetric(
    "aiml_cache_lookups_total",
    "Cache-aside lookups by operation and outcome.",
    ["operation", "outcome"],
  );
  private readonly cacheWriteFailures = new CounterMetric(
    "aiml_cache_write_failures_total",
    "Computed results that could not be written to the cache store.",
    ["operation"],
  );
  private readonly events = new CounterMetric(
    "aiml_background_events_total",
    "Background events by type and delivery outcome.",
    ["event_type", "outcome"],
  );
  private readonly usageFailures = new CounterMetric(
    "aiml_usage_tracking_failures_total",
    "Usage accounting increments that failed and were skipped.",
    ["endpoint"],
  );

  recordHttpRequest(method: string, route: string, statusCode: number, durationSeconds: number): void {
    this.httpRequests.inc({
      method: method.toUpperCase(),
      route,
      status_code: String(statusCode),
    });
    this.httpDuration.observe(
      {
        method: method.toUpperCase(),
        route,
      },
      durationSeconds,
    );
  }

  recordRateLimitRejection(scope: string): void {
    this.rateLimitRejections.inc({ scope });
  }

  recordCacheLookup(operation: string, outcome: CacheLookupOutcome): void {
    this.cacheLookups.inc({ operation, outcome });
  }

  recordCacheWriteFailure(operation: string): void {
    this.cacheWriteFailures.inc({ operation });
  }

  recordEventOutcome(eventType: string, outcome: EventOutcome): void {
    this.events.inc({ event_type: eventType, outcome });
  }

  recordUsageTrackingFailure(endpoint: string): void {
    this.usageFailures.inc({ endpoint });
  }

  eventCount(outcome: EventOutcome): number {
    return this.events.sum((labels) => labels.outcome === outcome);
  }

  /** Hits over hit+miss lookups; 0 before the first lookup. */
  cacheHitRate(): number {
    const hits = this.cacheLookups.sum((labels) => labels.outcome === "hit");
    const lookups = this.cacheLookups.sum((labels) => labels.outcome === "hit" || labels.outcome === "miss");
    return lookups === 0 ? 0 : roundTo(hits / lookups, 4);
  }

  averageResponseTimeMs(): number {
    const { count, sum } = this.httpDuration.totals();
    return count === 0 ? 0 : roundTo((sum / count) * 1000, 3);
  }

  errorRate(): number {
    const total = this.httpRequests.sum();
    const errors = this.httpRequests.sum((labels) => (labels.status_code ?? "").startsWith("5"));
    return total === 0 ? 0 : roundTo(errors / total, 4);
  }

  renderPrometheus(): string {
    const lines = [
      ...this.httpRequests.render(),
      ...this.httpDuration.render(),
      ...this.rateLimitRejections.render(),
      ...this.cacheLookups.render(),
      ...this.cacheWriteFailures.render(),
      ...this.events.render(),
      ...this.usageFailures.render(),
    ];
    return `${lines.join("\n")}\n`;
  }
}
