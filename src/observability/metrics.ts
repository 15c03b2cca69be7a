import type { FastifyInstance } from "fastify";

export interface LatencySnapshot {
  count: number;
  avgMs: number;
  minMs: number;
  maxMs: number;
}

export interface MetricsSnapshot {
  request_latency: LatencySnapshot;
  query_latency: LatencySnapshot;
  extraction_latency: LatencySnapshot;
  stage_latency: Record<string, LatencySnapshot>;
  extraction_fallbacks: Record<string, number>;
  error_rates: Record<string, number>;
}

const round2 = (value: number): number => Math.round((value + Number.EPSILON) * 100) / 100;

class LatencyRecorder {
  private samples = 0;
  private sumMs = 0;
  private lowMs = Number.POSITIVE_INFINITY;
  private highMs = 0;

  observe(durationMs: number): void {
    // clock skew and NaN from a missing start time count as zero
    const sample = Number.isFinite(durationMs) && durationMs > 0 ? durationMs : 0;
    this.samples += 1;
    this.sumMs += sample;
    this.lowMs = Math.min(this.lowMs, sample);
    this.highMs = Math.max(this.highMs, sample);
  }

  snapshot(): LatencySnapshot {
    if (this.samples === 0) {
      return { count: 0, avgMs: 0, minMs: 0, maxMs: 0 };
    }
    return {
      count: this.samples,
      avgMs: round2(this.sumMs / this.samples),
      minMs: round2(this.lowMs),
      maxMs: round2(this.highMs)
    };
  }
}

class Registry {
  readonly request = new LatencyRecorder();
  readonly query = new LatencyRecorder();
  readonly extraction = new LatencyRecorder();
  readonly stages = new Map<string, LatencyRecorder>();
  readonly fallbacks = new Map<string, number>();
  readonly errors = new Map<string, number>();

  stage(name: string): LatencyRecorder {
    let recorder = this.stages.get(name);
    if (!recorder) {
      recorder = new LatencyRecorder();
      this.stages.set(name, recorder);
    }
    return recorder;
  }
}

const increment = (counters: Map<string, number>, key: string): void => {
  counters.set(key, (counters.get(key) ?? 0) + 1);
};

let registry = new Registry();

export const recordRequestLatency = (durationMs: number): void => registry.request.observe(durationMs);

export const recordQueryLatency = (durationMs: number): void => registry.query.observe(durationMs);

export const recordExtractionLatency = (durationMs: number): void => registry.extraction.observe(durationMs);

export const recordStageLatency = (stage: string, durationMs: number): void =>
  registry.stage(stage).observe(durationMs);

/** Keyed by fallback reason (`timeout`, `invalid_json`, ...). */
export const recordExtractionFallback = (reason: string): void => increment(registry.fallbacks, reason);

export const recordErrorRate = (key: string): void => increment(registry.errors, key);

export const getMetricsSnapshot = (): MetricsSnapshot => ({
  request_latency: registry.request.snapshot(),
  query_latency: registry.query.snapshot(),
  extraction_latency: registry.extraction.snapshot(),
  stage_latency: Object.fromEntries([...registry.stages].map(([stage, recorder]) => [stage, recorder.snapshot()])),
  extraction_fallbacks: Object.fromEntries(registry.fallbacks),
  error_rates: Object.fromEntries(registry.errors)
});

export const resetMetrics = (): void => {
  registry = new Registry();
};

export const registerMetricsRoutes = async (app: FastifyInstance): Promise<void> => {
  app.get("/metrics", async () => getMetricsSnapshot());
};

/**
 * Echoes the request id as `x-request-id`, records request latency and
 * counts every 4xx/5xx reply as `http_<status>`.
 */
export const registerRequestMetricsHooks = (app: FastifyInstance): void => {
  const startedAt = new WeakMap<object, number>();

  app.addHook("onRequest", async (request, reply) => {
    startedAt.set(request, performance.now());
    reply.header("x-request-id", request.id);
  });

  app.addHook("onResponse", async (request, reply) => {
    const start = startedAt.get(request);
    recordRequestLatency(start === undefined ? 0 : performance.now() - start);
    if (reply.statusCode >= 400) {
      recordErrorRate(`http_${reply.statusCode}`);
    }
  });
};
