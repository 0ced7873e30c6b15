import { performance } from 'node:perf_hooks';

export const METRIC_PHASES = {
  LOAD: 'loadMs',
  RESOLVE: 'resolveMs',
  COMPOSE: 'composeMs',
  VALIDATE: 'validateMs',
  TEMPLATE: 'templateMs',
} as const;

export type MetricPhase = keyof typeof METRIC_PHASES;
type MetricsPhaseKey = (typeof METRIC_PHASES)[MetricPhase];

export interface MetricsSnapshot {
  loadMs: number;
  resolveMs: number;
  composeMs: number;
  validateMs: number;
  templateMs: number;
  compositionCacheHits: number;
  compositionCacheMisses: number;
  documentsValidated: number;
  violationsReported: number;
  templatesGenerated: number;
}

const DEFAULT_COUNTERS: MetricsSnapshot = {
  loadMs: 0,
  resolveMs: 0,
  composeMs: 0,
  validateMs: 0,
  templateMs: 0,
  compositionCacheHits: 0,
  compositionCacheMisses: 0,
  documentsValidated: 0,
  violationsReported: 0,
  templatesGenerated: 0,
};

export interface MetricsCollectorOptions {
  now?: () => number;
  enabled?: boolean;
}

export class MetricsCollector {
  private readonly now: () => number;
  private readonly enabled: boolean;
  private snapshot: MetricsSnapshot;

  constructor(options: MetricsCollectorOptions = {}) {
    this.now = options.now ?? (() => performance.now());
    this.enabled = options.enabled ?? true;
    this.snapshot = { ...DEFAULT_COUNTERS };
  }

  public isEnabled(): boolean {
    return this.enabled;
  }

  /** Run `fn` and add its wall time to `phase`, also when it throws */
  public time<T>(phase: MetricPhase, fn: () => T): T {
    if (!this.enabled) {
      return fn();
    }
    const startedAt = this.now();
    try {
      return fn();
    } finally {
      this.recordDuration(phase, this.now() - startedAt);
    }
  }

  public recordDuration(phase: MetricPhase, durationMs: number): void {
    if (!this.enabled) {
      return;
    }
    const key: MetricsPhaseKey = METRIC_PHASES[phase];
    this.snapshot[key] += Math.max(0, durationMs);
  }

  public recordCacheLookup(hit: boolean): void {
    if (!this.enabled) {
      return;
    }
    if (hit) {
      this.snapshot.compositionCacheHits += 1;
    } else {
      this.snapshot.compositionCacheMisses += 1;
    }
  }

  public recordValidation(violations: number): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.documentsValidated += 1;
    this.snapshot.violationsReported += violations;
  }

  public recordTemplate(): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.templatesGenerated += 1;
  }

  public snapshotMetrics(): MetricsSnapshot {
    return { ...this.snapshot };
  }

  public reset(): void {
    this.snapshot = { ...DEFAULT_COUNTERS };
  }
}
