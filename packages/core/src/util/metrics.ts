export type MetricsVerbosity = 'runtime' | 'ci';

export interface ContextMetricsSnapshot {
  instancesRegistered: number;
  instancesDropped: number;
  pooledPicks: number;
  fallbackPicks: number;
  framesPushed: number;
  maxDepthObserved: number;
  depthTruncations: number;
  // Per-type pool occupancy, keyed by printable type name (ci verbosity only)
  poolSizes?: Record<string, number>;
}

const DEFAULT_COUNTERS: ContextMetricsSnapshot = {
  instancesRegistered: 0,
  instancesDropped: 0,
  pooledPicks: 0,
  fallbackPicks: 0,
  framesPushed: 0,
  maxDepthObserved: 0,
  depthTruncations: 0,
};

export interface ContextMetricsOptions {
  verbosity?: MetricsVerbosity;
  enabled?: boolean;
}

export class ContextMetrics {
  private readonly enabled: boolean;
  private snapshot: ContextMetricsSnapshot;
  private verbosity: MetricsVerbosity;

  constructor(options: ContextMetricsOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.verbosity = options.verbosity ?? 'runtime';
    this.snapshot = { ...DEFAULT_COUNTERS };
  }

  public setVerbosity(mode: MetricsVerbosity): void {
    this.verbosity = mode;
  }

  public isEnabled(): boolean {
    return this.enabled;
  }

  public recordRegistration(accepted: boolean): void {
    if (!this.enabled) {
      return;
    }
    if (accepted) {
      this.snapshot.instancesRegistered += 1;
    } else {
      this.snapshot.instancesDropped += 1;
    }
  }

  public recordPick(fallback: boolean): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.pooledPicks += 1;
    if (fallback) {
      this.snapshot.fallbackPicks += 1;
    }
  }

  public recordPush(depth: number): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.framesPushed += 1;
    this.snapshot.maxDepthObserved = Math.max(
      this.snapshot.maxDepthObserved,
      depth
    );
  }

  public recordTruncation(): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.depthTruncations += 1;
  }

  public trackPoolSize(typeName: string, size: number): void {
    if (!this.enabled) {
      return;
    }
    const sizes = (this.snapshot.poolSizes ??= {});
    sizes[typeName] = size;
  }

  public snapshotMetrics(
    options: { verbosity?: MetricsVerbosity } = {}
  ): Readonly<ContextMetricsSnapshot> {
    const mode = options.verbosity ?? this.verbosity;
    const copy: ContextMetricsSnapshot = { ...this.snapshot };

    if (mode === 'runtime') {
      delete copy.poolSizes;
    } else if (copy.poolSizes) {
      copy.poolSizes = { ...copy.poolSizes };
    }

    return Object.freeze(copy);
  }
}
