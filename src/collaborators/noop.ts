import type { MetricsCollector } from './types.js';

/**
 * Metrics sink that keeps only the most recent snapshot. Default when the
 * host wires no exporter.
 */
export class NoopMetricsCollector<TSnapshot> implements MetricsCollector<TSnapshot> {
  private last: TSnapshot | null = null;

  async initialize(): Promise<void> {}

  async collect(snapshot: TSnapshot): Promise<void> {
    this.last = snapshot;
  }

  lastSnapshot(): TSnapshot | null {
    return this.last;
  }
}
