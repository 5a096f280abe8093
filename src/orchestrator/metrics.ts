/**
 * Operational counters and gauges for one orchestrator.
 *
 * The metrics loop refreshes fields one at a time across several awaits, so
 * a reader may observe fields from two adjacent cycles. No cross-field
 * consistency is promised.
 */
export interface MetricsSnapshot {
  // Knowledge graph
  totalNodes: number;
  totalEdges: number;
  graphComplexity: number;

  // Processing
  processedDocuments: number;
  /** Average processing time, milliseconds */
  processingTimeMs: number;
  embeddingsGenerated: number;

  // Search
  searchQueries: number;
  averageResponseTimeMs: number;
  cacheHitRate: number;

  // Resources
  memoryUsage: number;
  cpuUsage: number;
  gpuUsage: number;

  // Integration
  providerConnections: number;
  modelIntegrations: number;
  apiRequests: number;

  /** End of the last completed collection cycle */
  collectedAt: Date | null;
}

export function createEmptySnapshot(): MetricsSnapshot {
  return {
    totalNodes: 0,
    totalEdges: 0,
    graphComplexity: 0,
    processedDocuments: 0,
    processingTimeMs: 0,
    embeddingsGenerated: 0,
    searchQueries: 0,
    averageResponseTimeMs: 0,
    cacheHitRate: 0,
    memoryUsage: 0,
    cpuUsage: 0,
    gpuUsage: 0,
    providerConnections: 0,
    modelIntegrations: 0,
    apiRequests: 0,
    collectedAt: null,
  };
}

export function copySnapshot(snapshot: MetricsSnapshot): MetricsSnapshot {
  return { ...snapshot };
}
