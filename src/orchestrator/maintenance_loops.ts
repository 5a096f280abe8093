/**
 * @fileoverview The three supervised maintenance loops
 *
 * - metrics_collection: refresh the snapshot and hand it to the collector
 * - health_monitoring: check health, escalate unhealthy results to the hook
 * - performance_optimization: run the optimizer, apply what it reports
 *
 * Each iteration body may throw; the supervisor isolates the failure.
 */

import type {
  ApiSurface,
  CachedKnowledge,
  CacheStore,
  DataProcessor,
  EmbeddingGenerator,
  GraphStore,
  HealthChecker,
  MetricsCollector,
  PerformanceOptimizer,
  SemanticSearch,
} from '../collaborators/types.js';
import type { OrchestratorConfig } from '../config/schema.js';
import { createEvent, type OrchestratorEventBus } from '../events.js';
import { logInfo, logWarning } from '../telemetry/logger.js';
import type { OrchestratorHooks } from './hooks.js';
import { copySnapshot, type MetricsSnapshot } from './metrics.js';
import type { SupervisedTask } from './supervisor.js';

export const METRICS_TASK = 'metrics_collection';
export const HEALTH_TASK = 'health_monitoring';
export const PERFORMANCE_TASK = 'performance_optimization';

export interface IntegrationCounts {
  providers: number;
  models: number;
}

export interface MaintenanceContext {
  graph: GraphStore;
  processor: DataProcessor;
  embeddings: EmbeddingGenerator;
  search: SemanticSearch;
  performance: PerformanceOptimizer;
  health: HealthChecker;
  api: ApiSurface;
  metricsCollector: MetricsCollector<MetricsSnapshot>;
  cache: () => CacheStore<CachedKnowledge>;
  /** The live snapshot; written field by field */
  snapshot: MetricsSnapshot;
  integrationCounts: () => IntegrationCounts;
  hooks: OrchestratorHooks;
  events: OrchestratorEventBus;
  config: OrchestratorConfig;
}

function secondsToMs(seconds: number): number {
  return Math.round(seconds * 1000);
}

export function createMaintenanceTasks(ctx: MaintenanceContext): SupervisedTask[] {
  return [
    {
      name: METRICS_TASK,
      intervalMs: () => secondsToMs(ctx.config.metrics.collectionIntervalSeconds),
      iterate: (signal) => collectMetrics(ctx, signal),
    },
    {
      name: HEALTH_TASK,
      intervalMs: () => secondsToMs(ctx.config.health.checkIntervalSeconds),
      iterate: () => monitorHealth(ctx),
    },
    {
      name: PERFORMANCE_TASK,
      intervalMs: () => secondsToMs(ctx.config.performance.optimizationIntervalSeconds),
      iterate: () => optimizePerformance(ctx),
    },
  ];
}

/**
 * One metrics cycle. Stops between subsystem groups once `signal` aborts,
 * leaving the snapshot partially refreshed.
 */
export async function collectMetrics(ctx: MaintenanceContext, signal?: AbortSignal): Promise<void> {
  const snapshot = ctx.snapshot;

  // Knowledge graph
  snapshot.totalNodes = await ctx.graph.nodeCount();
  snapshot.totalEdges = await ctx.graph.edgeCount();
  snapshot.graphComplexity = await ctx.graph.complexityScore();
  if (signal?.aborted) return;

  // Processing
  snapshot.processingTimeMs = await ctx.processor.averageProcessingTime();
  snapshot.embeddingsGenerated = await ctx.embeddings.totalEmbeddings();
  if (signal?.aborted) return;

  // Search
  snapshot.searchQueries = await ctx.search.totalQueries();
  snapshot.averageResponseTimeMs = await ctx.search.averageResponseTime();
  snapshot.cacheHitRate = await ctx.cache().hitRate();
  if (signal?.aborted) return;

  // Resources
  snapshot.memoryUsage = await ctx.performance.memoryUsage();
  snapshot.cpuUsage = await ctx.performance.cpuUsage();
  snapshot.gpuUsage = await ctx.performance.gpuUsage();
  if (signal?.aborted) return;

  // Integration
  const counts = ctx.integrationCounts();
  snapshot.providerConnections = counts.providers;
  snapshot.modelIntegrations = counts.models;
  snapshot.apiRequests = await ctx.api.totalRequests();

  snapshot.collectedAt = new Date();
  await ctx.metricsCollector.collect(copySnapshot(snapshot));
  await ctx.events.emit(createEvent('metrics_collected', {
    collectedAt: snapshot.collectedAt.toISOString(),
  }));
}

export async function monitorHealth(ctx: MaintenanceContext): Promise<void> {
  const status = await ctx.health.checkHealth();
  if (status.healthy) return;

  logWarning('[supervisor] Health check reported unhealthy', { detail: status.detail });
  await ctx.hooks.onHealthIssue(status);
  await ctx.events.emit(createEvent('health_degraded', { detail: status.detail }));
}

export async function optimizePerformance(ctx: MaintenanceContext): Promise<void> {
  const result = await ctx.performance.optimize();
  if (!result.optimized) return;

  logInfo('[supervisor] Performance optimization applied', { detail: result.detail });
  await ctx.hooks.applyOptimization(result);
  await ctx.events.emit(createEvent('optimization_applied', { detail: result.detail }));
}
