/**
 * @fileoverview Orchestrator Module
 *
 * The lifecycle manager, its background supervisor, the cache-aside read
 * path and the knowledge pipelines.
 *
 * @example
 * ```typescript
 * import { KnowledgeOrchestrator, runWithOrchestrator } from 'knowledge-orchestrator';
 *
 * const orchestrator = new KnowledgeOrchestrator({ collaborators });
 * const hits = await runWithOrchestrator(orchestrator, (o) => o.queryKnowledge('graph edges'));
 * ```
 *
 * @packageDocumentation
 */

export {
  KnowledgeOrchestrator,
  runWithOrchestrator,
  SUBSYSTEM_INIT_ORDER,
  type KnowledgeOrchestratorOptions,
  type OrchestratorCollaborators,
  type OrchestratorState,
  type OrchestratorStatus,
  type InsightEnvelope,
  type SubsystemName,
} from './knowledge_orchestrator.js';

export {
  BackgroundSupervisor,
  type BackgroundSupervisorOptions,
  type BackgroundTaskHandle,
  type SupervisedTask,
  type SupervisorStopReport,
  type TaskSnapshot,
  type TaskState,
} from './supervisor.js';

export {
  METRICS_TASK,
  HEALTH_TASK,
  PERFORMANCE_TASK,
  createMaintenanceTasks,
  collectMetrics,
  monitorHealth,
  optimizePerformance,
  type MaintenanceContext,
  type IntegrationCounts,
} from './maintenance_loops.js';

export {
  CacheAsidePipeline,
  buildQueryCacheKey,
  buildKnowledgeCacheKey,
  type CacheAsideOptions,
  type CacheAsideResult,
} from './cache_aside.js';

export {
  DEFAULT_HOOKS,
  createEmptyInsights,
  resolveHooks,
  type AugmentedInsights,
  type OrchestratorHooks,
} from './hooks.js';

export { KnowledgeInputSchema, validateKnowledgeInput } from './knowledge_input.js';

export { createEmptySnapshot, copySnapshot, type MetricsSnapshot } from './metrics.js';
