/**
 * @fileoverview Knowledge Orchestrator
 *
 * Lifecycle manager and request pipelines for the knowledge-graph platform.
 *
 * Lifecycle:
 * - `initialize()` tunes the config for the host (optional), initializes
 *   every collaborator in SUBSYSTEM_INIT_ORDER, integrates configured
 *   providers, and starts the background supervisor
 * - `startTransport()` flips `running`, activates the maintenance loops and
 *   starts the transport
 * - `stopTransport()` clears `running`, joins the loops, stops the transport
 *
 * Pipelines (`addKnowledge`, `queryKnowledge`, `getInsights`) require a
 * successful `initialize()` and may run concurrently with each other and
 * with the loops.
 *
 * @example
 * ```typescript
 * const orchestrator = new KnowledgeOrchestrator({
 *   config: await loadConfig({ configPath: 'orchestrator.yaml' }),
 *   collaborators,
 * });
 *
 * if (await orchestrator.initialize()) {
 *   await orchestrator.startTransport();
 *   const ids = await orchestrator.addKnowledge({ kind: 'text', text: 'Graphs have edges.' });
 *   const hits = await orchestrator.queryKnowledge('edges', { source: 'docs' }, 5);
 * }
 * ```
 *
 * @packageDocumentation
 */

import { MemoryCacheStore } from '../collaborators/memory_cache.js';
import { NoopMetricsCollector } from '../collaborators/noop.js';
import type {
  ApiSurface,
  CachedKnowledge,
  CacheStore,
  DataProcessor,
  EmbeddingGenerator,
  GraphInsights,
  GraphStore,
  HealthChecker,
  HealthStatus,
  IntegrationOrchestrator,
  Integration,
  KnowledgeInput,
  Metadata,
  MetricsCollector,
  PerformanceOptimizer,
  SearchFilters,
  SearchResult,
  SemanticSearch,
  Subsystem,
  Transport,
} from '../collaborators/types.js';
import {
  applyHostConfigPatch,
  detectHostProfile,
  optimizeConfigForHost,
  type HostProfileDetector,
} from '../config/host_profile.js';
import {
  parseConfig,
  type OrchestratorConfig,
  type OrchestratorConfigInput,
} from '../config/schema.js';
import { Errors, InitializationError, PreconditionError } from '../core/errors.js';
import { createEvent, OrchestratorEventBus } from '../events.js';
import { logDebug, logError, logInfo, logWarning, setLogLevel } from '../telemetry/logger.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import {
  buildKnowledgeCacheKey,
  buildQueryCacheKey,
  CacheAsidePipeline,
} from './cache_aside.js';
import { resolveHooks, type AugmentedInsights, type OrchestratorHooks } from './hooks.js';
import { validateKnowledgeInput, validateSearchFilters } from './knowledge_input.js';
import { createMaintenanceTasks, type IntegrationCounts } from './maintenance_loops.js';
import { copySnapshot, createEmptySnapshot, type MetricsSnapshot } from './metrics.js';
import { BackgroundSupervisor, type TaskSnapshot } from './supervisor.js';

// ============================================================================
// PUBLIC TYPES
// ============================================================================

export interface OrchestratorCollaborators {
  graph: GraphStore;
  processor: DataProcessor;
  embeddings: EmbeddingGenerator;
  search: SemanticSearch;
  integration: IntegrationOrchestrator;
  performance: PerformanceOptimizer;
  /** Defaults to an in-process LRU sized from `config.cache` after host tuning */
  cache?: CacheStore<CachedKnowledge>;
  /** Defaults to a collector that only keeps the last snapshot */
  metrics?: MetricsCollector<MetricsSnapshot>;
  health: HealthChecker;
  api: ApiSurface;
  transport: Transport;
}

export interface KnowledgeOrchestratorOptions {
  collaborators: OrchestratorCollaborators;
  config?: OrchestratorConfigInput;
  hooks?: Partial<OrchestratorHooks>;
  /** Host detection used when `config.dynamicConfig` is on */
  detectHost?: HostProfileDetector;
  /** Supply a bus to observe events; otherwise one is created per instance */
  events?: OrchestratorEventBus;
}

export interface OrchestratorState {
  initialized: boolean;
  running: boolean;
  startTime: Date | null;
}

export interface InsightEnvelope {
  graphInsights: GraphInsights;
  augmented: AugmentedInsights;
  analysisType: string;
  parameters: Record<string, unknown>;
  timestamp: Date;
}

export interface OrchestratorStatus {
  initialized: boolean;
  running: boolean;
  metrics: MetricsSnapshot;
  health: HealthStatus;
  performance: Record<string, unknown>;
  tasks: TaskSnapshot[];
  config: OrchestratorConfig;
  uptimeMs: number;
}

/** Collaborator initialization order. */
export const SUBSYSTEM_INIT_ORDER = [
  'graph',
  'processor',
  'embeddings',
  'search',
  'integration',
  'performance',
  'cache',
  'metrics',
  'health',
  'api',
  'transport',
] as const;

export type SubsystemName = (typeof SUBSYSTEM_INIT_ORDER)[number];

function isSearchResults(value: CachedKnowledge): value is SearchResult[] {
  return Array.isArray(value);
}

// ============================================================================
// ORCHESTRATOR
// ============================================================================

export class KnowledgeOrchestrator {
  readonly events: OrchestratorEventBus;

  private readonly config: OrchestratorConfig;
  private readonly collaborators: OrchestratorCollaborators;
  private readonly metricsCollector: MetricsCollector<MetricsSnapshot>;
  private readonly hooks: OrchestratorHooks;
  private readonly detectHost: HostProfileDetector;
  private readonly supervisor: BackgroundSupervisor;
  private readonly state: OrchestratorState = { initialized: false, running: false, startTime: null };
  private readonly metrics: MetricsSnapshot = createEmptySnapshot();
  private readonly providers = new Map<string, Integration>();
  private readonly models = new Map<string, Integration>();
  private cache: CacheStore<CachedKnowledge> | null;
  private cacheAside: CacheAsidePipeline<CachedKnowledge> | null = null;
  private initializing: Promise<boolean> | null = null;
  private transportQueue: Promise<void> = Promise.resolve();

  constructor(options: KnowledgeOrchestratorOptions) {
    this.config = parseConfig(options.config ?? {});
    this.collaborators = options.collaborators;
    this.cache = options.collaborators.cache ?? null;
    this.metricsCollector = options.collaborators.metrics ?? new NoopMetricsCollector<MetricsSnapshot>();
    this.hooks = resolveHooks(options.hooks);
    this.detectHost = options.detectHost ?? (() => detectHostProfile());
    this.events = options.events ?? new OrchestratorEventBus();

    // The logger level is process-wide; only an explicit setting moves it.
    const level = this.config.logging.level;
    if (level) {
      setLogLevel(level);
    }

    this.supervisor = new BackgroundSupervisor({
      isRunning: () => this.state.running,
      tasks: createMaintenanceTasks({
        graph: this.collaborators.graph,
        processor: this.collaborators.processor,
        embeddings: this.collaborators.embeddings,
        search: this.collaborators.search,
        performance: this.collaborators.performance,
        health: this.collaborators.health,
        api: this.collaborators.api,
        metricsCollector: this.metricsCollector,
        cache: () => this.ensureCache(),
        snapshot: this.metrics,
        integrationCounts: () => this.integrationCounts(),
        hooks: this.hooks,
        events: this.events,
        config: this.config,
      }),
    });
  }

  // ============================================================================
  // LIFECYCLE
  // ============================================================================

  /**
   * Bring every subsystem up. Resolves `true` immediately when already
   * initialized; callers arriving mid-initialization share one attempt.
   * Resolves `false` (never rejects) when a subsystem fails; state then stays
   * uninitialized and a later call re-runs the whole sequence.
   */
  async initialize(): Promise<boolean> {
    if (this.state.initialized) return true;
    if (this.initializing) return this.initializing;

    this.initializing = this.runInitialization().finally(() => {
      this.initializing = null;
    });
    return this.initializing;
  }

  /**
   * Start and stop calls run one at a time, in call order.
   *
   * @throws PreconditionError before a successful `initialize()`
   */
  async startTransport(host?: string, port?: number): Promise<void> {
    return this.serializeTransport(() => this.runStartTransport(host, port));
  }

  /**
   * Stop the loops, then the transport. Never rejects: task and transport
   * failures are logged.
   */
  async stopTransport(): Promise<void> {
    return this.serializeTransport(() => this.runStopTransport());
  }

  /**
   * Stop everything this instance started. Safe to call in any state.
   */
  async shutdown(): Promise<void> {
    return this.serializeTransport(async () => {
      if (this.state.running) {
        await this.runStopTransport();
        return;
      }
      await this.supervisor.stopAll();
    });
  }

  private async runStartTransport(host?: string, port?: number): Promise<void> {
    if (!this.state.initialized) {
      throw Errors.notInitialized('start transport');
    }
    if (this.state.running) {
      logWarning('[orchestrator] Transport already running');
      return;
    }

    const resolvedHost = host ?? this.config.host;
    const resolvedPort = port ?? this.config.port;

    // A previous stop leaves the supervisor empty.
    this.supervisor.start();
    this.state.running = true;
    this.supervisor.activate();

    try {
      await this.collaborators.transport.start(resolvedHost, resolvedPort);
    } catch (error) {
      logError('[orchestrator] Failed to start transport', {
        host: resolvedHost,
        port: resolvedPort,
        error: getErrorMessage(error),
      });
      this.state.running = false;
      await this.supervisor.stopAll();
      throw error;
    }

    logInfo('[orchestrator] Transport started', { host: resolvedHost, port: resolvedPort });
    await this.events.emit(createEvent('transport_started', { host: resolvedHost, port: resolvedPort }));
  }

  private async runStopTransport(): Promise<void> {
    this.state.running = false;

    const report = await this.supervisor.stopAll();
    for (const failure of report.errors) {
      logWarning('[orchestrator] Background task ended with error', failure);
    }

    try {
      await this.collaborators.transport.stop();
      logInfo('[orchestrator] Transport stopped');
    } catch (error) {
      logError('[orchestrator] Failed to stop transport', { error: getErrorMessage(error) });
    }

    await this.events.emit(createEvent('transport_stopped', { stoppedTasks: report.stopped }));
  }

  private serializeTransport(operation: () => Promise<void>): Promise<void> {
    const next = this.transportQueue.then(operation);
    // The caller sees a failure; the queue only needs to know it settled.
    this.transportQueue = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }

  // ============================================================================
  // KNOWLEDGE PIPELINES
  // ============================================================================

  /**
   * process → embed → add to graph → cache under node ids.
   *
   * Not atomic: when a later stage fails, nodes already added stay added.
   *
   * @returns ids of the created graph nodes
   */
  async addKnowledge(input: KnowledgeInput, metadata: Metadata = {}): Promise<string[]> {
    const cacheAside = this.requireReady('add knowledge');
    const validated = validateKnowledgeInput(input);

    try {
      const processed = await this.collaborators.processor.process(validated, metadata);
      const embeddings = await this.collaborators.embeddings.generateEmbeddings(processed);
      const nodeIds = await this.collaborators.graph.addNodes(processed, embeddings);

      await cacheAside.populate(nodeIds.map(buildKnowledgeCacheKey), processed);
      this.metrics.processedDocuments += 1;

      logInfo('[orchestrator] Added knowledge nodes', { count: nodeIds.length, kind: validated.kind });
      await this.events.emit(createEvent('knowledge_added', { nodeIds, kind: validated.kind }));
      return nodeIds;
    } catch (error) {
      logError('[orchestrator] Failed to add knowledge', {
        kind: validated.kind,
        error: getErrorMessage(error),
      });
      throw error;
    }
  }

  /**
   * Semantic search behind the cache. `searchQueries` counts searches run
   * against the search collaborator, so cache hits do not move it.
   *
   * @throws ValidationError when a filter is not JSON data
   */
  async queryKnowledge(query: string, filters: SearchFilters = {}, limit?: number): Promise<SearchResult[]> {
    const cacheAside = this.requireReady('query knowledge');

    try {
      const validFilters = validateSearchFilters(filters);
      const key = buildQueryCacheKey(query, validFilters, limit);
      const { value, hit } = await cacheAside.lookupOrCompute(
        key,
        () => this.collaborators.search.semanticSearch(query, validFilters, limit),
        isSearchResults,
      );

      if (!hit) {
        this.metrics.searchQueries += 1;
      }
      logDebug('[orchestrator] Knowledge query served', { query, cacheHit: hit, results: value.length });
      await this.events.emit(createEvent('knowledge_queried', { query, cacheHit: hit, results: value.length }));
      return value;
    } catch (error) {
      logError('[orchestrator] Failed to query knowledge', { query, error: getErrorMessage(error) });
      throw error;
    }
  }

  async getInsights(analysisType: string, parameters: Record<string, unknown> = {}): Promise<InsightEnvelope> {
    this.requireReady('generate insights');

    try {
      const graphInsights = await this.collaborators.graph.analyze(analysisType, parameters);
      const augmented = await this.hooks.generateInsights(graphInsights, analysisType);

      logInfo('[orchestrator] Generated insights', { analysisType });
      return {
        graphInsights,
        augmented,
        analysisType,
        parameters,
        timestamp: new Date(),
      };
    } catch (error) {
      logError('[orchestrator] Failed to generate insights', { analysisType, error: getErrorMessage(error) });
      throw error;
    }
  }

  // ============================================================================
  // PROVIDER AND MODEL INTEGRATION
  // ============================================================================

  /**
   * @returns false when the collaborator declines or fails; never rejects
   */
  async integrateProvider(providerName: string, providerConfig: Record<string, unknown> = {}): Promise<boolean> {
    try {
      const integration = await this.collaborators.integration.integrateProvider(providerName, providerConfig);
      if (!integration) {
        return false;
      }

      await this.hooks.configureProviderIntegration(providerName, integration);
      this.providers.set(providerName, integration);

      logInfo('[orchestrator] Integrated provider', { provider: providerName });
      await this.events.emit(createEvent('integration_added', { provider: providerName }));
      return true;
    } catch (error) {
      logError('[orchestrator] Failed to integrate provider', {
        provider: providerName,
        error: getErrorMessage(error),
      });
      return false;
    }
  }

  /**
   * @returns false when the collaborator declines or fails; never rejects
   */
  async integrateModel(
    providerName: string,
    modelName: string,
    modelConfig: Record<string, unknown> = {}
  ): Promise<boolean> {
    const modelKey = `${providerName}/${modelName}`;
    try {
      const integration = await this.collaborators.integration.integrateModel(providerName, modelName, modelConfig);
      if (!integration) {
        return false;
      }

      await this.hooks.configureModelIntegration(providerName, modelName, integration);
      this.models.set(modelKey, integration);

      logInfo('[orchestrator] Integrated model', { model: modelKey });
      await this.events.emit(createEvent('integration_added', { provider: providerName, model: modelName }));
      return true;
    } catch (error) {
      logError('[orchestrator] Failed to integrate model', { model: modelKey, error: getErrorMessage(error) });
      return false;
    }
  }

  // ============================================================================
  // STATUS
  // ============================================================================

  getMetrics(): MetricsSnapshot {
    return copySnapshot(this.metrics);
  }

  getState(): OrchestratorState {
    return { ...this.state };
  }

  getConfig(): OrchestratorConfig {
    return structuredClone(this.config);
  }

  /**
   * Health and performance check failures are reported inside the status
   * rather than thrown.
   */
  async getStatus(): Promise<OrchestratorStatus> {
    const [health, performance] = await Promise.all([this.readHealth(), this.readPerformance()]);

    return {
      initialized: this.state.initialized,
      running: this.state.running,
      metrics: copySnapshot(this.metrics),
      health,
      performance,
      tasks: this.supervisor.getTaskStates(),
      config: this.getConfig(),
      uptimeMs: this.state.startTime ? Date.now() - this.state.startTime.getTime() : 0,
    };
  }

  // ============================================================================
  // INTERNALS
  // ============================================================================

  private async runInitialization(): Promise<boolean> {
    const startedAt = Date.now();
    logInfo('[orchestrator] Initializing subsystems', { dynamicConfig: this.config.dynamicConfig });

    try {
      if (this.config.dynamicConfig) {
        await this.applyHostOptimization();
      }

      const cache = this.ensureCache();
      for (const [name, subsystem] of this.initSequence(cache)) {
        try {
          await subsystem.initialize(this.getConfig());
        } catch (error) {
          throw new InitializationError(name, toError(error));
        }
        logDebug('[orchestrator] Subsystem initialized', { subsystem: name });
      }

      this.cacheAside = new CacheAsidePipeline(cache, { enabled: this.config.cache.enabled });
      await this.integrateConfiguredProviders();
      this.supervisor.start();

      this.state.startTime = new Date();
      this.state.initialized = true;
    } catch (error) {
      this.cacheAside = null;
      logError('[orchestrator] Initialization failed', {
        error: getErrorMessage(error),
        subsystem: error instanceof InitializationError ? error.subsystem : undefined,
      });
      await this.events.emit(createEvent('orchestrator_initialization_failed', {
        error: getErrorMessage(error),
      }));
      return false;
    }

    const durationMs = Date.now() - startedAt;
    logInfo('[orchestrator] Initialized', { durationMs });
    await this.events.emit(createEvent('orchestrator_initialized', { durationMs }));
    return true;
  }

  private initSequence(cache: CacheStore<CachedKnowledge>): Array<[SubsystemName, Subsystem]> {
    const c = this.collaborators;
    const byName: Record<SubsystemName, Subsystem> = {
      graph: c.graph,
      processor: c.processor,
      embeddings: c.embeddings,
      search: c.search,
      integration: c.integration,
      performance: c.performance,
      cache,
      metrics: this.metricsCollector,
      health: c.health,
      api: c.api,
      transport: c.transport,
    };
    return SUBSYSTEM_INIT_ORDER.map((name): [SubsystemName, Subsystem] => [name, byName[name]]);
  }

  /**
   * Failure here is non-fatal: the config is left as it was.
   */
  private async applyHostOptimization(): Promise<void> {
    try {
      const profile = this.detectHost();
      const patch = optimizeConfigForHost(profile);
      applyHostConfigPatch(this.config, patch);

      logInfo('[orchestrator] Applied host-aware optimization', {
        platform: profile.platform,
        cpuCores: profile.cpuCores,
        freeMemoryGB: Number(profile.freeMemoryGB.toFixed(1)),
        workers: patch.workers,
        batchSize: patch.batchSize,
        cacheMaxEntries: patch.cacheMaxEntries,
      });
      await this.events.emit(createEvent('host_profile_applied', {
        cpuCores: profile.cpuCores,
        workers: patch.workers,
        reasoning: patch.reasoning,
      }));
    } catch (error) {
      logWarning('[orchestrator] Host optimization failed, keeping prior configuration', {
        error: getErrorMessage(error),
      });
    }
  }

  private async integrateConfiguredProviders(): Promise<void> {
    for (const [name, provider] of Object.entries(this.config.providers)) {
      if (!provider.enabled) continue;
      const integrated = await this.integrateProvider(name, {
        integration: provider.integration,
        priority: provider.priority,
        features: provider.features,
        settings: provider.settings,
      });
      if (!integrated) {
        logWarning('[orchestrator] Configured provider not integrated', { provider: name });
      }
    }
  }

  private ensureCache(): CacheStore<CachedKnowledge> {
    if (!this.cache) {
      this.cache = new MemoryCacheStore<CachedKnowledge>({
        maxEntries: this.config.cache.maxEntries,
        ttlMs: Math.round(this.config.cache.ttlSeconds * 1000),
      });
    }
    return this.cache;
  }

  private requireReady(operation: string): CacheAsidePipeline<CachedKnowledge> {
    if (!this.state.initialized || !this.cacheAside) {
      throw Errors.notInitialized(operation);
    }
    return this.cacheAside;
  }

  private integrationCounts(): IntegrationCounts {
    return { providers: this.providers.size, models: this.models.size };
  }

  private async readHealth(): Promise<HealthStatus> {
    try {
      return await this.collaborators.health.checkHealth();
    } catch (error) {
      return { healthy: false, detail: { error: getErrorMessage(error) } };
    }
  }

  private async readPerformance(): Promise<Record<string, unknown>> {
    try {
      return await this.collaborators.performance.status();
    } catch (error) {
      return { error: getErrorMessage(error) };
    }
  }
}

/**
 * Initialize, run `fn`, and always shut down afterwards.
 *
 * @throws PreconditionError when initialization fails
 */
export async function runWithOrchestrator<T>(
  orchestrator: KnowledgeOrchestrator,
  fn: (orchestrator: KnowledgeOrchestrator) => Promise<T>
): Promise<T> {
  if (!(await orchestrator.initialize())) {
    throw new PreconditionError('run orchestrator session', 'initialization failed');
  }
  try {
    return await fn(orchestrator);
  } finally {
    await orchestrator.shutdown();
  }
}
