/**
 * @fileoverview In-process collaborator fakes
 *
 * Every collaborator method is a `vi.fn()` with a working default, so tests
 * override only the call they care about. `initOrder` records the order in
 * which `initialize(config)` was called across all fakes.
 */

import { vi } from 'vitest';
import { MemoryCacheStore } from '../../collaborators/memory_cache.js';
import type {
  ApiSurface,
  CachedKnowledge,
  DataProcessor,
  Embedding,
  EmbeddingGenerator,
  GraphInsights,
  GraphStore,
  HealthChecker,
  HealthStatus,
  Integration,
  IntegrationOrchestrator,
  KnowledgeInput,
  Metadata,
  MetricsCollector,
  OptimizationResult,
  PerformanceOptimizer,
  ProcessedData,
  ProcessedDocument,
  SearchFilters,
  SearchResult,
  SemanticSearch,
  Transport,
} from '../../collaborators/types.js';
import type { OrchestratorConfig, OrchestratorConfigInput } from '../../config/schema.js';
import type { OrchestratorHooks } from '../../orchestrator/hooks.js';
import { KnowledgeOrchestrator } from '../../orchestrator/knowledge_orchestrator.js';
import type { MetricsSnapshot } from '../../orchestrator/metrics.js';

function toDocuments(input: KnowledgeInput, metadata: Metadata): ProcessedDocument[] {
  switch (input.kind) {
    case 'text':
      return [{ content: input.text, metadata }];
    case 'record':
      return [{ content: JSON.stringify(input.record), metadata }];
    case 'batch':
      return input.items.flatMap((item) => toDocuments(item, metadata));
  }
}

export function createFakeCollaborators() {
  const initOrder: string[] = [];
  const initializer = (name: string) => vi.fn(async (_config: OrchestratorConfig) => {
    initOrder.push(name);
  });
  let nodeSequence = 0;

  const graph = {
    initialize: initializer('graph'),
    addNodes: vi.fn(async (data: ProcessedData, _embeddings: Embedding[]) =>
      data.documents.map(() => `node-${++nodeSequence}`)),
    nodeCount: vi.fn(async () => nodeSequence),
    edgeCount: vi.fn(async () => 3),
    complexityScore: vi.fn(async () => 0.25),
    analyze: vi.fn(async (analysisType: string, _parameters: Record<string, unknown>): Promise<GraphInsights> => ({
      analysisType,
      communities: 2,
    })),
  } satisfies GraphStore;

  const processor = {
    initialize: initializer('processor'),
    process: vi.fn(async (input: KnowledgeInput, metadata: Metadata): Promise<ProcessedData> => ({
      sourceKind: input.kind,
      documents: toDocuments(input, metadata),
    })),
    averageProcessingTime: vi.fn(async () => 12),
  } satisfies DataProcessor;

  const embeddings = {
    initialize: initializer('embeddings'),
    generateEmbeddings: vi.fn(async (data: ProcessedData): Promise<Embedding[]> =>
      data.documents.map(() => [0.1, 0.2, 0.3])),
    totalEmbeddings: vi.fn(async () => 42),
  } satisfies EmbeddingGenerator;

  const semanticSearch = vi.fn(
    async (query: string, _filters: SearchFilters, _limit?: number): Promise<SearchResult[]> => [
      { id: 'node-1', score: 0.9, content: `match for ${query}` },
    ]
  );
  const search = {
    initialize: initializer('search'),
    semanticSearch,
    totalQueries: vi.fn(async () => semanticSearch.mock.calls.length),
    averageResponseTime: vi.fn(async () => 8),
  } satisfies SemanticSearch;

  const integration = {
    initialize: initializer('integration'),
    integrateProvider: vi.fn(
      async (providerName: string, _config: Record<string, unknown>): Promise<Integration | null> => ({
        provider: providerName,
      })
    ),
    integrateModel: vi.fn(
      async (
        providerName: string,
        modelName: string,
        _config: Record<string, unknown>
      ): Promise<Integration | null> => ({ provider: providerName, model: modelName })
    ),
  } satisfies IntegrationOrchestrator;

  const performance = {
    initialize: initializer('performance'),
    optimize: vi.fn(async (): Promise<OptimizationResult> => ({ optimized: false, detail: {} })),
    memoryUsage: vi.fn(async () => 0.5),
    cpuUsage: vi.fn(async () => 0.4),
    gpuUsage: vi.fn(async () => 0),
    status: vi.fn(async (): Promise<Record<string, unknown>> => ({ mode: 'balanced' })),
  } satisfies PerformanceOptimizer;

  const cache = new MemoryCacheStore<CachedKnowledge>({ maxEntries: 100 });
  vi.spyOn(cache, 'initialize').mockImplementation(async () => {
    initOrder.push('cache');
  });

  const metrics = {
    initialize: initializer('metrics'),
    collect: vi.fn(async (_snapshot: MetricsSnapshot) => {}),
  } satisfies MetricsCollector<MetricsSnapshot>;

  const health = {
    initialize: initializer('health'),
    checkHealth: vi.fn(async (): Promise<HealthStatus> => ({ healthy: true, detail: {} })),
  } satisfies HealthChecker;

  const api = {
    initialize: initializer('api'),
    totalRequests: vi.fn(async () => 7),
  } satisfies ApiSurface;

  const transport = {
    initialize: initializer('transport'),
    start: vi.fn(async (_host: string, _port: number) => {}),
    stop: vi.fn(async () => {}),
  } satisfies Transport;

  return {
    initOrder,
    graph,
    processor,
    embeddings,
    search,
    integration,
    performance,
    cache,
    metrics,
    health,
    api,
    transport,
  };
}

export type FakeCollaborators = ReturnType<typeof createFakeCollaborators>;

export interface TestOrchestratorOptions {
  config?: OrchestratorConfigInput;
  hooks?: Partial<OrchestratorHooks>;
  fakes?: FakeCollaborators;
}

/**
 * Orchestrator over fresh fakes with host tuning off, silent logs and
 * loop intervals short enough for real-time tests.
 */
export function createTestOrchestrator(options: TestOrchestratorOptions = {}) {
  const fakes = options.fakes ?? createFakeCollaborators();
  const orchestrator = new KnowledgeOrchestrator({
    collaborators: fakes,
    config: {
      dynamicConfig: false,
      logging: { level: 'silent' },
      metrics: { collectionIntervalSeconds: 0.01 },
      health: { checkIntervalSeconds: 0.01 },
      performance: { optimizationIntervalSeconds: 0.01 },
      ...options.config,
    },
    hooks: options.hooks,
  });
  return { orchestrator, fakes };
}
