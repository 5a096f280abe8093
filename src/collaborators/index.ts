export type {
  Metadata,
  JsonValue,
  TextKnowledge,
  RecordKnowledge,
  BatchKnowledge,
  KnowledgeInput,
  ProcessedDocument,
  ProcessedData,
  Embedding,
  SearchFilters,
  SearchResult,
  GraphInsights,
  HealthStatus,
  OptimizationResult,
  CachedKnowledge,
  Integration,
  Subsystem,
  GraphStore,
  DataProcessor,
  EmbeddingGenerator,
  SemanticSearch,
  IntegrationOrchestrator,
  CacheStore,
  PerformanceOptimizer,
  HealthChecker,
  MetricsCollector,
  ApiSurface,
  Transport,
} from './types.js';

export { MemoryCacheStore, type MemoryCacheOptions, type MemoryCacheStats } from './memory_cache.js';
export { NoopMetricsCollector } from './noop.js';
