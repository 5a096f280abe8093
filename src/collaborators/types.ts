/**
 * @fileoverview Collaborator contracts
 *
 * The orchestrator sequences and supervises these subsystems but implements
 * none of them. Every collaborator exposes `initialize(config)`, which
 * receives a copy of the host-tuned configuration. The orchestrator may call
 * it again after a failed startup, so implementations must tolerate repeated
 * initialization.
 *
 * @packageDocumentation
 */

import type { OrchestratorConfig } from '../config/schema.js';

// ============================================================================
// SHARED DATA TYPES
// ============================================================================

export type Metadata = Record<string, unknown>;

/** Values that survive a JSON round trip unchanged. Finite numbers only. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export interface TextKnowledge {
  kind: 'text';
  text: string;
}

export interface RecordKnowledge {
  kind: 'record';
  record: Record<string, unknown>;
}

export interface BatchKnowledge {
  kind: 'batch';
  items: Array<TextKnowledge | RecordKnowledge>;
}

/** Everything `addKnowledge` accepts. */
export type KnowledgeInput = TextKnowledge | RecordKnowledge | BatchKnowledge;

export interface ProcessedDocument {
  content: string;
  metadata: Metadata;
}

export interface ProcessedData {
  sourceKind: KnowledgeInput['kind'];
  documents: ProcessedDocument[];
}

export type Embedding = number[];

export type SearchFilters = Record<string, JsonValue>;

export interface SearchResult {
  id: string;
  score: number;
  content?: string;
  metadata?: Metadata;
}

export type GraphInsights = Record<string, unknown>;

export interface HealthStatus {
  healthy: boolean;
  detail: Record<string, unknown>;
}

export interface OptimizationResult {
  optimized: boolean;
  detail: Record<string, unknown>;
}

/** What the orchestrator keeps in its cache: query results and ingested knowledge. */
export type CachedKnowledge = SearchResult[] | ProcessedData;

/** Opaque handle a successful provider/model integration returns. */
export type Integration = Record<string, unknown>;

// ============================================================================
// COLLABORATORS
// ============================================================================

export interface Subsystem {
  /** `config` is a copy; workers, batch and queue sizes are already host-tuned. */
  initialize(config: OrchestratorConfig): Promise<void>;
}

export interface GraphStore extends Subsystem {
  addNodes(data: ProcessedData, embeddings: Embedding[]): Promise<string[]>;
  nodeCount(): Promise<number>;
  edgeCount(): Promise<number>;
  complexityScore(): Promise<number>;
  analyze(analysisType: string, parameters: Record<string, unknown>): Promise<GraphInsights>;
}

export interface DataProcessor extends Subsystem {
  process(input: KnowledgeInput, metadata: Metadata): Promise<ProcessedData>;
  /** Milliseconds */
  averageProcessingTime(): Promise<number>;
}

export interface EmbeddingGenerator extends Subsystem {
  generateEmbeddings(data: ProcessedData): Promise<Embedding[]>;
  totalEmbeddings(): Promise<number>;
}

export interface SemanticSearch extends Subsystem {
  semanticSearch(query: string, filters: SearchFilters, limit?: number): Promise<SearchResult[]>;
  totalQueries(): Promise<number>;
  /** Milliseconds */
  averageResponseTime(): Promise<number>;
}

export interface IntegrationOrchestrator extends Subsystem {
  integrateProvider(providerName: string, providerConfig: Record<string, unknown>): Promise<Integration | null>;
  integrateModel(
    providerName: string,
    modelName: string,
    modelConfig: Record<string, unknown>
  ): Promise<Integration | null>;
}

export interface CacheStore<V = unknown> extends Subsystem {
  /** Resolves `undefined` on a miss. */
  get(key: string): Promise<V | undefined>;
  set(key: string, value: V): Promise<void>;
  /** 0..1 */
  hitRate(): Promise<number>;
}

export interface PerformanceOptimizer extends Subsystem {
  optimize(): Promise<OptimizationResult>;
  memoryUsage(): Promise<number>;
  cpuUsage(): Promise<number>;
  gpuUsage(): Promise<number>;
  status(): Promise<Record<string, unknown>>;
}

export interface HealthChecker extends Subsystem {
  checkHealth(): Promise<HealthStatus>;
}

export interface MetricsCollector<TSnapshot = unknown> extends Subsystem {
  collect(snapshot: TSnapshot): Promise<void>;
}

export interface ApiSurface extends Subsystem {
  totalRequests(): Promise<number>;
}

export interface Transport extends Subsystem {
  start(host: string, port: number): Promise<void>;
  stop(): Promise<void>;
}
