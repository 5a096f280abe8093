/**
 * @fileoverview Orchestrator extension points
 *
 * Named strategies the orchestrator calls at fixed moments. Each default is
 * a documented no-op so the contract is visible even when a host wires
 * nothing. Hosts override any subset through `hooks` in the orchestrator
 * options.
 *
 * @packageDocumentation
 */

import type {
  GraphInsights,
  HealthStatus,
  Integration,
  OptimizationResult,
} from '../collaborators/types.js';

/**
 * Secondary insight generation layered over graph analysis. No guarantee
 * of non-empty content.
 */
export interface AugmentedInsights {
  summary: string;
  recommendations: string[];
  confidenceScores: Record<string, number>;
  relatedConcepts: string[];
}

export interface OrchestratorHooks {
  /** Health loop saw an unhealthy status. Recovery and alerting policy lives here. */
  onHealthIssue(status: HealthStatus): void | Promise<void>;
  /** Performance loop got `optimized: true` back from the optimizer. */
  applyOptimization(result: OptimizationResult): void | Promise<void>;
  /** A provider integration succeeded; wire callbacks and data flows. */
  configureProviderIntegration(providerName: string, integration: Integration): void | Promise<void>;
  /** A model integration succeeded; wire embeddings and search indexing. */
  configureModelIntegration(
    providerName: string,
    modelName: string,
    integration: Integration
  ): void | Promise<void>;
  /** Augment graph analysis for `getInsights`. */
  generateInsights(graphInsights: GraphInsights, analysisType: string): AugmentedInsights | Promise<AugmentedInsights>;
}

export function createEmptyInsights(): AugmentedInsights {
  return {
    summary: '',
    recommendations: [],
    confidenceScores: {},
    relatedConcepts: [],
  };
}

export const DEFAULT_HOOKS: Readonly<OrchestratorHooks> = {
  onHealthIssue: () => {},
  applyOptimization: () => {},
  configureProviderIntegration: () => {},
  configureModelIntegration: () => {},
  generateInsights: () => createEmptyInsights(),
};

export function resolveHooks(overrides: Partial<OrchestratorHooks> = {}): OrchestratorHooks {
  return { ...DEFAULT_HOOKS, ...overrides };
}
