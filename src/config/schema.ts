/**
 * @fileoverview Orchestrator configuration schema
 *
 * Zod is the single source of truth: it supplies defaults, validates loaded
 * files and environment overrides, and yields the runtime config type.
 *
 * Interval fields are in seconds and may be fractional.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const ProviderConfigSchema = z.object({
  enabled: z.boolean().default(true),
  integration: z.string().min(1).default('standard'),
  priority: z.number().int().default(0),
  features: z.array(z.string()).default([]),
  settings: z.record(z.unknown()).default({}),
}).strict();

export const LoggingConfigSchema = z.object({
  /**
   * Process-wide threshold. Left unset, the logger keeps its own level
   * (`KGO_LOG_LEVEL`, else info).
   */
  level: LogLevelSchema.optional(),
}).strict();

export const MetricsConfigSchema = z.object({
  collectionIntervalSeconds: z.number().positive().default(5),
}).strict();

export const HealthConfigSchema = z.object({
  checkIntervalSeconds: z.number().positive().default(30),
}).strict();

export const PerformanceConfigSchema = z.object({
  optimizationIntervalSeconds: z.number().positive().default(60),
  workers: z.number().int().positive().default(4),
  batchSize: z.number().int().positive().default(32),
  queueSize: z.number().int().positive().default(1000),
}).strict();

export const CacheConfigSchema = z.object({
  enabled: z.boolean().default(true),
  ttlSeconds: z.number().positive().default(3600),
  maxEntries: z.number().int().positive().default(1000),
}).strict();

export const OrchestratorConfigSchema = z.object({
  host: z.string().min(1).default('localhost'),
  port: z.number().int().min(1).max(65535).default(8000),
  /** Detect the host and tune the config before subsystems start */
  dynamicConfig: z.boolean().default(true),
  logging: LoggingConfigSchema.default({}),
  metrics: MetricsConfigSchema.default({}),
  health: HealthConfigSchema.default({}),
  performance: PerformanceConfigSchema.default({}),
  cache: CacheConfigSchema.default({}),
  providers: z.record(ProviderConfigSchema).default({}),
}).strict();

export type OrchestratorConfig = z.infer<typeof OrchestratorConfigSchema>;
export type OrchestratorConfigInput = z.input<typeof OrchestratorConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;

export function createDefaultConfig(): OrchestratorConfig {
  return OrchestratorConfigSchema.parse({});
}

/**
 * Validate raw config input, throwing ConfigurationError on the first issue.
 */
export function parseConfig(input: unknown): OrchestratorConfig {
  const result = OrchestratorConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue && issue.path.length > 0 ? issue.path.join('.') : '<root>';
    throw new ConfigurationError(key, issue?.message ?? 'invalid configuration');
  }
  return result.data;
}
