/**
 * @fileoverview Orchestrator configuration
 *
 * - `schema`: zod schema, defaults and validation
 * - `loader`: YAML file + `KGO_*` environment overrides
 * - `host_profile`: host detection and host-aware tuning
 */

export {
  OrchestratorConfigSchema,
  ProviderConfigSchema,
  LogLevelSchema,
  createDefaultConfig,
  parseConfig,
  type OrchestratorConfig,
  type OrchestratorConfigInput,
  type ProviderConfig,
} from './schema.js';

export {
  loadConfig,
  readConfigFile,
  readEnvOverrides,
  mergeConfig,
  type LoadConfigOptions,
} from './loader.js';

export {
  detectHostProfile,
  optimizeConfigForHost,
  applyHostConfigPatch,
  type HostProfile,
  type HostConfigPatch,
  type HostProfileDetector,
} from './host_profile.js';
