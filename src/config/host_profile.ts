/**
 * @fileoverview Host-aware configuration tuning
 *
 * Detects the execution environment and derives worker, batch, queue and
 * cache sizes from it. Applied in place before any subsystem starts.
 *
 * Sizing rules:
 * - Never use more workers than CPU cores, leaving two for the system
 * - Reserve ~2GB of free memory per worker
 * - Scale down when the host is already under load
 * - Always at least one worker, never more than MAX_WORKERS
 */

import * as os from 'node:os';
import { HostProfileError } from '../core/errors.js';
import type { OrchestratorConfig } from './schema.js';

export interface HostProfile {
  platform: NodeJS.Platform;
  arch: string;
  cpuCores: number;
  totalMemoryGB: number;
  freeMemoryGB: number;
  /** 1-minute load average (0 on platforms without one) */
  loadAverage: number;
  hasGpu: boolean;
}

export interface HostConfigPatch {
  workers: number;
  batchSize: number;
  queueSize: number;
  cacheMaxEntries: number;
  reasoning: string[];
}

export type HostProfileDetector = () => HostProfile;

const MAX_WORKERS = 16;
const MEMORY_PER_WORKER_GB = 2;
const QUEUE_PER_WORKER = 250;
const CACHE_ENTRIES_PER_GB = 500;

export function detectHostProfile(env: NodeJS.ProcessEnv = process.env): HostProfile {
  const gpuHint = env.KGO_GPU ?? env.CUDA_VISIBLE_DEVICES;
  return {
    platform: os.platform(),
    arch: os.arch(),
    cpuCores: os.cpus().length,
    totalMemoryGB: os.totalmem() / (1024 ** 3),
    freeMemoryGB: os.freemem() / (1024 ** 3),
    loadAverage: os.loadavg()[0] ?? 0,
    hasGpu: gpuHint !== undefined && gpuHint !== '' && gpuHint !== '0' && gpuHint !== '-1',
  };
}

export function optimizeConfigForHost(profile: HostProfile): HostConfigPatch {
  if (!Number.isFinite(profile.cpuCores) || profile.cpuCores <= 0) {
    throw new HostProfileError('optimize', `invalid CPU core count ${profile.cpuCores}`);
  }
  if (!Number.isFinite(profile.freeMemoryGB) || profile.freeMemoryGB < 0) {
    throw new HostProfileError('optimize', `invalid free memory ${profile.freeMemoryGB}`);
  }

  const reasoning: string[] = [];

  const cpuBasedMax = Math.max(1, profile.cpuCores - 2);
  reasoning.push(`CPU cores: ${profile.cpuCores}, leaving 2 for system → max ${cpuBasedMax}`);

  const memoryBasedMax = Math.max(1, Math.floor(profile.freeMemoryGB / MEMORY_PER_WORKER_GB));
  reasoning.push(`Free memory: ${profile.freeMemoryGB.toFixed(1)}GB, ${MEMORY_PER_WORKER_GB}GB/worker → max ${memoryBasedMax}`);

  let loadMultiplier = 1.0;
  if (profile.loadAverage > profile.cpuCores * 0.7) {
    loadMultiplier = 0.5;
    reasoning.push(`High system load (${profile.loadAverage.toFixed(1)}), reducing by 50%`);
  } else if (profile.loadAverage > profile.cpuCores * 0.5) {
    loadMultiplier = 0.75;
    reasoning.push(`Moderate system load (${profile.loadAverage.toFixed(1)}), reducing by 25%`);
  }

  const workers = Math.min(
    MAX_WORKERS,
    Math.max(1, Math.floor(Math.min(cpuBasedMax, memoryBasedMax) * loadMultiplier)),
  );

  let batchSize = profile.freeMemoryGB >= 16 ? 64 : profile.freeMemoryGB >= 4 ? 32 : 16;
  if (profile.hasGpu) {
    batchSize *= 2;
    reasoning.push(`GPU available → batch size ${batchSize}`);
  }

  const cacheMaxEntries = Math.max(100, Math.min(100_000, Math.round(profile.totalMemoryGB * CACHE_ENTRIES_PER_GB)));

  return {
    workers,
    batchSize,
    queueSize: workers * QUEUE_PER_WORKER,
    cacheMaxEntries,
    reasoning,
  };
}

/**
 * Mutate `config` in place with the patch values.
 */
export function applyHostConfigPatch(config: OrchestratorConfig, patch: HostConfigPatch): void {
  config.performance.workers = patch.workers;
  config.performance.batchSize = patch.batchSize;
  config.performance.queueSize = patch.queueSize;
  config.cache.maxEntries = patch.cacheMaxEntries;
}
