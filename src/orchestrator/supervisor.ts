/**
 * @fileoverview Background Task Supervisor
 *
 * Owns one handle per named periodic task. Each task moves through
 * `created → running → stopped`:
 *
 * - `start()` spawns every task in `created`; tasks wait for `activate()`
 * - once active, a task iterates `iterate → sleep` while `isRunning()` holds
 * - an iteration that throws is logged and counted; the loop keeps going
 * - `stopAll()` aborts every task (interrupting its sleep) and joins them
 *
 * Iterations of one task never overlap. Tasks are independent of each other.
 * The handle set changes only inside `start()` and `stopAll()`.
 *
 * @packageDocumentation
 */

import { logDebug, logError, logInfo } from '../telemetry/logger.js';
import { abortedPromise, createDeferred, sleep, type Deferred } from '../utils/async.js';
import { getErrorMessage } from '../utils/errors.js';

// ============================================================================
// TYPES
// ============================================================================

export type TaskState = 'created' | 'running' | 'stopped';

export interface SupervisedTask {
  name: string;
  /** Read before every sleep so config changes take effect on the next cycle */
  intervalMs(): number;
  iterate(signal: AbortSignal): Promise<void>;
}

interface TaskStats {
  state: TaskState;
  iterations: number;
  failures: number;
  lastError?: string;
}

export interface BackgroundTaskHandle {
  readonly name: string;
  readonly controller: AbortController;
  /** Settles once the loop has exited */
  readonly done: Promise<void>;
  readonly stats: TaskStats;
}

export interface TaskSnapshot {
  name: string;
  state: TaskState;
  /** Completed iterations, failed ones included */
  iterations: number;
  failures: number;
  lastError?: string;
}

export interface SupervisorStopReport {
  stopped: string[];
  errors: Array<{ task: string; error: string }>;
}

export interface BackgroundSupervisorOptions {
  tasks: SupervisedTask[];
  /** Loops exit at the top of the next iteration once this turns false */
  isRunning: () => boolean;
}

// ============================================================================
// SUPERVISOR
// ============================================================================

export class BackgroundSupervisor {
  private readonly tasks: SupervisedTask[];
  private readonly isRunning: () => boolean;
  private handles = new Map<string, BackgroundTaskHandle>();
  private activation: Deferred<void> = createDeferred();

  constructor(options: BackgroundSupervisorOptions) {
    const names = new Set<string>();
    for (const task of options.tasks) {
      if (names.has(task.name)) {
        throw new Error(`Duplicate supervised task name: ${task.name}`);
      }
      names.add(task.name);
    }
    this.tasks = [...options.tasks];
    this.isRunning = options.isRunning;
  }

  /**
   * Spawn every task. No-op while any task from a previous start is still live.
   */
  start(): void {
    if (this.isActive()) return;

    this.handles = new Map();
    this.activation = createDeferred();
    for (const task of this.tasks) {
      this.handles.set(task.name, this.spawn(task, this.activation.promise));
    }
    logInfo('[supervisor] Background tasks started', { tasks: this.tasks.map((t) => t.name) });
  }

  /**
   * Let created tasks begin iterating.
   */
  activate(): void {
    this.activation.resolve();
  }

  isActive(): boolean {
    for (const handle of this.handles.values()) {
      if (handle.stats.state !== 'stopped') return true;
    }
    return false;
  }

  getTaskStates(): TaskSnapshot[] {
    return [...this.handles.values()].map((handle) => ({
      name: handle.name,
      state: handle.stats.state,
      iterations: handle.stats.iterations,
      failures: handle.stats.failures,
      lastError: handle.stats.lastError,
    }));
  }

  /**
   * Abort every task and wait for all of them. A task that ends with an
   * error does not stop the join; its error is reported instead.
   */
  async stopAll(): Promise<SupervisorStopReport> {
    const handles = [...this.handles.values()];
    this.handles = new Map();

    for (const handle of handles) {
      handle.controller.abort();
    }

    const results = await Promise.allSettled(handles.map((handle) => handle.done));
    const report: SupervisorStopReport = { stopped: [], errors: [] };
    results.forEach((result, index) => {
      const handle = handles[index];
      if (!handle) return;
      handle.stats.state = 'stopped';
      report.stopped.push(handle.name);
      if (result.status === 'rejected') {
        report.errors.push({ task: handle.name, error: getErrorMessage(result.reason) });
      }
    });

    if (handles.length > 0) {
      logInfo('[supervisor] Background tasks stopped', {
        stopped: report.stopped,
        errors: report.errors.length,
      });
    }
    return report;
  }

  // ============================================================================
  // LOOP
  // ============================================================================

  private spawn(task: SupervisedTask, activation: Promise<void>): BackgroundTaskHandle {
    const controller = new AbortController();
    const stats: TaskStats = { state: 'created', iterations: 0, failures: 0 };
    const done = this.runLoop(task, stats, activation, controller.signal);
    return { name: task.name, controller, done, stats };
  }

  private async runLoop(
    task: SupervisedTask,
    stats: TaskStats,
    activation: Promise<void>,
    signal: AbortSignal
  ): Promise<void> {
    await Promise.race([activation, abortedPromise(signal)]);

    try {
      if (signal.aborted) return;
      stats.state = 'running';
      logDebug('[supervisor] Task running', { task: task.name });

      while (this.isRunning() && !signal.aborted) {
        try {
          await task.iterate(signal);
        } catch (error) {
          stats.failures++;
          stats.lastError = getErrorMessage(error);
          logError(`[supervisor] ${task.name} iteration failed`, {
            task: task.name,
            error: stats.lastError,
          });
        } finally {
          stats.iterations++;
        }

        if (!this.isRunning() || signal.aborted) break;
        await sleep(task.intervalMs(), signal);
      }
    } finally {
      stats.state = 'stopped';
      logDebug('[supervisor] Task stopped', { task: task.name, iterations: stats.iterations });
    }
  }
}
