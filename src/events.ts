/**
 * @fileoverview Orchestrator events
 *
 * Each event type carries a fixed payload shape. Listeners run in
 * subscription order; a throwing listener is logged and never reaches the
 * emitter or the listeners after it.
 */

import type { KnowledgeInput } from './collaborators/types.js';
import { logError } from './telemetry/logger.js';
import { getErrorMessage } from './utils/errors.js';

export interface OrchestratorEventPayloads {
  orchestrator_initialized: { durationMs: number };
  orchestrator_initialization_failed: { error: string };
  host_profile_applied: { cpuCores: number; workers: number; reasoning: string[] };
  transport_started: { host: string; port: number };
  transport_stopped: { stoppedTasks: string[] };
  metrics_collected: { collectedAt: string };
  health_degraded: { detail: Record<string, unknown> };
  optimization_applied: { detail: Record<string, unknown> };
  knowledge_added: { nodeIds: string[]; kind: KnowledgeInput['kind'] };
  knowledge_queried: { query: string; cacheHit: boolean; results: number };
  integration_added: { provider: string; model?: string };
}

export type OrchestratorEventType = keyof OrchestratorEventPayloads;

export interface OrchestratorEvent<K extends OrchestratorEventType = OrchestratorEventType> {
  type: K;
  timestamp: Date;
  data: OrchestratorEventPayloads[K];
}

export type OrchestratorEventHandler<K extends OrchestratorEventType = OrchestratorEventType> = (
  event: OrchestratorEvent<K>
) => void | Promise<void>;

interface Listener {
  label: OrchestratorEventType | '*';
  deliver: OrchestratorEventHandler;
  once: boolean;
}

function isEventOf<K extends OrchestratorEventType>(
  event: OrchestratorEvent,
  type: K
): event is OrchestratorEvent<K> {
  return event.type === type;
}

export class OrchestratorEventBus {
  private listeners: Listener[] = [];

  /** @returns an unsubscribe function */
  on<K extends OrchestratorEventType>(type: K, handler: OrchestratorEventHandler<K>): () => void {
    return this.subscribe(type, this.narrow(type, handler), false);
  }

  once<K extends OrchestratorEventType>(type: K, handler: OrchestratorEventHandler<K>): () => void {
    return this.subscribe(type, this.narrow(type, handler), true);
  }

  /** Every event, whatever its type. */
  onAny(handler: OrchestratorEventHandler): () => void {
    return this.subscribe('*', handler, false);
  }

  listenerCount(type?: OrchestratorEventType): number {
    return type === undefined
      ? this.listeners.length
      : this.listeners.filter((listener) => listener.label === type).length;
  }

  async emit(event: OrchestratorEvent): Promise<void> {
    const matching = this.listeners.filter((listener) => listener.label === '*' || listener.label === event.type);
    if (matching.some((listener) => listener.once)) {
      this.listeners = this.listeners.filter((listener) => !(listener.once && matching.includes(listener)));
    }

    for (const listener of matching) {
      try {
        await listener.deliver(event);
      } catch (error: unknown) {
        logError(`[events] Listener for ${listener.label} failed on ${event.type}`, {
          error: getErrorMessage(error),
        });
      }
    }
  }

  private narrow<K extends OrchestratorEventType>(type: K, handler: OrchestratorEventHandler<K>): OrchestratorEventHandler {
    return (event) => (isEventOf(event, type) ? handler(event) : undefined);
  }

  private subscribe(label: Listener['label'], deliver: OrchestratorEventHandler, once: boolean): () => void {
    const listener: Listener = { label, deliver, once };
    this.listeners = [...this.listeners, listener];
    return () => {
      this.listeners = this.listeners.filter((entry) => entry !== listener);
    };
  }
}

export function createEvent<K extends OrchestratorEventType>(
  type: K,
  data: OrchestratorEventPayloads[K]
): OrchestratorEvent<K> {
  return { type, timestamp: new Date(), data };
}
