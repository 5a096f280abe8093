import { describe, expect, it, vi } from 'vitest';
import { createEvent, OrchestratorEventBus, type OrchestratorEvent } from '../events.js';

describe('OrchestratorEventBus', () => {
  it('delivers only matching events to typed listeners', async () => {
    const bus = new OrchestratorEventBus();
    const added: string[][] = [];
    bus.on('knowledge_added', (event) => {
      added.push(event.data.nodeIds);
    });

    await bus.emit(createEvent('knowledge_added', { nodeIds: ['node-1'], kind: 'text' }));
    await bus.emit(createEvent('transport_started', { host: 'localhost', port: 8000 }));

    expect(added).toEqual([['node-1']]);
  });

  it('delivers every event to onAny listeners', async () => {
    const bus = new OrchestratorEventBus();
    const seen: string[] = [];
    bus.onAny((event) => {
      seen.push(event.type);
    });

    await bus.emit(createEvent('transport_started', { host: 'localhost', port: 8000 }));
    await bus.emit(createEvent('transport_stopped', { stoppedTasks: [] }));

    expect(seen).toEqual(['transport_started', 'transport_stopped']);
  });

  it('isolates a throwing listener from the emitter and later listeners', async () => {
    const bus = new OrchestratorEventBus();
    const after = vi.fn();
    bus.on('health_degraded', () => {
      throw new Error('listener broke');
    });
    bus.on('health_degraded', after);

    await expect(bus.emit(createEvent('health_degraded', { detail: {} }))).resolves.toBeUndefined();
    expect(after).toHaveBeenCalledTimes(1);
  });

  it('runs once listeners a single time', async () => {
    const bus = new OrchestratorEventBus();
    const seen: OrchestratorEvent[] = [];
    bus.once('metrics_collected', (event) => {
      seen.push(event);
    });

    await bus.emit(createEvent('metrics_collected', { collectedAt: '2024-01-01T00:00:00.000Z' }));
    await bus.emit(createEvent('metrics_collected', { collectedAt: '2024-01-01T00:00:05.000Z' }));

    expect(seen).toHaveLength(1);
    expect(bus.listenerCount('metrics_collected')).toBe(0);
  });

  it('unsubscribes', async () => {
    const bus = new OrchestratorEventBus();
    const handler = vi.fn();
    const unsubscribe = bus.on('transport_stopped', handler);
    expect(bus.listenerCount()).toBe(1);
    unsubscribe();

    await bus.emit(createEvent('transport_stopped', { stoppedTasks: [] }));

    expect(handler).not.toHaveBeenCalled();
    expect(bus.listenerCount()).toBe(0);
  });
});
