/**
 * @fileoverview Tests for the background task supervisor
 *
 * Uses real timers with millisecond intervals.
 */

import { afterEach, describe, expect, it, vi } from 'vitest';
import { BackgroundSupervisor, type SupervisedTask } from '../supervisor.js';

function task(name: string, iterate: SupervisedTask['iterate'], intervalMs = 5): SupervisedTask {
  return { name, intervalMs: () => intervalMs, iterate };
}

describe('BackgroundSupervisor', () => {
  let supervisor: BackgroundSupervisor | null = null;

  afterEach(async () => {
    await supervisor?.stopAll();
    supervisor = null;
  });

  it('rejects duplicate task names', () => {
    expect(
      () =>
        new BackgroundSupervisor({
          tasks: [task('a', async () => {}), task('a', async () => {})],
          isRunning: () => true,
        })
    ).toThrow('Duplicate supervised task name: a');
  });

  it('holds tasks in created until activated', async () => {
    const iterate = vi.fn(async () => {});
    supervisor = new BackgroundSupervisor({ tasks: [task('a', iterate)], isRunning: () => true });

    supervisor.start();
    await new Promise((resolve) => setTimeout(resolve, 20));

    expect(iterate).not.toHaveBeenCalled();
    expect(supervisor.getTaskStates()).toEqual([
      { name: 'a', state: 'created', iterations: 0, failures: 0, lastError: undefined },
    ]);

    supervisor.activate();
    await vi.waitFor(() => expect(iterate).toHaveBeenCalled());
  });

  it('keeps iterating after a failed iteration', async () => {
    let calls = 0;
    const iterate = vi.fn(async () => {
      calls++;
      if (calls === 1) throw new Error('transient failure');
    });
    supervisor = new BackgroundSupervisor({ tasks: [task('health', iterate)], isRunning: () => true });

    supervisor.start();
    supervisor.activate();

    await vi.waitFor(() => expect(iterate.mock.calls.length).toBeGreaterThanOrEqual(3));
    const [state] = supervisor.getTaskStates();
    expect(state?.failures).toBe(1);
    expect(state?.lastError).toBe('transient failure');
    expect(state?.state).toBe('running');
  });

  it('runs tasks independently', async () => {
    const failing = vi.fn(async () => {
      throw new Error('always fails');
    });
    const healthy = vi.fn(async () => {});
    supervisor = new BackgroundSupervisor({
      tasks: [task('failing', failing), task('healthy', healthy)],
      isRunning: () => true,
    });

    supervisor.start();
    supervisor.activate();

    await vi.waitFor(() => expect(healthy.mock.calls.length).toBeGreaterThanOrEqual(2));
    expect(failing.mock.calls.length).toBeGreaterThanOrEqual(1);
  });

  it('interrupts the sleep on stop and clears handles', async () => {
    const iterate = vi.fn(async () => {});
    supervisor = new BackgroundSupervisor({
      tasks: [task('slow', iterate, 60_000)],
      isRunning: () => true,
    });

    supervisor.start();
    supervisor.activate();
    await vi.waitFor(() => expect(iterate).toHaveBeenCalledTimes(1));

    const startedAt = Date.now();
    const report = await supervisor.stopAll();

    expect(Date.now() - startedAt).toBeLessThan(1_000);
    expect(report).toEqual({ stopped: ['slow'], errors: [] });
    expect(supervisor.getTaskStates()).toEqual([]);
    expect(supervisor.isActive()).toBe(false);
  });

  it('stops tasks that were never activated', async () => {
    const iterate = vi.fn(async () => {});
    supervisor = new BackgroundSupervisor({ tasks: [task('a', iterate), task('b', iterate)], isRunning: () => true });

    supervisor.start();
    const report = await supervisor.stopAll();

    expect(report.stopped).toEqual(['a', 'b']);
    expect(iterate).not.toHaveBeenCalled();
  });

  it('exits loops once isRunning turns false', async () => {
    let running = true;
    const iterate = vi.fn(async () => {});
    supervisor = new BackgroundSupervisor({ tasks: [task('a', iterate, 2)], isRunning: () => running });

    supervisor.start();
    supervisor.activate();
    await vi.waitFor(() => expect(iterate).toHaveBeenCalled());

    running = false;
    await vi.waitFor(() => expect(supervisor?.isActive()).toBe(false));
    const calls = iterate.mock.calls.length;
    await new Promise((resolve) => setTimeout(resolve, 20));

    expect(iterate.mock.calls.length).toBe(calls);
  });

  it('can start again after a stop', async () => {
    const iterate = vi.fn(async () => {});
    supervisor = new BackgroundSupervisor({ tasks: [task('a', iterate)], isRunning: () => true });

    supervisor.start();
    supervisor.activate();
    await vi.waitFor(() => expect(iterate).toHaveBeenCalled());
    await supervisor.stopAll();
    iterate.mockClear();

    supervisor.start();
    expect(supervisor.getTaskStates().map((s) => s.state)).toEqual(['created']);
    supervisor.activate();

    await vi.waitFor(() => expect(iterate).toHaveBeenCalled());
  });

  it('ignores start while tasks are live', () => {
    supervisor = new BackgroundSupervisor({ tasks: [task('a', async () => {})], isRunning: () => true });

    supervisor.start();
    supervisor.start();

    expect(supervisor.getTaskStates()).toHaveLength(1);
  });
});
