/**
 * Unit Tests: Rollout Supervision
 *
 * Drives the supervisor with a fake clock and scripted /system answers.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  superviseRollout,
  waitForRack,
  triggerUpdate,
  DEFAULT_GRACE_MS,
} from '../../src/rollout/supervisor.js';
import { RolloutObserver } from '../../src/rollout/observer.js';
import { ApiRequestError, MalformedResponseError } from '../../src/api/errors.js';
import { createRackClient } from '../../src/api/client.js';
import {
  PollingTransportError,
  RollbackDetectedError,
  RolloutTimeoutError,
  TriggerRejectedError,
} from '../../src/errors.js';
import { createFakeClock, statusSequence, system } from '../fakes.js';

describe('RolloutObserver', () => {
  it('treats running after a rollback as rolled back', () => {
    const observer = new RolloutObserver(60000);

    expect(observer.observe('updating', 1000).phase).toBe('pending');
    expect(observer.observe('rollback', 2000)).toEqual({ phase: 'pending', rollbackStarted: true });
    expect(observer.observe('rollback', 3000)).toEqual({ phase: 'pending', rollbackStarted: false });
    expect(observer.observe('running', 4000).phase).toBe('rolled_back');
  });

  it('ignores running before any transition until the settle window passes', () => {
    const observer = new RolloutObserver(10000);

    expect(observer.observe('running', 2000).phase).toBe('pending');
    expect(observer.observe('running', 10000).phase).toBe('converged');
  });

  it('converges on running after updating', () => {
    const observer = new RolloutObserver(60000);

    observer.observe('updating', 1000);
    expect(observer.observe('running', 2000).phase).toBe('converged');
    expect(observer.transitionSeen).toBe(true);
    expect(observer.rollbackSeen).toBe(false);
  });
});

describe('superviseRollout', () => {
  it('classifies running, updating, rollback, updating, running as rolled back', async () => {
    const clock = createFakeClock();
    const onRollback = vi.fn();
    const reader = { getSystem: vi.fn(statusSequence(['running', 'updating', 'rollback', 'updating', 'running'])) };

    const result = await superviseRollout(reader, {
      sleep: clock.sleep,
      now: clock.now,
      onRollback,
    });

    expect(result.outcome).toBe('rolled_back');
    expect(result.polls).toBe(5);
    expect(result.system.status).toBe('running');
    expect(onRollback).toHaveBeenCalledTimes(1);
  });

  it('waits the grace period before the first poll', async () => {
    const clock = createFakeClock();
    const reader = { getSystem: statusSequence(['updating', 'running']) };

    await superviseRollout(reader, { sleep: clock.sleep, now: clock.now, intervalMs: 2000 });

    expect(clock.sleeps).toEqual([DEFAULT_GRACE_MS, 2000, 2000]);
  });

  it('converges on running after updating', async () => {
    const clock = createFakeClock();
    const onPoll = vi.fn();
    const reader = { getSystem: statusSequence(['updating', 'updating', 'running']) };

    const result = await superviseRollout(reader, {
      sleep: clock.sleep,
      now: clock.now,
      graceMs: 0,
      intervalMs: 1000,
      onPoll,
    });

    expect(result).toMatchObject({ outcome: 'converged', polls: 3, elapsedMs: 3000 });
    expect(onPoll).toHaveBeenCalledTimes(3);
    expect(onPoll).toHaveBeenLastCalledWith(system('running'), 3);
  });

  it('converges on a rack that stays running once the settle window passes', async () => {
    const clock = createFakeClock();
    const reader = { getSystem: statusSequence(['running']) };

    const result = await superviseRollout(reader, {
      sleep: clock.sleep,
      now: clock.now,
      graceMs: 0,
      intervalMs: 2000,
      settleMs: 10000,
    });

    expect(result).toMatchObject({ outcome: 'converged', polls: 5, elapsedMs: 10000 });
  });

  it('times out no matter how many updating readings arrive', async () => {
    const clock = createFakeClock();
    const reader = { getSystem: vi.fn(statusSequence(['updating'])) };

    const error = await superviseRollout(reader, {
      sleep: clock.sleep,
      now: clock.now,
      graceMs: 0,
      intervalMs: 2000,
      timeoutMs: 10000,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RolloutTimeoutError);
    expect(error).toMatchObject({
      message: 'Timed out waiting for rack to converge',
      timeoutMs: 10000,
      lastStatus: 'updating',
    });
    expect(reader.getSystem).toHaveBeenCalledTimes(4);
  });

  it('times out a rack stuck in rollback', async () => {
    const clock = createFakeClock();
    const reader = { getSystem: statusSequence(['updating', 'rollback']) };

    await expect(
      superviseRollout(reader, { sleep: clock.sleep, now: clock.now, graceMs: 0, timeoutMs: 20000 })
    ).rejects.toBeInstanceOf(RolloutTimeoutError);
  });

  it('aborts on a polling failure', async () => {
    const clock = createFakeClock();
    const getSystem = vi
      .fn()
      .mockResolvedValueOnce(system('updating'))
      .mockRejectedValueOnce(new Error('connection reset'));

    const error = await superviseRollout({ getSystem }, {
      sleep: clock.sleep,
      now: clock.now,
      graceMs: 0,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PollingTransportError);
    expect(error).toMatchObject({
      message: 'Lost contact with rack while waiting: connection reset',
      polls: 1,
    });
    expect(getSystem).toHaveBeenCalledTimes(2);
  });
});

describe('waitForRack', () => {
  it('resolves when the rack converges', async () => {
    const clock = createFakeClock();
    const reader = { getSystem: statusSequence(['updating', 'running']) };

    const result = await waitForRack(reader, { sleep: clock.sleep, now: clock.now });

    expect(result.outcome).toBe('converged');
  });

  it('throws RollbackDetectedError when the rack reverted', async () => {
    const clock = createFakeClock();
    const reader = { getSystem: statusSequence(['updating', 'rollback', 'running']) };

    await expect(waitForRack(reader, { sleep: clock.sleep, now: clock.now })).rejects.toThrow(
      RollbackDetectedError
    );
  });
});

describe('triggerUpdate', () => {
  it('returns the acknowledgement snapshot', async () => {
    const updateSystem = vi.fn().mockResolvedValue(system('updating'));

    await expect(triggerUpdate({ updateSystem }, '20200201000000')).resolves.toEqual(system('updating'));
    expect(updateSystem).toHaveBeenCalledWith('20200201000000');
  });

  it('turns a client error into TriggerRejectedError with the remote message', async () => {
    const updateSystem = vi
      .fn()
      .mockRejectedValue(new ApiRequestError('rack is already at version 20200201000000', 403));

    const error = await triggerUpdate({ updateSystem }, '20200201000000').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TriggerRejectedError);
    expect(error).toMatchObject({
      message: 'rack is already at version 20200201000000',
      targetVersion: '20200201000000',
      code: 'TRIGGER_REJECTED',
    });
  });

  it('propagates server errors unchanged', async () => {
    const failure = new ApiRequestError('internal error', 500);
    const updateSystem = vi.fn().mockRejectedValue(failure);

    await expect(triggerUpdate({ updateSystem }, '20200201000000')).rejects.toBe(failure);
  });

  it('does not treat a non-4xx status as a refusal', async () => {
    const failure = new ApiRequestError('not modified', 304);
    const updateSystem = vi.fn().mockRejectedValue(failure);

    await expect(triggerUpdate({ updateSystem }, '20200201000000')).rejects.toBe(failure);
  });

  it('accepts an update whose acknowledgement is unreadable', async () => {
    const updateSystem = vi.fn().mockRejectedValue(new MalformedResponseError('system'));

    await expect(triggerUpdate({ updateSystem }, '20200201000000')).resolves.toBeUndefined();
  });

  describe('against the HTTP client', () => {
    afterEach(() => {
      vi.unstubAllGlobals();
    });

    it('accepts an empty 200 reply instead of reporting a rejection', async () => {
      vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('', { status: 200 })));
      const client = createRackClient({ host: 'rack.test', password: 'test-secret' });

      await expect(triggerUpdate(client, '20200201000000')).resolves.toBeUndefined();
    });

    it('still rejects a 403 reply', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn().mockResolvedValue(new Response('{"error":"rack is already at this version"}', { status: 403 }))
      );
      const client = createRackClient({ host: 'rack.test', password: 'test-secret' });

      await expect(triggerUpdate(client, '20200201000000')).rejects.toThrow(TriggerRejectedError);
    });
  });
});
