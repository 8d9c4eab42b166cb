/**
 * Unit Tests: Local Rack Lifecycle
 *
 * Uses a recording ContainerRuntime and an EventEmitter as the signal
 * source; no docker and no real signals.
 */

import { describe, it, expect, vi } from 'vitest';
import { EventEmitter } from 'node:events';
import {
  LocalRackManager,
  localStorageRoot,
  DEFAULT_RACK_IMAGE,
} from '../../src/local/manager.js';
import { buildRunArgs, type ContainerRuntime, type ContainerSpec } from '../../src/local/runtime.js';
import { watchTerminationSignals } from '../../src/local/signals.js';
import { LocalLifecycleError } from '../../src/errors.js';

// =============================================================================
// Fake Runtime
// =============================================================================

interface RecordingRuntime extends ContainerRuntime {
  calls: string[];
  specs: ContainerSpec[];
}

function createRuntime(overrides: Partial<ContainerRuntime> = {}): RecordingRuntime {
  const calls: string[] = [];
  const specs: ContainerSpec[] = [];

  return {
    calls,
    specs,
    remove: async (name) => {
      calls.push(`remove ${name}`);
    },
    run: async (spec) => {
      calls.push(`run ${spec.name}`);
      specs.push(spec);
      return 0;
    },
    stop: async (name) => {
      calls.push(`stop ${name}`);
    },
    list: async () => [],
    ...overrides,
  };
}

const START = { name: 'devbox', version: '20200101000000', routerAddress: '10.42.0.0' };

describe('LocalRackManager', () => {
  it('removes a same-named container before starting a new one', async () => {
    const runtime = createRuntime();
    const manager = new LocalRackManager(runtime, { signals: new EventEmitter() });

    await manager.start(START);

    expect(runtime.calls).toEqual(['remove devbox', 'run devbox']);
  });

  it('runs the rack image in combined local mode', async () => {
    const runtime = createRuntime();
    const manager = new LocalRackManager(runtime, { platform: 'linux', signals: new EventEmitter() });

    await manager.start(START);

    expect(runtime.specs[0]).toEqual({
      name: 'devbox',
      image: `${DEFAULT_RACK_IMAGE}:20200101000000`,
      env: {
        COMBINED: 'true',
        PROVIDER: 'local',
        PROVIDER_ROUTER: '10.42.0.0',
        PROVIDER_VOLUME: '/var/rackctl',
        RACK: 'devbox',
        VERSION: '20200101000000',
      },
      labels: { rack: 'devbox', type: 'rack' },
      memory: '256m',
      ports: ['5443'],
      volumes: ['/var/rackctl:/var/rackctl', '/var/run/docker.sock:/var/run/docker.sock'],
    });
  });

  it('stores data under /Users/Shared on macOS', () => {
    const manager = new LocalRackManager(createRuntime(), { platform: 'darwin', image: 'test/rack' });
    const spec = manager.buildSpec(START);

    expect(localStorageRoot('darwin')).toBe('/Users/Shared/rackctl');
    expect(spec.env.PROVIDER_VOLUME).toBe('/Users/Shared/rackctl');
    expect(spec.volumes[0]).toBe('/Users/Shared/rackctl:/var/rackctl');
    expect(spec.image).toBe('test/rack:20200101000000');
  });

  it('resolves with the container exit code', async () => {
    const runtime = createRuntime({ run: async () => 3 });
    const manager = new LocalRackManager(runtime, { signals: new EventEmitter() });

    await expect(manager.start(START)).resolves.toBe(3);
  });

  it('wraps a launch failure in LocalLifecycleError', async () => {
    const runtime = createRuntime({
      run: async () => {
        throw new Error('spawn docker ENOENT');
      },
    });
    const manager = new LocalRackManager(runtime, { signals: new EventEmitter() });

    const error = await manager.start(START).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LocalLifecycleError);
    expect(error).toMatchObject({
      message: 'Failed to start devbox: spawn docker ENOENT',
      rackName: 'devbox',
      code: 'LOCAL_LIFECYCLE',
    });
  });

  it('stops the container on a termination signal during the run', async () => {
    const signals = new EventEmitter();
    const onStopping = vi.fn();
    let finish: (code: number) => void = () => undefined;

    const runtime = createRuntime({
      run: () =>
        new Promise<number>((resolve) => {
          finish = resolve;
        }),
    });
    const stop = vi.spyOn(runtime, 'stop');
    const manager = new LocalRackManager(runtime, { signals, onStopping });

    const running = manager.start(START);
    // Let start() get past remove() and subscribe
    await new Promise((resolve) => setImmediate(resolve));

    signals.emit('SIGINT', 'SIGINT');
    signals.emit('SIGTERM', 'SIGTERM');
    finish(0);

    await expect(running).resolves.toBe(0);
    expect(stop).toHaveBeenCalledTimes(1);
    expect(stop).toHaveBeenCalledWith('devbox');
    expect(onStopping).toHaveBeenCalledWith('devbox');
    expect(signals.listenerCount('SIGINT')).toBe(0);
    expect(signals.listenerCount('SIGTERM')).toBe(0);
  });

  it('counts running local racks by label', async () => {
    const list = vi.fn().mockResolvedValue(['devbox', 'other']);
    const manager = new LocalRackManager(createRuntime({ list }));

    await expect(manager.discover()).resolves.toBe(2);
    await expect(manager.isRunning()).resolves.toBe(true);
    expect(list).toHaveBeenCalledWith('type=rack');
  });

  it('reports not running when discovery fails', async () => {
    const manager = new LocalRackManager(
      createRuntime({ list: vi.fn().mockRejectedValue(new Error('Cannot connect to the Docker daemon')) })
    );

    await expect(manager.isRunning()).resolves.toBe(false);
  });
});

describe('watchTerminationSignals', () => {
  it('calls stop at most once however many signals arrive', async () => {
    const source = new EventEmitter();
    const stop = vi.fn().mockResolvedValue(undefined);
    const onSignal = vi.fn();

    const watcher = watchTerminationSignals('devbox', stop, { source, onSignal });
    expect(watcher.triggered).toBe(false);

    source.emit('SIGINT', 'SIGINT');
    source.emit('SIGINT', 'SIGINT');
    source.emit('SIGTERM', 'SIGTERM');
    await watcher.stopping;

    expect(stop).toHaveBeenCalledTimes(1);
    expect(onSignal).toHaveBeenCalledTimes(1);
    expect(onSignal).toHaveBeenCalledWith('SIGINT', 'devbox');
    expect(watcher.triggered).toBe(true);
    watcher.dispose();
  });

  it('stops listening once disposed', () => {
    const source = new EventEmitter();
    const stop = vi.fn().mockResolvedValue(undefined);

    const watcher = watchTerminationSignals('devbox', stop, { source });
    watcher.dispose();
    watcher.dispose();
    source.emit('SIGINT', 'SIGINT');

    expect(stop).not.toHaveBeenCalled();
    expect(source.listenerCount('SIGINT')).toBe(0);
  });

  it('reports a failed stop instead of rejecting', async () => {
    const source = new EventEmitter();
    const failure = new Error('docker stop failed');
    const onError = vi.fn();

    const watcher = watchTerminationSignals('devbox', vi.fn().mockRejectedValue(failure), { source, onError });
    source.emit('SIGTERM', 'SIGTERM');
    await watcher.stopping;

    expect(onError).toHaveBeenCalledWith(failure, 'devbox');
    watcher.dispose();
  });
});

describe('buildRunArgs', () => {
  it('lays out docker run flags in order', () => {
    const args = buildRunArgs({
      name: 'devbox',
      image: 'rackctl/rack:1',
      env: { A: '1', B: 'two' },
      labels: { rack: 'devbox' },
      memory: '256m',
      ports: ['5443'],
      volumes: ['/var/rackctl:/var/rackctl'],
    });

    expect(args).toEqual([
      'run', '--rm', '-i',
      '-e', 'A=1',
      '-e', 'B=two',
      '--label', 'rack=devbox',
      '-m', '256m',
      '--name', 'devbox',
      '-p', '5443',
      '-v', '/var/rackctl:/var/rackctl',
      'rackctl/rack:1',
    ]);
  });
});
