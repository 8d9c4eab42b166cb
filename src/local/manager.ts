/**
 * Local rack lifecycle
 *
 * A local rack is a single container running the rack image in combined
 * mode. Starting replaces any container with the same name and blocks until
 * the container exits; a termination signal stops it.
 */

import { LocalLifecycleError, errorMessage } from '../errors.js';
import { logger } from '../api/logger.js';
import type { ContainerRuntime, ContainerSpec } from './runtime.js';
import { watchTerminationSignals, type SignalSource } from './signals.js';

export const DEFAULT_LOCAL_RACK_NAME = 'rackctl';
export const DEFAULT_ROUTER_ADDRESS = '10.42.0.0';
export const DEFAULT_RACK_IMAGE = 'rackctl/rack';
export const LOCAL_RACK_LABEL = 'type=rack';
export const LOCAL_RACK_PORT = '5443';
export const LOCAL_RACK_MEMORY = '256m';
export const CONTAINER_STORAGE_PATH = '/var/rackctl';
export const DOCKER_SOCKET = '/var/run/docker.sock';

export interface LocalStartOptions {
  name: string;
  version: string;
  routerAddress: string;
}

export interface LocalRackManagerOptions {
  /** Image repository; the tag is the requested version */
  image?: string;
  platform?: NodeJS.Platform;
  signals?: SignalSource;
  /** Reported when a termination signal begins the stop */
  onStopping?: (name: string) => void;
}

/**
 * Host directory persisted into the rack container
 */
export function localStorageRoot(platform: NodeJS.Platform = process.platform): string {
  return platform === 'darwin' ? '/Users/Shared/rackctl' : CONTAINER_STORAGE_PATH;
}

export class LocalRackManager {
  private readonly image: string;
  private readonly platform: NodeJS.Platform;

  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly options: LocalRackManagerOptions = {}
  ) {
    this.image = options.image ?? DEFAULT_RACK_IMAGE;
    this.platform = options.platform ?? process.platform;
  }

  buildSpec(start: LocalStartOptions): ContainerSpec {
    return {
      name: start.name,
      image: `${this.image}:${start.version}`,
      env: {
        COMBINED: 'true',
        PROVIDER: 'local',
        PROVIDER_ROUTER: start.routerAddress,
        PROVIDER_VOLUME: localStorageRoot(this.platform),
        RACK: start.name,
        VERSION: start.version,
      },
      labels: {
        rack: start.name,
        type: 'rack',
      },
      memory: LOCAL_RACK_MEMORY,
      ports: [LOCAL_RACK_PORT],
      volumes: [
        `${localStorageRoot(this.platform)}:${CONTAINER_STORAGE_PATH}`,
        `${DOCKER_SOCKET}:${DOCKER_SOCKET}`,
      ],
    };
  }

  /**
   * Replace any existing container and run the rack in the foreground
   *
   * Resolves with the container's exit code once it exits.
   */
  async start(start: LocalStartOptions): Promise<number> {
    await this.runtime.remove(start.name);

    const watcher = watchTerminationSignals(start.name, () => this.stop(start.name), {
      source: this.options.signals,
      onSignal: (_signal, name) => this.options.onStopping?.(name),
    });

    try {
      return await this.runtime.run(this.buildSpec(start));
    } catch (error) {
      if (error instanceof LocalLifecycleError) {
        throw error;
      }
      throw new LocalLifecycleError(
        `Failed to start ${start.name}: ${errorMessage(error)}`,
        start.name,
        error instanceof Error ? error : undefined
      );
    } finally {
      watcher.dispose();
      if (watcher.stopping) {
        await watcher.stopping;
      }
    }
  }

  stop(name: string): Promise<void> {
    logger.debug('Stopping local rack', { name });
    return this.runtime.stop(name);
  }

  /**
   * Number of running local racks
   */
  async discover(): Promise<number> {
    const names = await this.runtime.list(LOCAL_RACK_LABEL);
    return names.length;
  }

  /**
   * Whether any local rack is running; discovery failures count as none
   */
  async isRunning(): Promise<boolean> {
    try {
      return (await this.discover()) > 0;
    } catch (error) {
      logger.debug('Local rack discovery failed', { error: errorMessage(error) });
      return false;
    }
  }
}
