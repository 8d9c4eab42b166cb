/**
 * Container runtime boundary
 *
 * The local rack is a docker container. Everything the lifecycle manager
 * needs from docker goes through ContainerRuntime so the manager can be
 * exercised without a docker daemon.
 */

import { execFile, spawn } from 'node:child_process';
import { promisify } from 'node:util';
import { LocalLifecycleError, errorMessage } from '../errors.js';
import { logger } from '../api/logger.js';

const execFileAsync = promisify(execFile);

/**
 * Everything needed to launch one container
 */
export interface ContainerSpec {
  name: string;
  image: string;
  /** Environment, in insertion order */
  env: Record<string, string>;
  labels: Record<string, string>;
  /** Memory ceiling, docker notation (e.g. "256m") */
  memory: string;
  /** Container ports to publish */
  ports: string[];
  /** host:container bind mounts */
  volumes: string[];
}

export interface ContainerRuntime {
  /** Force-remove a container; succeeds when none exists */
  remove(name: string): Promise<void>;
  /** Run a container in the foreground with inherited stdio; resolves with its exit code */
  run(spec: ContainerSpec): Promise<number>;
  stop(name: string): Promise<void>;
  /** Names of running containers carrying the label (key=value) */
  list(label: string): Promise<string[]>;
}

/**
 * Build `docker run` arguments for a spec
 */
export function buildRunArgs(spec: ContainerSpec): string[] {
  const args = ['run', '--rm', '-i'];

  for (const [key, value] of Object.entries(spec.env)) {
    args.push('-e', `${key}=${value}`);
  }

  for (const [key, value] of Object.entries(spec.labels)) {
    args.push('--label', `${key}=${value}`);
  }

  args.push('-m', spec.memory);
  args.push('--name', spec.name);

  for (const port of spec.ports) {
    args.push('-p', port);
  }

  for (const volume of spec.volumes) {
    args.push('-v', volume);
  }

  args.push(spec.image);
  return args;
}

/**
 * ContainerRuntime over the docker CLI
 */
export class DockerRuntime implements ContainerRuntime {
  constructor(
    private readonly dockerBinary: string = 'docker',
    private readonly timeoutMs: number = 60000
  ) {}

  private async exec(args: string[]): Promise<string> {
    logger.debug('Running docker', { args });
    const { stdout } = await execFileAsync(this.dockerBinary, args, {
      timeout: this.timeoutMs,
      maxBuffer: 1024 * 1024,
    });
    return stdout;
  }

  async remove(name: string): Promise<void> {
    try {
      await this.exec(['rm', '-f', name]);
    } catch (error) {
      const message = errorMessage(error);
      if (message.includes('No such container')) {
        return;
      }
      throw new LocalLifecycleError(
        `docker rm -f ${name} failed: ${message}`,
        name,
        error instanceof Error ? error : undefined
      );
    }
  }

  run(spec: ContainerSpec): Promise<number> {
    const args = buildRunArgs(spec);
    logger.debug('Starting local rack container', { name: spec.name, image: spec.image });

    return new Promise((resolve, reject) => {
      const child = spawn(this.dockerBinary, args, { stdio: 'inherit' });

      child.on('error', (error) => {
        reject(new LocalLifecycleError(`Failed to launch ${spec.name}: ${error.message}`, spec.name, error));
      });

      child.on('close', (code) => {
        resolve(code ?? 0);
      });
    });
  }

  async stop(name: string): Promise<void> {
    try {
      await this.exec(['stop', name]);
    } catch (error) {
      throw new LocalLifecycleError(
        `docker stop ${name} failed: ${errorMessage(error)}`,
        name,
        error instanceof Error ? error : undefined
      );
    }
  }

  async list(label: string): Promise<string[]> {
    const stdout = await this.exec(['ps', '--filter', `label=${label}`, '--format', '{{.Names}}']);
    return stdout
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }
}
