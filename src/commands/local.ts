/**
 * Local rack commands - start, stop and count local racks
 */

import type { CommandContext, CommandResult } from '../types.js';
import {
  DEFAULT_LOCAL_RACK_NAME,
  DEFAULT_ROUTER_ADDRESS,
  DockerRuntime,
  LocalRackManager,
} from '../local/index.js';
import { info, success, verbose } from '../utils/output.js';
import { VERSION } from '../version.js';
import { failureResult } from './result.js';

export interface LocalStartCommandOptions {
  name?: string;
  router?: string;
  /** Image tag (default: the rackctl version) */
  version?: string;
  manager?: LocalRackManager;
}

export interface LocalStopCommandOptions {
  name?: string;
  manager?: LocalRackManager;
}

export interface LocalCountOptions {
  manager?: LocalRackManager;
}

/**
 * Manager over the docker CLI, honouring RACKCTL_DOCKER and RACKCTL_IMAGE
 */
export function createLocalRackManager(
  env: NodeJS.ProcessEnv = process.env,
  onStopping?: (name: string) => void
): LocalRackManager {
  return new LocalRackManager(new DockerRuntime(env.RACKCTL_DOCKER || 'docker'), {
    image: env.RACKCTL_IMAGE || undefined,
    onStopping,
  });
}

/**
 * Run a local rack in the foreground until it exits or is interrupted
 */
export async function localStartCommand(
  ctx: CommandContext,
  options: LocalStartCommandOptions = {}
): Promise<CommandResult<{ name: string; exitCode: number }>> {
  const name = options.name ?? DEFAULT_LOCAL_RACK_NAME;
  const human = ctx.outputFormat === 'human';
  const manager =
    options.manager ??
    createLocalRackManager(process.env, (stopping) => {
      if (human) info(`stopping: ${stopping}`);
    });

  verbose(`Starting local rack ${name}`, ctx.options.verbose);

  try {
    const exitCode = await manager.start({
      name,
      version: options.version ?? VERSION,
      routerAddress: options.router ?? DEFAULT_ROUTER_ADDRESS,
    });

    return {
      success: exitCode === 0,
      message: exitCode === 0 ? `Local rack ${name} exited` : `Local rack ${name} exited with code ${exitCode}`,
      data: { name, exitCode },
    };
  } catch (error) {
    return failureResult(error);
  }
}

export async function localStopCommand(
  ctx: CommandContext,
  options: LocalStopCommandOptions = {}
): Promise<CommandResult<{ name: string }>> {
  const name = options.name ?? DEFAULT_LOCAL_RACK_NAME;
  const manager = options.manager ?? createLocalRackManager();

  verbose(`Stopping local rack ${name}`, ctx.options.verbose);

  try {
    await manager.stop(name);
    if (ctx.outputFormat === 'human') success(`Stopped ${name}`);
    return { success: true, message: `Stopped ${name}`, data: { name } };
  } catch (error) {
    return failureResult(error);
  }
}

/**
 * Report how many local racks are running
 */
export async function localCountCommand(
  ctx: CommandContext,
  options: LocalCountOptions = {}
): Promise<CommandResult<{ running: number }>> {
  const manager = options.manager ?? createLocalRackManager();

  try {
    const running = await manager.discover();
    const message = running === 1 ? '1 local rack running' : `${running} local racks running`;
    if (ctx.outputFormat === 'human') info(message);
    return { success: true, message, data: { running } };
  } catch (error) {
    return failureResult(error);
  }
}
