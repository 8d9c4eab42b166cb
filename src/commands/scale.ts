/**
 * rack scale command - Change the rack's instance count or type
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { ScaleRequest, SystemState } from '../api/types.js';
import { InvalidParameterError } from '../errors.js';
import { verbose } from '../utils/output.js';
import { printSystem } from './rack.js';
import { failureResult } from './result.js';

export interface ScaleOptions {
  count?: number;
  type?: string;
}

/**
 * Validate scale options into a request; undefined when nothing changes
 *
 * @throws InvalidParameterError for a negative or fractional count, or an empty type
 */
export function buildScaleRequest(options: ScaleOptions): ScaleRequest | undefined {
  const request: ScaleRequest = {};

  if (options.count !== undefined) {
    if (!Number.isInteger(options.count) || options.count < 0) {
      throw new InvalidParameterError(`count=${options.count}`);
    }
    request.count = options.count;
  }

  if (options.type !== undefined) {
    if (options.type.trim().length === 0) {
      throw new InvalidParameterError('type=');
    }
    request.type = options.type.trim();
  }

  return request.count === undefined && request.type === undefined ? undefined : request;
}

/**
 * Scale the rack, then show its state; with no options only shows it
 */
export async function scaleCommand(
  ctx: CommandContext,
  options: ScaleOptions = {}
): Promise<CommandResult<SystemState>> {
  verbose(`Executing scale command: ${JSON.stringify(options)}`, ctx.options.verbose);

  try {
    const request = buildScaleRequest(options);
    const client = await ctx.client();

    if (request) {
      await client.scaleSystem(request);
    }

    const system = await client.getSystem();
    if (ctx.outputFormat === 'human') {
      printSystem(system);
    }

    return {
      success: true,
      message: request ? `Scaling ${system.name}` : `Rack ${system.name} is ${system.status}`,
      data: system,
    };
  } catch (error) {
    return failureResult(error);
  }
}
