/**
 * rack command - Show the rack's current state
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { SystemState } from '../api/types.js';
import { printKeyValues, verbose } from '../utils/output.js';
import { failureResult } from './result.js';

/**
 * Print a system snapshot as aligned label/value lines
 */
export function printSystem(system: SystemState): void {
  printKeyValues([
    ['Name', system.name],
    ['Status', system.status],
    ['Version', system.version],
    ['Count', system.count !== undefined && system.count > 0 ? system.count : undefined],
    ['Domain', system.domain],
    ['Region', system.region],
    ['Type', system.type],
  ]);
}

export async function rackCommand(ctx: CommandContext): Promise<CommandResult<SystemState>> {
  verbose('Executing rack command', ctx.options.verbose);

  try {
    const client = await ctx.client();
    const system = await client.getSystem();

    if (ctx.outputFormat === 'human') {
      printSystem(system);
    }

    return { success: true, message: `Rack ${system.name} is ${system.status}`, data: system };
  } catch (error) {
    return failureResult(error);
  }
}
