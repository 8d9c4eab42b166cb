/**
 * rack params commands - List and set rack parameters
 */

import type { CommandContext, CommandResult, ParameterChange } from '../types.js';
import type { ParameterSet } from '../api/types.js';
import { applyParameters, diffParameters, parseParameterArgs } from '../reconcilers/params/index.js';
import { DEFAULT_GRACE_MS, type RolloutOutcome, type SuperviseOptions } from '../rollout/index.js';
import { Progress, printChanges, printTable, verbose } from '../utils/output.js';
import { failureResult } from './result.js';
import { waitForCompletion } from './wait.js';

export interface ParamsSetOptions {
  /** NAME=VALUE tokens */
  args: string[];
  wait?: boolean;
  /** Show the change set without applying it */
  dryRun?: boolean;
  supervise?: SuperviseOptions;
}

export interface ParamsSetData {
  params: ParameterSet;
  /** Only computed for a dry run */
  changes?: ParameterChange[];
  applied: boolean;
  outcome?: RolloutOutcome;
}

/**
 * List the rack's parameters sorted by name
 */
export async function paramsListCommand(ctx: CommandContext): Promise<CommandResult<ParameterSet>> {
  verbose('Executing params command', ctx.options.verbose);

  try {
    const client = await ctx.client();
    const system = await client.getSystem();
    const params = await client.listParameters(system.name);

    const sorted: ParameterSet = {};
    for (const name of Object.keys(params).sort()) {
      sorted[name] = params[name];
    }

    if (ctx.outputFormat === 'human') {
      printTable(['name', 'value'], Object.entries(sorted));
    }

    return { success: true, message: `${Object.keys(sorted).length} parameter(s)`, data: sorted };
  } catch (error) {
    return failureResult(error);
  }
}

/**
 * Set one or more parameters on the rack
 */
export async function paramsSetCommand(
  ctx: CommandContext,
  options: ParamsSetOptions
): Promise<CommandResult<ParamsSetData>> {
  const { options: globalOpts, outputFormat } = ctx;
  const progress = new Progress(outputFormat === 'human');

  try {
    const desired = parseParameterArgs(options.args);
    verbose(`Requested parameters: ${Object.keys(desired).join(', ')}`, globalOpts.verbose);

    const client = await ctx.client();
    const system = await client.getSystem();

    if (options.dryRun) {
      const changes = diffParameters(await client.listParameters(system.name), desired);
      if (outputFormat === 'human') {
        printChanges(changes);
      }
      return {
        success: true,
        message: `${changes.length} parameter change(s) would be applied`,
        data: { params: desired, changes, applied: false },
      };
    }

    progress.start('Updating parameters');
    await applyParameters(client, system.name, desired);
    progress.finish();

    const data: ParamsSetData = { params: desired, applied: true };

    if (options.wait) {
      const result = await waitForCompletion(client, progress, {
        graceMs: DEFAULT_GRACE_MS,
        ...options.supervise,
      });
      data.outcome = result.outcome;
    }

    return { success: true, message: `Parameters updated on ${system.name}`, data };
  } catch (error) {
    const result = failureResult<ParamsSetData>(error);
    if (result.notice) {
      progress.finish('NO CHANGES');
    } else {
      progress.fail();
    }
    return result;
  }
}
