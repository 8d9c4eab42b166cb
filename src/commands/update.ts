/**
 * rack update command - Move the rack to a newer release
 *
 * Plans the target from the version catalog (stopping at required releases),
 * triggers the update and, with --wait, supervises the rollout until the rack
 * is running again.
 */

import type { CommandContext, CommandResult } from '../types.js';
import { LATEST_TOKEN, loadCatalog, planUpdate, type CatalogLoadOptions } from '../versions/index.js';
import { DEFAULT_GRACE_MS, triggerUpdate, type RolloutOutcome, type SuperviseOptions } from '../rollout/index.js';
import { Progress, info, verbose, warn } from '../utils/output.js';
import { failureResult } from './result.js';
import { waitForCompletion } from './wait.js';

export interface UpdateOptions {
  /** Release id or "latest" (default) */
  version?: string;
  /** Block until the rack converges */
  wait?: boolean;
  catalog?: CatalogLoadOptions;
  supervise?: SuperviseOptions;
}

export interface UpdateData {
  from: string;
  to: string;
  requested: string;
  gated: boolean;
  warnings: string[];
  outcome?: RolloutOutcome;
  polls?: number;
}

export async function updateCommand(
  ctx: CommandContext,
  options: UpdateOptions = {}
): Promise<CommandResult<UpdateData>> {
  const { options: globalOpts, outputFormat } = ctx;
  const progress = new Progress(outputFormat === 'human');

  verbose(`Executing update command (requested: ${options.version ?? LATEST_TOKEN})`, globalOpts.verbose);

  try {
    const catalog = await loadCatalog(options.catalog);
    verbose(`Loaded ${catalog.size} release(s)`, globalOpts.verbose);

    // Fail on an unknown requested release before touching the rack
    catalog.resolve(options.version ?? LATEST_TOKEN);

    const client = await ctx.client();
    const system = await client.getSystem();
    const plan = planUpdate(catalog, system.version, options.version ?? LATEST_TOKEN);

    if (outputFormat === 'human') {
      if (plan.upToDate) {
        info(`Rack ${system.name} is already on ${plan.target.id}`);
      }
      plan.warnings.forEach((warning) => warn(warning));
    }

    const data: UpdateData = {
      from: system.version,
      to: plan.target.id,
      requested: plan.requested.id,
      gated: plan.gated,
      warnings: plan.warnings,
    };

    progress.start(`Updating to ${plan.target.id}`);
    await triggerUpdate(client, plan.target.id);
    progress.finish('UPDATING');

    if (options.wait) {
      const result = await waitForCompletion(client, progress, {
        graceMs: DEFAULT_GRACE_MS,
        ...options.supervise,
      });
      data.outcome = result.outcome;
      data.polls = result.polls;
    }

    return {
      success: true,
      message: options.wait
        ? `Rack ${system.name} updated to ${plan.target.id}`
        : `Rack ${system.name} is updating to ${plan.target.id}`,
      data,
    };
  } catch (error) {
    progress.fail();
    return failureResult(error);
  }
}
