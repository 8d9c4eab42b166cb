/**
 * rackctl CLI - Manage racks and their releases
 *
 * Commands:
 * - rack: Show the rack's current state
 * - rack update: Move the rack to a newer release
 * - rack params / rack params set: List or change rack parameters
 * - rack scale: Change instance count or type
 * - rack releases: Show release history and available updates
 * - rack logs / rack ps: Stream rack logs or list rack processes
 * - rack start / rack stop / rack local: Manage a local rack
 */

import { Command, Option } from 'commander';
import type { GlobalOptions, CommandContext, CommandResult } from './types.js';
import { createRackClient, type RackClient } from './api/index.js';
import { parseEnvFlag, resolveRackContext } from './config/index.js';
import {
  rackCommand,
  updateCommand,
  paramsListCommand,
  paramsSetCommand,
  scaleCommand,
  releasesCommand,
  logsCommand,
  psCommand,
  DEFAULT_LOG_SINCE,
  localStartCommand,
  localStopCommand,
  localCountCommand,
  createLocalRackManager,
} from './commands/index.js';
import { printResult, error, verbose as verboseLog } from './utils/output.js';
import { formatError } from './errors.js';
import { VERSION } from './version.js';

/**
 * Create the command context from parsed options
 * The rack connection is resolved on first use of the client
 */
function createContext(options: GlobalOptions): CommandContext {
  let client: Promise<RackClient> | undefined;

  const connect = async (): Promise<RackClient> => {
    const rack = await resolveRackContext({
      rack: options.rack,
      isLocalRunning: () => createLocalRackManager().isRunning(),
    });

    verboseLog(`Using rack at ${rack.host} (via ${rack.source})`, options.verbose);

    return createRackClient({
      host: rack.host,
      password: rack.password,
      rack: rack.rack,
      clientVersion: VERSION,
      debug: options.verbose,
    });
  };

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    client: () => {
      client ??= connect();
      return client;
    },
  };
}

/**
 * Print a command result and exit with its status
 *
 * Human-mode commands print their own output, so only failures and notices
 * are repeated here.
 */
function finish<T>(ctx: CommandContext, result: CommandResult<T>): never {
  if (ctx.outputFormat === 'json') {
    printResult(result, ctx.outputFormat);
  } else if (!result.success || result.notice) {
    printResult(result, ctx.outputFormat);
  }
  process.exit(result.success ? 0 : 1);
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('rackctl')
  .description('Manage racks, their releases and local development racks')
  .version(VERSION)
  // Global options available to all commands
  .addOption(
    new Option('--rack <name>', 'Target rack')
      .env('RACKCTL_RACK')
  )
  .addOption(
    new Option('--json', 'Output JSON for CI/automation')
      .default(false)
  )
  .addOption(
    new Option('-v, --verbose', 'Enable verbose logging')
      .default(false)
  );

async function run<T>(
  label: string,
  command: (ctx: CommandContext) => Promise<CommandResult<T>>
): Promise<void> {
  const ctx = createContext(program.opts<GlobalOptions>());

  try {
    finish(ctx, await command(ctx));
  } catch (err) {
    error(`${label} failed: ${formatError(err)}`);
    process.exit(1);
  }
}

/**
 * --wait, on by default when RACKCTL_WAIT is a true value ("1", "true", ...)
 */
function waitOption(): Option {
  return new Option('--wait', 'Wait for the rack to finish updating (env: RACKCTL_WAIT)')
    .default(parseEnvFlag(process.env.RACKCTL_WAIT));
}

/**
 * rack command - Show rack state; parent of every rack subcommand
 */
const rack = program
  .command('rack')
  .description('Show information about the rack')
  .action(async () => {
    await run('Rack', (ctx) => rackCommand(ctx));
  });

/**
 * rack update command - Update the rack to a newer release
 */
rack
  .command('update')
  .description('Update the rack to the latest (or given) release')
  .argument('[version]', 'Release to update to', 'latest')
  .addOption(waitOption())
  .action(async (version: string, cmdOpts: { wait: boolean }) => {
    await run('Update', (ctx) => updateCommand(ctx, { version, wait: cmdOpts.wait }));
  });

/**
 * rack params command - List or set rack parameters
 */
const params = rack
  .command('params')
  .description('List rack parameters')
  .action(async () => {
    await run('Params', (ctx) => paramsListCommand(ctx));
  });

params
  .command('set')
  .description('Set rack parameters')
  .argument('<pairs...>', 'NAME=VALUE pairs')
  .addOption(waitOption())
  .option('--dry-run', 'Show what would change without applying it', false)
  .action(async (pairs: string[], cmdOpts: { wait: boolean; dryRun: boolean }) => {
    await run('Params set', (ctx) =>
      paramsSetCommand(ctx, { args: pairs, wait: cmdOpts.wait, dryRun: cmdOpts.dryRun })
    );
  });

/**
 * rack scale command - Scale the rack
 */
rack
  .command('scale')
  .description('Scale the rack')
  .option('--count <n>', 'Instance count')
  .option('--type <type>', 'Instance type')
  .action(async (cmdOpts: { count?: string; type?: string }) => {
    await run('Scale', (ctx) =>
      scaleCommand(ctx, {
        count: cmdOpts.count === undefined ? undefined : Number(cmdOpts.count),
        type: cmdOpts.type,
      })
    );
  });

/**
 * rack releases command - Show release history
 */
rack
  .command('releases')
  .description('List rack release history')
  .option('--unpublished', 'Include unpublished releases in the update check', false)
  .action(async (cmdOpts: { unpublished: boolean }) => {
    await run('Releases', (ctx) => releasesCommand(ctx, { unpublished: cmdOpts.unpublished }));
  });

/**
 * rack logs command - Stream the rack's logs
 */
rack
  .command('logs')
  .description('Stream the rack logs')
  .option('--filter <token>', 'Only lines containing this token')
  .option('--no-follow', 'Stop at the end of the current output')
  .option('--since <duration>', 'Start this far back, e.g. 10m or 1h2m10s', DEFAULT_LOG_SINCE)
  .action(async (cmdOpts: { filter?: string; follow: boolean; since: string }) => {
    await run('Logs', (ctx) =>
      logsCommand(ctx, { filter: cmdOpts.filter, follow: cmdOpts.follow, since: cmdOpts.since })
    );
  });

/**
 * rack ps command - List rack processes
 */
rack
  .command('ps')
  .description('List rack processes')
  .option('-a, --all', 'Include app processes', false)
  .option('--stats', 'Show CPU and memory usage', false)
  .action(async (cmdOpts: { all: boolean; stats: boolean }) => {
    await run('Ps', (ctx) => psCommand(ctx, { all: cmdOpts.all, stats: cmdOpts.stats }));
  });

/**
 * Local rack commands
 */
rack
  .command('start')
  .description('Run a local rack in the foreground')
  .option('--name <name>', 'Local rack name')
  .option('--router <address>', 'Router address')
  .action(async (cmdOpts: { name?: string; router?: string }) => {
    await run('Start', (ctx) => localStartCommand(ctx, { name: cmdOpts.name, router: cmdOpts.router }));
  });

rack
  .command('stop')
  .description('Stop a local rack')
  .option('--name <name>', 'Local rack name')
  .action(async (cmdOpts: { name?: string }) => {
    await run('Stop', (ctx) => localStopCommand(ctx, { name: cmdOpts.name }));
  });

rack
  .command('local')
  .description('Show how many local racks are running')
  .action(async () => {
    await run('Local', (ctx) => localCountCommand(ctx));
  });

program.parseAsync().catch((err: unknown) => {
  error(formatError(err));
  process.exit(1);
});
