/**
 * rack logs command - Stream the rack's own logs
 */

import type { CommandContext, CommandResult } from '../types.js';
import { parseDuration } from '../utils/duration.js';
import { verbose } from '../utils/output.js';
import { failureResult } from './result.js';

export const DEFAULT_LOG_SINCE = '2m';

export interface LogsOptions {
  /** Only lines containing this token */
  filter?: string;
  /** Keep streaming new output (default: true) */
  follow?: boolean;
  /** How far back to start, e.g. "10m" (default: 2m) */
  since?: string;
  /** Where log text goes (default: stdout) */
  write?: (text: string) => void;
}

export interface LogsData {
  sinceMs: number;
  bytes: number;
}

/**
 * Copy the rack log stream to stdout until the rack closes it
 *
 * Log text is written as it arrives in both output modes.
 */
export async function logsCommand(
  ctx: CommandContext,
  options: LogsOptions = {}
): Promise<CommandResult<LogsData>> {
  try {
    const sinceMs = parseDuration(options.since ?? DEFAULT_LOG_SINCE);
    const follow = options.follow ?? true;
    const write = options.write ?? ((text: string) => process.stdout.write(text));

    verbose(`Streaming rack logs (since ${sinceMs}ms, follow: ${follow})`, ctx.options.verbose);

    const client = await ctx.client();
    let bytes = 0;
    await client.streamSystemLogs({ filter: options.filter, follow, sinceMs }, (text) => {
      bytes += text.length;
      write(text);
    });

    return { success: true, message: 'Log stream closed', data: { sinceMs, bytes } };
  } catch (error) {
    return failureResult(error);
  }
}
