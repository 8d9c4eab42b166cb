/**
 * rack ps command - List the processes running on the rack
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { FormationEntry, RackProcess } from '../api/types.js';
import { humanizeTime, printTable, verbose } from '../utils/output.js';
import { failureResult } from './result.js';

export interface PsOptions {
  /** Include app processes, not only the rack's own */
  all?: boolean;
  /** Show CPU and memory instead of release and command */
  stats?: boolean;
}

export interface PsData {
  processes: RackProcess[];
  /** Memory limits per service, present with --stats */
  formation?: FormationEntry[];
}

function byAppThenName(a: RackProcess, b: RackProcess): number {
  return (
    (a.app ?? '').localeCompare(b.app ?? '') || a.name.localeCompare(b.name) || a.id.localeCompare(b.id)
  );
}

function formatMemory(usedMb: number | undefined, limitMb: number | undefined): string {
  if (usedMb === undefined) return '';
  const used = `${usedMb.toFixed(2)}MB`;
  return limitMb === undefined ? used : `${used} / ${limitMb}MB`;
}

/**
 * Table columns for `rack ps`; the app column only appears with --all
 */
export function processTable(
  processes: RackProcess[],
  options: PsOptions & { formation?: FormationEntry[]; now?: number } = {}
): { headers: string[]; rows: string[][] } {
  const sorted = [...processes].sort(byAppThenName);
  const withApp = (cells: string[], app: string): string[] =>
    options.all ? [cells[0], app, ...cells.slice(1)] : cells;

  if (options.stats) {
    const limits = new Map(
      (options.formation ?? []).map((entry): [string, number | undefined] => [entry.name, entry.memory])
    );
    return {
      headers: withApp(['id', 'name', 'release', 'cpu', 'mem'], 'app'),
      rows: sorted.map((ps) =>
        withApp(
          [
            ps.id,
            ps.name,
            ps.release ?? '',
            ps.cpu === undefined ? '' : `${ps.cpu.toFixed(2)}%`,
            formatMemory(ps.memory, limits.get(ps.name)),
          ],
          ps.app ?? ''
        )
      ),
    };
  }

  return {
    headers: withApp(['id', 'name', 'release', 'started', 'command'], 'app'),
    rows: sorted.map((ps) =>
      withApp(
        [ps.id, ps.name, ps.release ?? '', humanizeTime(ps.started, options.now), ps.command ?? ''],
        ps.app ?? ''
      )
    ),
  };
}

export async function psCommand(ctx: CommandContext, options: PsOptions = {}): Promise<CommandResult<PsData>> {
  verbose(`Executing ps command: ${JSON.stringify(options)}`, ctx.options.verbose);

  try {
    const client = await ctx.client();
    const system = await client.getSystem();
    const processes = await client.getSystemProcesses({ all: options.all });
    // Memory limits live on the rack's own app formation
    const formation = options.stats ? await client.listFormation(system.name) : undefined;

    if (ctx.outputFormat === 'human') {
      const table = processTable(processes, { ...options, formation });
      printTable(table.headers, table.rows);
    }

    return {
      success: true,
      message: `${processes.length} process(es) on ${system.name}`,
      data: { processes, formation },
    };
  } catch (error) {
    return failureResult(error);
  }
}
