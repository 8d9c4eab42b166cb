/**
 * rack releases command - Show the rack's release history
 */

import type { CommandContext, CommandResult } from '../types.js';
import { loadCatalog, newerVersionAvailable, type CatalogLoadOptions } from '../versions/index.js';
import { humanizeTime, info, printTable, verbose } from '../utils/output.js';
import { failureResult } from './result.js';

export interface ReleasesOptions {
  /** Consider unpublished releases for the update notice */
  unpublished?: boolean;
  catalog?: CatalogLoadOptions;
}

export interface ReleaseRow {
  id: string;
  createdAt?: string;
  status: '' | 'active' | 'updating';
}

export interface ReleasesData {
  releases: ReleaseRow[];
  /** Set when a newer release than the running (or pending) one exists */
  newVersion?: string;
}

export async function releasesCommand(
  ctx: CommandContext,
  options: ReleasesOptions = {}
): Promise<CommandResult<ReleasesData>> {
  verbose('Executing releases command', ctx.options.verbose);

  try {
    const client = await ctx.client();
    const system = await client.getSystem();
    const history = await client.listSystemReleases();

    // The newest entry is the version being rolled out while updating
    let pendingVersion = system.version;
    const releases: ReleaseRow[] = history.map((release, index) => {
      let status: ReleaseRow['status'] = '';
      if (system.status === 'updating' && index === 0) {
        pendingVersion = release.id;
        status = 'updating';
      }
      if (release.id === system.version) {
        status = 'active';
      }
      return { id: release.id, createdAt: release.createdAt, status };
    });

    const catalog = await loadCatalog({
      ...options.catalog,
      includeUnpublished: options.unpublished ?? options.catalog?.includeUnpublished,
    });
    const newVersion = newerVersionAvailable(catalog, system.version, pendingVersion);

    if (ctx.outputFormat === 'human') {
      printTable(
        ['version', 'updated', 'status'],
        releases.map((row) => [row.id, humanizeTime(row.createdAt), row.status])
      );
      if (newVersion) {
        console.log();
        info(`New version available: ${newVersion}`);
      }
    }

    return {
      success: true,
      message: `${releases.length} release(s)`,
      data: { releases, newVersion },
    };
  } catch (error) {
    return failureResult(error);
  }
}
