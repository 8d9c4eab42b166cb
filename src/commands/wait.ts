/**
 * "Waiting for completion" step shared by update and params set
 */

import type { SystemReader } from '../api/client.js';
import { waitForRack, type SuperviseOptions, type SupervisionResult } from '../rollout/index.js';
import type { Progress } from '../utils/output.js';

export async function waitForCompletion(
  reader: SystemReader,
  progress: Progress,
  options: SuperviseOptions = {}
): Promise<SupervisionResult> {
  progress.start('Waiting for completion');

  const result = await waitForRack(reader, {
    ...options,
    onRollback: (system) => {
      progress.fail('FAILED, rolling back');
      progress.start('Waiting for rollback');
      options.onRollback?.(system);
    },
  });

  progress.finish();
  return result;
}
