/**
 * Command exports
 */

export { rackCommand, printSystem } from './rack.js';
export { updateCommand, type UpdateOptions, type UpdateData } from './update.js';
export {
  paramsListCommand,
  paramsSetCommand,
  type ParamsSetOptions,
  type ParamsSetData,
} from './params.js';
export { scaleCommand, buildScaleRequest, type ScaleOptions } from './scale.js';
export { releasesCommand, type ReleasesOptions, type ReleasesData, type ReleaseRow } from './releases.js';
export {
  localStartCommand,
  localStopCommand,
  localCountCommand,
  createLocalRackManager,
  type LocalStartCommandOptions,
  type LocalStopCommandOptions,
} from './local.js';
export { logsCommand, DEFAULT_LOG_SINCE, type LogsOptions, type LogsData } from './logs.js';
export { psCommand, processTable, type PsOptions, type PsData } from './ps.js';
export { failureResult } from './result.js';
