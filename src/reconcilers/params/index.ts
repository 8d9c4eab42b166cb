/**
 * Parameter reconciler exports
 */

export { parseParameterArgs, diffParameters } from './diff.js';
export { applyParameters, isNoopMessage } from './apply.js';
