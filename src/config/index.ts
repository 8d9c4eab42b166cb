/**
 * Configuration module exports
 */

export {
  resolveRackContext,
  loadConfigFile,
  defaultConfigPath,
  LOCAL_RACK_HOST,
  type RackContext,
  type RackContextSource,
  type RackConfigFile,
  type ResolveRackContextOptions,
} from './rack-context.js';

export { parseEnvFlag } from './env.js';
