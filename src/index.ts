/**
 * triz-guide
 *
 * A guided, resumable 60-step TRIZ research protocol.
 *
 * @packageDocumentation
 */

export { VERSION } from './version.js';
export * from './guided/index.js';
export { loadConfig, type Config, type LoadConfigOptions } from './config/index.js';
export { Logger, type LoggerOptions, type LogLevel } from './utils/logger.js';
export {
  createGuidedServer,
  startGuidedServer,
  GUIDED_TOOL_NAMES,
  type GuidedServerConfig,
  type GuidedServerStartOptions,
} from './servers/guided/index.js';
