export {
  type Logger,
  LOG_PREFIX,
  nullLogger,
  createConsoleLogger,
} from "./logger.js";

export {
  type DebugData,
  type DebugChannel,
  type DebugConfig,
  DEBUG_ENV_VAR,
  debug,
  configureDebug,
  resetDebugConfig,
  refreshDebugChannels,
  isDebugEnabled,
  parseDebugChannels,
  formatDebugMessage,
} from "./debug.js";

export { type SourcePath, sourcePath, joinSourcePath } from "./path.js";
