export {
  createLogger,
  createRuntimeLogger,
  getLogger,
  type LoggerConfig,
  type LogLevel,
  resolveLogLevel,
  type RuntimeLogger,
  setRootLogger,
  wrapLogger,
} from "./logger";
