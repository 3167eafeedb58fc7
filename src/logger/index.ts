export {
  debug,
  info,
  warn,
  error,
  withContext,
  resolveLogLevel,
} from "./logger";
