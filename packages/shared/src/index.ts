// Types
export type * from "./types/resource.js";
export type * from "./types/state.js";
export type * from "./types/plan.js";
export type * from "./types/config.js";
export type * from "./types/stack.js";

// Values
export { RESOURCE_KINDS } from "./types/resource.js";
export { configSchema, parseConfig } from "./types/config.js";
export {
  stackSchema,
  stackResourceSchema,
  corsDeclarationSchema,
  jsonValueSchema,
  parseStack,
} from "./types/stack.js";

// Utils
export { createLogger, setLogLevel, setLogSink, isLogLevel } from "./utils/logger.js";
export type { LogLevel, LogSink, Logger } from "./utils/logger.js";
export { retryWithAttempts, attemptsOf } from "./utils/retry.js";
export type { RetryOptions, RetryResult } from "./utils/retry.js";
