/**
 * Utility exports
 */

// Polling utilities
export {
  awaitCondition,
  sleep,
  DEFAULT_LONG_TIMEOUT_MS,
  DEFAULT_POLL_INTERVAL_MS,
} from "./await-condition";
export type { Predicate, PollOptions } from "./await-condition";

// Filesystem utilities
export { fileExists } from "./file-exists";
export { moveFile } from "./move-file";
export {
  waitForFileCompletion,
  toPendingFile,
  DEFAULT_MARKER_SUFFIX,
} from "./wait-for-file-completion";

// Request utilities
export { parseRadius, formatRadius, MISSING_UNIT_WARNING } from "./parse-radius";
export type { ParsedRadius } from "./parse-radius";
export { formatCoordinates } from "./format-coordinates";
export { createSearchRequest, isFrame } from "./create-search-request";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  getUserConfigPath,
} from "./config";

// Tracking and logging
export { Tracker } from "./tracker";
export { Logger } from "./logger";
export * from "./errors";
