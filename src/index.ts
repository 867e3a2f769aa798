export {
  mergeImport,
  originPass,
  destinationPass,
  MergeImportCoordinator,
  MergeImportState,
  type MergeImportOptions,
  type MergeImportRoots,
  type MergeImportReport,
  type PassContext,
} from "./merge-import.js";

export {
  describeOperation,
  type PlannedOperation,
  type TreeSide,
} from "./operations.js";

export type { MergeTool, MergeRequest, MergeOutcome } from "./merge-tool.js";

export {
  Diff3MergeTool,
  diff3Args,
  type Diff3Options,
  type Diff3Labels,
} from "./diff3.js";

export { diff3OptionsFromEnv, loggerFromEnv, parseExitCodes } from "./config.js";

export { MergeImportError, MergeToolError } from "./errors.js";

export { createIgnorer, type Ignorer } from "./ignore.js";

export {
  StructuredLogger,
  ConsoleLogger,
  NullLogger,
  memorySink,
  parseLogLevel,
  loggerFromLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogEntry,
  type Sink,
} from "./logger.js";
