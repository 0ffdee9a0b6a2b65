export { TaskMonitor, type ChannelView, type MonitorStatus, type TaskMonitorOptions } from "./client/monitor.js";
export { EventChannel } from "./server/channel.js";
export {
  DEFAULT_CONFIG_FILE,
  ensureResultFolder,
  loadConfig,
  saveConfig,
  ToolkitConfigSchema,
  type LoadConfigOptions,
  type ToolkitConfig,
} from "./server/config.js";
export { docxFactory } from "./server/documents/docx.js";
export { PdfDocument, pdfLibrary, pdfTextExtractor } from "./server/documents/pdf.js";
export type * from "./server/documents/types.js";
export { openQuietly, systemOpener, type FileOpener } from "./server/opener.js";
export { uniquePath } from "./server/output-namer.js";
export { parsePageRanges } from "./server/range-parser.js";
export { TaskRunner, type TaskRunnerOptions } from "./server/runner.js";
export { createTaskSpec, type TaskSpecOptions } from "./server/task-spec.js";
export { CANCELED_MESSAGE, type TaskContext } from "./server/tasks/index.js";
export { createDefaultToolkit, type TaskToolkit } from "./server/toolkit.js";
export { AlreadyRunningError, ValidationError } from "./shared/errors.js";
export { createConsoleLogger, silentLogger, type ConsoleLoggerOptions, type Logger } from "./shared/logger.js";
export * from "./shared/params.js";
export * from "./shared/types.js";
