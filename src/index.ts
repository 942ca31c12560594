export { ArchiveRepository } from "./archive-repo.js";
export type { ChannelDirectory, ChannelScan, MinuteFile } from "./archive-repo.js";
export { loadConfig, parseConfig, ConfigError } from "./config.js";
export type {
  ArchiveConfig,
  ConsolidateConfig,
  DeviceConfig,
  GrapeConfig,
  ServiceConfig,
  UploadConfig,
  WatchdogConfig,
} from "./config.js";
export { ConsolidationPipeline, coverageProblem } from "./consolidate.js";
export type { ChannelConsolidation, ConsolidationResult } from "./consolidate.js";
export { createDaemonLogger, fetchDaemonLogs } from "./daemon-logs.js";
export type { DaemonLogQuery, DaemonLogRow } from "./daemon-logs.js";
export {
  CommandPowerController,
  HttpHealthProbe,
  PingGatewayCheck,
} from "./device-control.js";
export type {
  GatewayCheck,
  HealthProbe,
  PowerController,
  PowerState,
  ProbeOutcome,
} from "./device-control.js";
export {
  ArchiveError,
  ExternalToolError,
  MinuteNameParseError,
} from "./errors.js";
export type { ArchiveErrorKind } from "./errors.js";
export { GapRepairEngine } from "./gap-repair.js";
export type { ChannelRepairResult, DateRepairResult } from "./gap-repair.js";
export {
  ConsoleLogger,
  MemoryLogger,
  NullLogger,
  StructuredLogger,
} from "./logger.js";
export type { LogEntry, LogLevel, Logger } from "./logger.js";
export {
  expectedMinuteFileNames,
  parseMinuteFileName,
  renderMinuteFileName,
  tryParseMinuteFileName,
} from "./minute-name.js";
export type { ArchiveDate, MinuteName } from "./minute-name.js";
export { purgeEmptyDates } from "./retention.js";
export type { DateRetention } from "./retention.js";
export { ServiceManager, renderUnit } from "./service-unit.js";
export { LivenessRecord, WatchdogSupervisor } from "./supervisor.js";
export type {
  ProcessTable,
  StartOutcome,
  StopOutcome,
  SupervisorStatus,
} from "./supervisor.js";
export { runTool } from "./tools.js";
export type { ToolResult, ToolRunner } from "./tools.js";
export { uploadConsolidated, uploadArgs } from "./upload.js";
export { FleetWatchdog } from "./watchdog.js";
export type { CycleReport, DeviceCycleOutcome, ReceiverDevice } from "./watchdog.js";
