export { provision } from "./app/provision.js";
export type {
  ProvisionOptions,
  ProvisionOutcome,
  ProvisionPreview,
  ProvisionRun,
} from "./app/provision.js";
export { createAppContext, type AppContext } from "./app/context.js";
export {
  runPlan,
  type RunPlanOptions,
  type RunResult,
  type RunStatus,
  type TaskOutcome,
} from "./app/engine/execution-engine.js";
export {
  reconcile,
  type CountDiscrepancy,
  type GroupDiscrepancy,
  type ReconciliationReport,
  type TaskIssue,
} from "./app/engine/reconciler.js";

export { buildPlan, computeExpectedCounts, type PlanSettings } from "./core/plan-builder.js";
export type {
  CreateFields,
  CreateTask,
  CreationTask,
  LinkTask,
  PlanCounts,
  RunPlan,
  SetFieldTask,
  TaskError,
  TaskStatus,
} from "./core/plan.js";
export {
  RecordSpecSchema,
  parseRecordSpecs,
  type RecordKind,
  type RecordSpec,
  type RecordSpecInput,
} from "./core/record-spec.js";
export {
  releaseFailedTasks,
  type CheckpointRecord,
  type CheckpointStore,
} from "./core/checkpoint.js";
export { FileCheckpointStore, MemoryCheckpointStore } from "./core/checkpoint-store.js";
export {
  applyPlaceholders,
  expandTemplate,
  loadMetadataSource,
  templateCounts,
  type MetadataSource,
  type MigrationMetadata,
  type MigrationTemplate,
} from "./core/metadata-source.js";
export { loadProjectConfig } from "./core/config-loader.js";
export type { ProjectConfig } from "./core/config.js";
export {
  CheckpointError,
  ConfigError,
  ProvisionerError,
  SpecValidationError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
} from "./core/errors.js";
export { formatErrorLines } from "./core/error-format.js";
export { JsonlLogger } from "./core/logger.js";
export { createStopSignal } from "./core/graceful-stop.js";
export { ensureBullets, sanitizeKey, sanitizeText } from "./core/sanitize.js";

export {
  PermanentFailure,
  RemoteError,
  TransientFailure,
  type LinkResult,
  type RemoteKey,
  type RemoteTracker,
} from "./remote/client.js";
export { JiraClient, normalizeBaseUrl, type JiraClientOptions } from "./remote/jira.js";
export { InMemoryTracker, type TrackerCall } from "./remote/mock.js";
export { RequestGate, type RequestGateOptions } from "./remote/request-gate.js";
export { createRemoteTracker } from "./remote/factory.js";
