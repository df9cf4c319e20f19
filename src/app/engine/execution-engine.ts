/*
Execution engine: walks a RunPlan against a tracker, one checkpoint write per status change.
Assumptions: the plan is topologically ordered and the store has a single writer.
Remote failures stay inside their branch; a failed checkpoint write stops the run.
*/

import {
  buildCheckpointRecord,
  fromCheckpointError,
  type CheckpointRecord,
  type CheckpointStore,
} from "../../core/checkpoint.js";
import { CheckpointError, SpecValidationError } from "../../core/errors.js";
import { formatErrorMessage } from "../../core/error-format.js";
import { buildStopController, type StopController } from "../../core/graceful-stop.js";
import { logRunEvent, logRunResume, type JsonObject, type JsonlLogger } from "../../core/logger.js";
import {
  findUnknownDependencies,
  indexTasks,
  type CreationTask,
  type RunPlan,
  type TaskError,
  type TaskOperation,
  type TaskStatus,
} from "../../core/plan.js";
import { defaultRunId } from "../../core/utils.js";
import {
  PermanentFailure,
  TransientFailure,
  type RemoteTracker,
} from "../../remote/client.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunPlanOptions = {
  /** Tasks in flight at once across all branches. Default: 4. */
  maxParallel?: number;
  signal?: AbortSignal;
  logger?: JsonlLogger;
  runId?: string;
  /** Re-attempt checkpointed failures whose error kind is `transient`. */
  retryTransientFailures?: boolean;
};

export type RunStatus = "complete" | "partial" | "stopped";

export type TaskOutcome = {
  taskId: string;
  groupKey: string;
  operation: TaskOperation;
  status: TaskStatus;
  remoteKey?: string;
  linkType?: string;
  error?: TaskError;
  /** True when this run issued the remote call. */
  dispatched: boolean;
};

export type RunResult = {
  runId: string;
  status: RunStatus;
  tasks: TaskOutcome[];
  counts: Record<TaskStatus, number>;
  remoteCalls: number;
  resumed: boolean;
  stopSignal?: string;
};

type OperationResult = {
  remoteKey?: string;
  linkType?: string;
};

type TaskState = {
  linkType?: string;
  dispatched: boolean;
};

const DEFAULT_MAX_PARALLEL = 4;

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runPlan(
  plan: RunPlan,
  store: CheckpointStore,
  tracker: RemoteTracker,
  options: RunPlanOptions = {},
): Promise<RunResult> {
  const maxParallel = options.maxParallel ?? DEFAULT_MAX_PARALLEL;
  assertMaxParallel(maxParallel);
  const unknownDeps = findUnknownDependencies(plan);
  if (unknownDeps.length > 0) {
    throw new SpecValidationError(unknownDeps);
  }

  const engine = new ExecutionEngine(plan, store, tracker, {
    runId: options.runId ?? defaultRunId(),
    maxParallel,
    logger: options.logger,
    retryTransientFailures: options.retryTransientFailures ?? false,
  });

  const stopController = buildStopController(options.signal);
  try {
    return await engine.run(stopController);
  } finally {
    stopController.cleanup();
  }
}

// =============================================================================
// ENGINE
// =============================================================================

type EngineSettings = {
  runId: string;
  maxParallel: number;
  logger?: JsonlLogger;
  retryTransientFailures: boolean;
};

class ExecutionEngine {
  private readonly byId: Map<string, CreationTask>;
  private readonly states = new Map<string, TaskState>();
  private records = new Map<string, CheckpointRecord>();
  private remoteCalls = 0;

  constructor(
    private readonly plan: RunPlan,
    private readonly store: CheckpointStore,
    private readonly tracker: RemoteTracker,
    private readonly settings: EngineSettings,
  ) {
    this.byId = indexTasks(plan);
  }

  async run(stop: StopController): Promise<RunResult> {
    const { runId, maxParallel } = this.settings;

    this.records = await this.store.load();
    const resumed = this.records.size > 0;
    this.restoreFromCheckpoint();

    this.log("run.start", {
      project_key: this.plan.projectKey,
      tasks: this.plan.tasks.length,
      max_parallel: maxParallel,
    });

    const inFlight = new Map<string, Promise<void>>();
    const busyGroups = new Set<string>();
    let fatal: unknown = null;
    let stopSignal: string | null = null;

    const launch = (task: CreationTask): void => {
      busyGroups.add(task.groupKey);
      const running = this.execute(task)
        .catch((err: unknown) => {
          fatal ??= err;
        })
        .finally(() => {
          inFlight.delete(task.id);
          busyGroups.delete(task.groupKey);
        });
      inFlight.set(task.id, running);
    };

    try {
      await this.propagateSkips();
    } catch (err) {
      fatal = err;
    }

    while (fatal === null) {
      if (stop.reason) {
        stopSignal = stop.reason.signal ?? "abort";
        break;
      }

      for (const task of this.plan.tasks) {
        if (inFlight.size >= maxParallel || stop.reason) break;
        if (task.status !== "pending" || busyGroups.has(task.groupKey)) continue;
        if (!this.dependenciesDone(task)) continue;
        launch(task);
      }

      if (inFlight.size === 0) break;
      await Promise.race(inFlight.values());

      if (fatal === null) {
        try {
          await this.propagateSkips();
        } catch (err) {
          fatal = err;
        }
      }
    }

    // In-flight calls always finish and record their outcome, even on stop.
    await Promise.all(inFlight.values());
    if (fatal !== null) {
      throw fatal;
    }

    const outcomes = this.plan.tasks.map((task) => this.outcomeFor(task));
    const counts = countStatuses(this.plan.tasks);
    // Pending tasks without a stop can only come from a dependency cycle.
    const status: RunStatus =
      stopSignal !== null && counts.pending > 0
        ? "stopped"
        : counts.failed > 0 || counts.skipped > 0 || counts.pending > 0
          ? "partial"
          : "complete";

    if (status === "stopped") {
      this.log("run.stop", { signal: stopSignal ?? "abort", pending_tasks: counts.pending });
    }
    this.log("run.complete", {
      status,
      remote_calls: this.remoteCalls,
      done: counts.done,
      failed: counts.failed,
      skipped: counts.skipped,
      pending: counts.pending,
    });

    const result: RunResult = {
      runId,
      status,
      tasks: outcomes,
      counts,
      remoteCalls: this.remoteCalls,
      resumed,
    };
    if (status === "stopped" && stopSignal !== null) {
      result.stopSignal = stopSignal;
    }
    return result;
  }

  // ===========================================================================
  // RESUME
  // ===========================================================================

  private restoreFromCheckpoint(): void {
    let doneTasks = 0;
    let failedTasks = 0;
    let interruptedTasks = 0;

    for (const task of this.plan.tasks) {
      this.states.set(task.id, { dispatched: false });
      task.status = "pending";
      task.remoteKey = undefined;
      task.lastError = undefined;

      const record = this.records.get(task.id);
      if (!record) continue;

      switch (record.status) {
        case "done":
          if (task.operation === "create" && !record.remote_key) {
            throw new CheckpointError(
              `Checkpoint marks ${task.id} done without a remote key; clear the entry to recreate it.`,
            );
          }
          task.status = "done";
          task.remoteKey = record.remote_key;
          this.setLinkType(task.id, record.link_type);
          doneTasks += 1;
          break;
        case "failed": {
          const error = record.error ? fromCheckpointError(record.error) : undefined;
          if (this.settings.retryTransientFailures && error?.kind === "transient") {
            break;
          }
          task.status = "failed";
          task.lastError = error;
          failedTasks += 1;
          break;
        }
        case "in_progress":
          interruptedTasks += 1;
          break;
        case "skipped":
          // Re-derived from the current failures below.
          break;
      }
    }

    if (this.records.size > 0) {
      logRunResume(this.settings.logger, { doneTasks, failedTasks, interruptedTasks });
    }
  }

  // ===========================================================================
  // DISPATCH
  // ===========================================================================

  private dependenciesDone(task: CreationTask): boolean {
    return task.dependsOn.every((dep) => this.byId.get(dep)?.status === "done");
  }

  private async execute(task: CreationTask): Promise<void> {
    const started = buildCheckpointRecord({
      taskId: task.id,
      status: "in_progress",
      previous: this.records.get(task.id),
    });
    await this.persist(started);

    task.status = "in_progress";
    this.markDispatched(task.id);
    this.log("task.start", {
      taskId: task.id,
      group_key: task.groupKey,
      operation: task.operation,
      attempt: started.attempts,
    });

    let result: OperationResult;
    try {
      this.remoteCalls += 1;
      result = await this.dispatch(task);
    } catch (err) {
      await this.fail(task, started, classifyError(err));
      return;
    }

    task.status = "done";
    if (result.remoteKey !== undefined) {
      task.remoteKey = result.remoteKey;
    }
    this.setLinkType(task.id, result.linkType);

    await this.persist(
      buildCheckpointRecord({
        taskId: task.id,
        status: "done",
        previous: started,
        remoteKey: result.remoteKey,
        linkType: result.linkType,
      }),
    );

    const fields: JsonObject = { group_key: task.groupKey, operation: task.operation };
    if (result.remoteKey !== undefined) fields.remote_key = result.remoteKey;
    if (result.linkType !== undefined) fields.link_type = result.linkType;
    this.log("task.done", { taskId: task.id, ...fields });
  }

  private async dispatch(task: CreationTask): Promise<OperationResult> {
    switch (task.operation) {
      case "create": {
        const parentKey =
          task.parentTaskId !== undefined ? this.remoteKeyOf(task.parentTaskId) : undefined;
        const fields = parentKey !== undefined ? { ...task.fields, parentKey } : { ...task.fields };
        const remoteKey = await this.tracker.create(task.kind, fields);
        return { remoteKey };
      }
      case "set_field": {
        const targetKey = this.remoteKeyOf(task.targetTaskId);
        await this.tracker.setField(targetKey, task.fieldName, task.value);
        return { remoteKey: targetKey };
      }
      case "link": {
        const sourceKey = this.remoteKeyOf(task.sourceTaskId);
        const targetKey = this.remoteKeyOf(task.targetTaskId);
        const result = await this.tracker.link(sourceKey, targetKey, task.linkTypeCandidates);
        if (!result.ok) {
          throw new LinkTypeMismatch(sourceKey, targetKey, result.attempted);
        }
        return { linkType: result.linkType };
      }
    }
  }

  private remoteKeyOf(taskId: string): string {
    const key = this.byId.get(taskId)?.remoteKey;
    if (!key) {
      throw new Error(`Task ${taskId} has no remote key`);
    }
    return key;
  }

  // ===========================================================================
  // FAILURE
  // ===========================================================================

  private async fail(task: CreationTask, started: CheckpointRecord, error: TaskError): Promise<void> {
    task.status = "failed";
    task.lastError = error;

    await this.persist(
      buildCheckpointRecord({ taskId: task.id, status: "failed", previous: started, error }),
    );

    const fields: JsonObject = {
      group_key: task.groupKey,
      operation: task.operation,
      error_kind: error.kind,
      message: error.message,
    };
    if (error.statusCode !== undefined) fields.status_code = error.statusCode;
    if (error.attempted !== undefined) fields.attempted = [...error.attempted];
    this.log("task.failed", { taskId: task.id, ...fields });
  }

  /** One pass suffices: dependencies always precede their dependents in plan order. */
  private async propagateSkips(): Promise<void> {
    for (const task of this.plan.tasks) {
      if (task.status !== "pending") continue;

      const blocker = task.dependsOn
        .map((dep) => this.byId.get(dep))
        .find((dep) => dep?.status === "failed" || dep?.status === "skipped");
      if (!blocker) continue;

      const causeTaskId = blocker.lastError?.causeTaskId ?? blocker.id;
      const error: TaskError = {
        kind: "dependency_failed",
        message: `Skipped because ${causeTaskId} failed`,
        causeTaskId,
      };

      task.status = "skipped";
      task.lastError = error;
      await this.persist(
        buildCheckpointRecord({
          taskId: task.id,
          status: "skipped",
          previous: this.records.get(task.id),
          error,
        }),
      );
      this.log("task.skipped", {
        taskId: task.id,
        group_key: task.groupKey,
        cause_task_id: causeTaskId,
      });
    }
  }

  // ===========================================================================
  // HELPERS
  // ===========================================================================

  private async persist(record: CheckpointRecord): Promise<void> {
    await this.store.put(record.task_id, record);
    this.records.set(record.task_id, record);
  }

  private markDispatched(taskId: string): void {
    const state = this.states.get(taskId);
    if (state) state.dispatched = true;
  }

  private setLinkType(taskId: string, linkType: string | undefined): void {
    const state = this.states.get(taskId);
    if (state) state.linkType = linkType;
  }

  private outcomeFor(task: CreationTask): TaskOutcome {
    const state = this.states.get(task.id);
    const outcome: TaskOutcome = {
      taskId: task.id,
      groupKey: task.groupKey,
      operation: task.operation,
      status: task.status,
      dispatched: state?.dispatched ?? false,
    };
    if (task.remoteKey !== undefined) outcome.remoteKey = task.remoteKey;
    if (state?.linkType !== undefined) outcome.linkType = state.linkType;
    if (task.lastError !== undefined) outcome.error = task.lastError;
    return outcome;
  }

  private log(type: string, fields: JsonObject & { taskId?: string }): void {
    logRunEvent(this.settings.logger, type, fields);
  }
}

// =============================================================================
// ERRORS
// =============================================================================

class LinkTypeMismatch extends Error {
  constructor(
    sourceKey: string,
    targetKey: string,
    public readonly attempted: string[],
  ) {
    super(
      `No link type accepted between ${sourceKey} and ${targetKey} (tried: ${attempted.join(", ") || "none"})`,
    );
    this.name = "LinkTypeMismatch";
  }
}

function classifyError(err: unknown): TaskError {
  if (err instanceof LinkTypeMismatch) {
    return { kind: "link_type_mismatch", message: err.message, attempted: [...err.attempted] };
  }
  if (err instanceof TransientFailure) {
    const error: TaskError = { kind: "transient", message: err.message };
    if (err.statusCode !== undefined) error.statusCode = err.statusCode;
    return error;
  }
  if (err instanceof PermanentFailure) {
    const error: TaskError = { kind: "permanent", message: err.message };
    if (err.statusCode !== undefined) error.statusCode = err.statusCode;
    return error;
  }
  return { kind: "unexpected", message: formatErrorMessage(err) };
}

// =============================================================================
// INTERNALS
// =============================================================================

function countStatuses(tasks: CreationTask[]): Record<TaskStatus, number> {
  const counts: Record<TaskStatus, number> = {
    pending: 0,
    in_progress: 0,
    done: 0,
    failed: 0,
    skipped: 0,
  };
  for (const task of tasks) {
    counts[task.status] += 1;
  }
  return counts;
}

function assertMaxParallel(maxParallel: number): void {
  if (!Number.isInteger(maxParallel) || maxParallel < 1) {
    throw new Error(`maxParallel must be a positive integer (received ${maxParallel})`);
  }
}
