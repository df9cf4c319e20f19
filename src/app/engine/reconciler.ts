import { fromCheckpointError, type CheckpointRecord } from "../../core/checkpoint.js";
import {
  PLAN_COUNT_KEYS,
  countKeyForTask,
  emptyCounts,
  type CreateTask,
  type PlanCountKey,
  type PlanCounts,
  type RunPlan,
  type TaskError,
  type TaskOperation,
} from "../../core/plan.js";
import { findEmbeddedAcceptanceCriteria } from "../../core/record-spec.js";
import { isoNow } from "../../core/utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type ReconciliationMode = "preview" | "post_run";

export type CountDiscrepancy = {
  kind: PlanCountKey;
  expected: number;
  actual: number;
  missing: number;
};

export type GroupDiscrepancy = CountDiscrepancy & { groupKey: string };

export type TaskIssue = {
  taskId: string;
  groupKey: string;
  operation: TaskOperation;
  error?: TaskError;
};

export type AcceptanceCriteriaViolation = {
  taskId: string;
  groupKey: string;
  reason: string;
};

export type ReconciliationReport = {
  mode: ReconciliationMode;
  projectKey: string;
  generatedAt: string;
  expected: RunPlan["expected"];
  /** Done counts from the checkpoint; absent in preview mode. */
  actual?: RunPlan["expected"];
  discrepancies: {
    total: CountDiscrepancy[];
    byGroup: GroupDiscrepancy[];
  };
  failed: TaskIssue[];
  skipped: TaskIssue[];
  /** Tasks with no terminal checkpoint entry, including interrupted ones. */
  pending: string[];
  acceptanceCriteriaViolations: AcceptanceCriteriaViolation[];
  complete: boolean;
};

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Compares what the plan expects with what the checkpoint records as done.
 * Without a checkpoint the report is a dry-run preview: expected counts only, nothing missing.
 */
export function reconcile(
  plan: RunPlan,
  checkpoint?: Map<string, CheckpointRecord>,
  opts: { now?: string } = {},
): ReconciliationReport {
  const report: ReconciliationReport = {
    mode: checkpoint ? "post_run" : "preview",
    projectKey: plan.projectKey,
    generatedAt: opts.now ?? isoNow(),
    expected: plan.expected,
    discrepancies: { total: [], byGroup: [] },
    failed: [],
    skipped: [],
    pending: [],
    acceptanceCriteriaViolations: findAcceptanceCriteriaViolations(plan),
    complete: false,
  };

  if (!checkpoint) {
    return report;
  }

  const actual = countDone(plan, checkpoint);
  report.actual = actual;
  report.discrepancies.total = diffCounts(plan.expected.total, actual.total);
  report.discrepancies.byGroup = plan.groups.flatMap((groupKey) =>
    diffCounts(
      plan.expected.byGroup[groupKey] ?? emptyCounts(),
      actual.byGroup[groupKey] ?? emptyCounts(),
    ).map((entry) => ({ groupKey, ...entry })),
  );

  for (const task of plan.tasks) {
    const record = checkpoint.get(task.id);
    const status = record?.status;

    if (status === "failed" || status === "skipped") {
      const issue: TaskIssue = {
        taskId: task.id,
        groupKey: task.groupKey,
        operation: task.operation,
      };
      if (record?.error) issue.error = fromCheckpointError(record.error);
      report[status].push(issue);
    } else if (status !== "done") {
      report.pending.push(task.id);
    }
  }

  report.complete =
    report.discrepancies.total.length === 0 &&
    report.failed.length === 0 &&
    report.skipped.length === 0 &&
    report.pending.length === 0 &&
    report.acceptanceCriteriaViolations.length === 0;

  return report;
}

// =============================================================================
// INTERNALS
// =============================================================================

function countDone(plan: RunPlan, checkpoint: Map<string, CheckpointRecord>): RunPlan["expected"] {
  const total = emptyCounts();
  const byGroup: Record<string, PlanCounts> = {};
  for (const groupKey of plan.groups) {
    byGroup[groupKey] = emptyCounts();
  }

  for (const task of plan.tasks) {
    if (checkpoint.get(task.id)?.status !== "done") continue;
    const key = countKeyForTask(task);
    const group = (byGroup[task.groupKey] ??= emptyCounts());
    group[key] += 1;
    total[key] += 1;
  }

  return { total, byGroup };
}

function diffCounts(expected: PlanCounts, actual: PlanCounts): CountDiscrepancy[] {
  return PLAN_COUNT_KEYS.filter((kind) => expected[kind] !== actual[kind]).map((kind) => ({
    kind,
    expected: expected[kind],
    actual: actual[kind],
    missing: expected[kind] - actual[kind],
  }));
}

function findAcceptanceCriteriaViolations(plan: RunPlan): AcceptanceCriteriaViolation[] {
  const creates = new Map<string, CreateTask>();
  for (const task of plan.tasks) {
    if (task.operation === "create") creates.set(task.id, task);
  }

  const violations: AcceptanceCriteriaViolation[] = [];
  for (const task of plan.tasks) {
    if (task.operation !== "set_field") continue;
    const target = creates.get(task.targetTaskId);
    if (!target) continue;

    const reason = findEmbeddedAcceptanceCriteria(target.fields.description, task.value);
    if (reason) {
      violations.push({ taskId: target.id, groupKey: target.groupKey, reason });
    }
  }
  return violations;
}
