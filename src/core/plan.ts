import type { RecordKind } from "./record-spec.js";

// =============================================================================
// TASKS
// =============================================================================

export type TaskOperation = "create" | "set_field" | "link";

export type TaskStatus = "pending" | "in_progress" | "done" | "failed" | "skipped";

export type TaskErrorKind =
  | "transient"
  | "permanent"
  | "link_type_mismatch"
  | "dependency_failed"
  | "unexpected";

export type TaskError = {
  kind: TaskErrorKind;
  message: string;
  statusCode?: number;
  attempted?: string[];
  causeTaskId?: string;
};

type TaskBase = {
  id: string;
  groupKey: string;
  dependsOn: string[];
  status: TaskStatus;
  remoteKey?: string;
  lastError?: TaskError;
};

export type CreateFields = {
  projectKey: string;
  summary: string;
  description: string;
  labels: string[];
  epicKey?: string;
  parentKey?: string;
};

export type CreateTask = TaskBase & {
  operation: "create";
  kind: RecordKind;
  ref: string;
  fields: Omit<CreateFields, "parentKey">;
  /** Sub-tasks only: the create task whose remote key becomes the parent. */
  parentTaskId?: string;
};

export type SetFieldTask = TaskBase & {
  operation: "set_field";
  kind: RecordKind;
  targetTaskId: string;
  fieldName: string;
  value: string;
};

export type LinkTask = TaskBase & {
  operation: "link";
  sourceTaskId: string;
  targetTaskId: string;
  linkTypeCandidates: string[];
};

export type CreationTask = CreateTask | SetFieldTask | LinkTask;

// =============================================================================
// PLAN
// =============================================================================

export type PlanCounts = {
  features: number;
  stories: number;
  subtasks: number;
  links: number;
  fields: number;
};

export type RunPlan = {
  projectKey: string;
  /** Topologically ordered: every task appears after all of its dependencies. */
  tasks: CreationTask[];
  groups: string[];
  expected: {
    total: PlanCounts;
    byGroup: Record<string, PlanCounts>;
  };
};

export type PlanCountKey = keyof PlanCounts;

export const PLAN_COUNT_KEYS: PlanCountKey[] = ["features", "stories", "subtasks", "links", "fields"];

export function emptyCounts(): PlanCounts {
  return { features: 0, stories: 0, subtasks: 0, links: 0, fields: 0 };
}

export function countKeyForTask(task: CreationTask): PlanCountKey {
  switch (task.operation) {
    case "link":
      return "links";
    case "set_field":
      return "fields";
    case "create":
      return countKeyForKind(task.kind);
  }
}

export function countKeyForKind(kind: RecordKind): PlanCountKey {
  switch (kind) {
    case "feature":
      return "features";
    case "story":
      return "stories";
    case "subtask":
      return "subtasks";
  }
}

export function indexTasks(plan: RunPlan): Map<string, CreationTask> {
  return new Map(plan.tasks.map((task) => [task.id, task]));
}

export function findUnknownDependencies(plan: RunPlan): string[] {
  const ids = new Set(plan.tasks.map((task) => task.id));
  const issues: string[] = [];
  for (const task of plan.tasks) {
    for (const dep of task.dependsOn) {
      if (!ids.has(dep)) issues.push(`${task.id}: depends on unknown task ${dep}`);
    }
  }
  return issues;
}
