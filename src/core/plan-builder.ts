/**
 * Plan builder: expands validated record specs into an ordered task graph.
 * Purpose: fix every task id, dependency edge and expected count before any remote call.
 * Assumptions: task ids are derived from groupKey + kind + sequence, so they only stay stable
 * across runs when the metadata source yields records in the same order.
 */

import { SpecValidationError } from "./errors.js";
import {
  countKeyForTask,
  emptyCounts,
  type CreateTask,
  type CreationTask,
  type LinkTask,
  type PlanCounts,
  type RunPlan,
  type SetFieldTask,
} from "./plan.js";
import {
  findEmbeddedAcceptanceCriteria,
  parseRecordSpecs,
  type FeatureSpec,
  type RecordKind,
  type RecordSpec,
  type StorySpec,
  type SubTaskSpec,
} from "./record-spec.js";
import { sanitizeKey, sanitizeText } from "./sanitize.js";

// =============================================================================
// TYPES
// =============================================================================

export type PlanSettings = {
  projectKey: string;
  linkTypeCandidates: string[];
  labels?: string[];
  acceptanceCriteriaField?: string;
};

export const DEFAULT_ACCEPTANCE_CRITERIA_FIELD = "Acceptance criteria";

type SpecIndex = {
  byRef: Map<string, RecordSpec>;
  taskIds: Map<string, string>;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function buildPlan(input: unknown, settings: PlanSettings): RunPlan {
  const parsed = parseRecordSpecs(input);
  if (!parsed.ok) {
    throw new SpecValidationError(parsed.issues);
  }

  const specs = parsed.specs;
  const projectKey = sanitizeKey(settings.projectKey);
  const linkTypeCandidates = uniqueNonEmpty(
    settings.linkTypeCandidates.map((name) => sanitizeText(name, { multiline: false })),
  );

  const issues: string[] = [];
  if (!projectKey) {
    issues.push("projectKey is required");
  }

  const index = indexSpecs(specs, issues);
  validateSpecs(specs, index, linkTypeCandidates, issues);

  if (issues.length > 0) {
    throw new SpecValidationError(issues);
  }

  const tasks = emitTasks(specs, index, {
    projectKey,
    linkTypeCandidates,
    labels: settings.labels ?? [],
    acceptanceCriteriaField: settings.acceptanceCriteriaField ?? DEFAULT_ACCEPTANCE_CRITERIA_FIELD,
  });

  return {
    projectKey,
    tasks,
    groups: uniqueNonEmpty(tasks.map((task) => task.groupKey)),
    expected: computeExpectedCounts(tasks),
  };
}

export function computeExpectedCounts(tasks: CreationTask[]): RunPlan["expected"] {
  const total = emptyCounts();
  const byGroup: Record<string, PlanCounts> = {};

  for (const task of tasks) {
    const key = countKeyForTask(task);
    const group = (byGroup[task.groupKey] ??= emptyCounts());
    group[key] += 1;
    total[key] += 1;
  }

  return { total, byGroup };
}

// =============================================================================
// VALIDATION
// =============================================================================

function indexSpecs(specs: RecordSpec[], issues: string[]): SpecIndex {
  const byRef = new Map<string, RecordSpec>();
  const taskIds = new Map<string, string>();
  const sequences = new Map<string, number>();

  for (const spec of specs) {
    if (byRef.has(spec.ref)) {
      issues.push(`${spec.ref}: duplicate record ref`);
      continue;
    }
    byRef.set(spec.ref, spec);

    const sequenceKey = `${spec.groupKey}\u0000${spec.kind}`;
    const sequence = (sequences.get(sequenceKey) ?? 0) + 1;
    sequences.set(sequenceKey, sequence);
    taskIds.set(spec.ref, createTaskId(spec.groupKey, spec.kind, sequence));
  }

  return { byRef, taskIds };
}

function validateSpecs(
  specs: RecordSpec[],
  index: SpecIndex,
  linkTypeCandidates: string[],
  issues: string[],
): void {
  let needsLink = false;

  for (const spec of specs) {
    const embedded = findEmbeddedAcceptanceCriteria(spec.description, spec.acceptanceCriteria);
    if (embedded) {
      issues.push(`${spec.ref}: ${embedded}; move it to acceptanceCriteria`);
    }

    switch (spec.kind) {
      case "feature":
        if (!sanitizeKey(spec.epicRef ?? "")) {
          issues.push(`${spec.ref}: epic reference is required for features`);
        }
        break;
      case "story":
        if (spec.featureRef !== undefined) {
          needsLink = true;
          expectRefKind(spec.ref, spec.featureRef, "feature", index, issues);
        }
        break;
      case "subtask":
        expectRefKind(spec.ref, spec.parentRef, "story", index, issues);
        break;
    }
  }

  if (needsLink && linkTypeCandidates.length === 0) {
    issues.push("linkTypeCandidates must name at least one link type");
  }
}

function expectRefKind(
  ownerRef: string,
  targetRef: string,
  kind: RecordKind,
  index: SpecIndex,
  issues: string[],
): void {
  const target = index.byRef.get(targetRef);
  if (!target) {
    issues.push(`${ownerRef}: references unknown ${kind} "${targetRef}"`);
    return;
  }
  if (target.kind !== kind) {
    issues.push(`${ownerRef}: "${targetRef}" is a ${target.kind}, expected a ${kind}`);
  }
}

// =============================================================================
// TASK EMISSION
// =============================================================================

type EmitSettings = {
  projectKey: string;
  linkTypeCandidates: string[];
  labels: string[];
  acceptanceCriteriaField: string;
};

function emitTasks(specs: RecordSpec[], index: SpecIndex, settings: EmitSettings): CreationTask[] {
  const tasks: CreationTask[] = [];
  const features = specs.filter((spec): spec is FeatureSpec => spec.kind === "feature");
  const stories = specs.filter((spec): spec is StorySpec => spec.kind === "story");
  const subtasksByParent = groupSubtasksByParent(specs);

  // Features first so every Story that links across groups finds its Feature earlier in the plan.
  for (const feature of features) {
    const create = createTask(feature, index, settings, []);
    create.fields.epicKey = sanitizeKey(feature.epicRef ?? "");
    tasks.push(create, ...acceptanceCriteriaTasks(feature, create, settings));
  }

  for (const story of stories) {
    const featureTaskId = story.featureRef ? requireTaskId(index, story.featureRef) : undefined;
    const create = createTask(story, index, settings, featureTaskId ? [featureTaskId] : []);
    tasks.push(create, ...acceptanceCriteriaTasks(story, create, settings));

    let gateTaskId = create.id;
    if (featureTaskId) {
      const link = linkTask(create, featureTaskId, settings.linkTypeCandidates);
      tasks.push(link);
      gateTaskId = link.id;
    }

    for (const subtask of subtasksByParent.get(story.ref) ?? []) {
      const subCreate = createTask(subtask, index, settings, [gateTaskId]);
      subCreate.parentTaskId = create.id;
      tasks.push(subCreate, ...acceptanceCriteriaTasks(subtask, subCreate, settings));
    }
  }

  return tasks;
}

function groupSubtasksByParent(specs: RecordSpec[]): Map<string, SubTaskSpec[]> {
  const byParent = new Map<string, SubTaskSpec[]>();
  for (const spec of specs) {
    if (spec.kind !== "subtask") continue;
    const siblings = byParent.get(spec.parentRef) ?? [];
    siblings.push(spec);
    byParent.set(spec.parentRef, siblings);
  }
  return byParent;
}

function createTask(
  spec: RecordSpec,
  index: SpecIndex,
  settings: EmitSettings,
  dependsOn: string[],
): CreateTask {
  return {
    id: requireTaskId(index, spec.ref),
    groupKey: spec.groupKey,
    operation: "create",
    kind: spec.kind,
    ref: spec.ref,
    dependsOn,
    status: "pending",
    fields: {
      projectKey: settings.projectKey,
      summary: sanitizeText(spec.summary, { multiline: false }),
      description: sanitizeText(spec.description),
      labels: uniqueNonEmpty(
        [...settings.labels, ...(spec.labels ?? [])].map((label) =>
          sanitizeText(label, { multiline: false }),
        ),
      ),
    },
  };
}

function acceptanceCriteriaTasks(
  spec: RecordSpec,
  target: CreateTask,
  settings: EmitSettings,
): SetFieldTask[] {
  const value = sanitizeText(spec.acceptanceCriteria ?? "");
  if (!value) return [];

  return [
    {
      id: `${target.id}.ac`,
      groupKey: target.groupKey,
      operation: "set_field",
      kind: target.kind,
      targetTaskId: target.id,
      fieldName: settings.acceptanceCriteriaField,
      value,
      dependsOn: [target.id],
      status: "pending",
    },
  ];
}

function linkTask(story: CreateTask, featureTaskId: string, candidates: string[]): LinkTask {
  return {
    id: `${story.id}.link`,
    groupKey: story.groupKey,
    operation: "link",
    sourceTaskId: story.id,
    targetTaskId: featureTaskId,
    linkTypeCandidates: [...candidates],
    dependsOn: [story.id, featureTaskId],
    status: "pending",
  };
}

// =============================================================================
// HELPERS
// =============================================================================

function createTaskId(groupKey: string, kind: RecordKind, sequence: number): string {
  return `${groupKey}.${kind}.${sequence}`;
}

function requireTaskId(index: SpecIndex, ref: string): string {
  const id = index.taskIds.get(ref);
  if (!id) {
    throw new Error(`No task id assigned for record ref ${ref}`);
  }
  return id;
}

function uniqueNonEmpty(values: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const value of values) {
    if (!value || seen.has(value)) continue;
    seen.add(value);
    out.push(value);
  }
  return out;
}
