import { z } from "zod";

import type { TaskError } from "./plan.js";
import { isoNow } from "./utils.js";

// =============================================================================
// SCHEMAS
// =============================================================================

export const CheckpointStatusSchema = z.enum(["in_progress", "done", "failed", "skipped"]);
export type CheckpointStatus = z.infer<typeof CheckpointStatusSchema>;

export const TaskErrorKindSchema = z.enum([
  "transient",
  "permanent",
  "link_type_mismatch",
  "dependency_failed",
  "unexpected",
]);

export const CheckpointErrorSchema = z.object({
  kind: TaskErrorKindSchema,
  message: z.string(),
  status_code: z.number().int().optional(),
  attempted: z.array(z.string()).optional(),
  cause_task_id: z.string().optional(),
});

export type CheckpointErrorRecord = z.infer<typeof CheckpointErrorSchema>;

export const CheckpointRecordSchema = z.object({
  task_id: z.string().min(1),
  status: CheckpointStatusSchema,
  remote_key: z.string().optional(),
  link_type: z.string().optional(),
  error: CheckpointErrorSchema.optional(),
  attempts: z.number().int().nonnegative().default(0),
  updated_at: z.string(),
});

export type CheckpointRecord = z.infer<typeof CheckpointRecordSchema>;

export const CHECKPOINT_FILE_VERSION = 1;

export const CheckpointFileSchema = z.object({
  version: z.literal(CHECKPOINT_FILE_VERSION),
  updated_at: z.string(),
  records: z.record(CheckpointRecordSchema),
});

export type CheckpointFile = z.infer<typeof CheckpointFileSchema>;

// =============================================================================
// STORE CONTRACT
// =============================================================================

/**
 * Durable task outcome store. Writes resolve only once the record is on disk.
 * Single writer: two engines sharing one store is unsupported and not detected.
 */
export interface CheckpointStore {
  load(): Promise<Map<string, CheckpointRecord>>;
  get(taskId: string): Promise<CheckpointRecord | undefined>;
  put(taskId: string, record: CheckpointRecord): Promise<void>;
  clear(taskId: string): Promise<boolean>;
}

// =============================================================================
// RECORD HELPERS
// =============================================================================

export function toCheckpointError(error: TaskError): CheckpointErrorRecord {
  const record: CheckpointErrorRecord = { kind: error.kind, message: error.message };
  if (error.statusCode !== undefined) record.status_code = error.statusCode;
  if (error.attempted !== undefined) record.attempted = [...error.attempted];
  if (error.causeTaskId !== undefined) record.cause_task_id = error.causeTaskId;
  return record;
}

export function fromCheckpointError(record: CheckpointErrorRecord): TaskError {
  const error: TaskError = { kind: record.kind, message: record.message };
  if (record.status_code !== undefined) error.statusCode = record.status_code;
  if (record.attempted !== undefined) error.attempted = [...record.attempted];
  if (record.cause_task_id !== undefined) error.causeTaskId = record.cause_task_id;
  return error;
}

export function buildCheckpointRecord(args: {
  taskId: string;
  status: CheckpointStatus;
  previous?: CheckpointRecord;
  remoteKey?: string;
  linkType?: string;
  error?: TaskError;
  now?: string;
}): CheckpointRecord {
  const attempts = args.previous?.attempts ?? 0;
  const record: CheckpointRecord = {
    task_id: args.taskId,
    status: args.status,
    attempts: args.status === "in_progress" ? attempts + 1 : attempts,
    updated_at: args.now ?? isoNow(),
  };

  if (args.remoteKey !== undefined) record.remote_key = args.remoteKey;
  if (args.linkType !== undefined) record.link_type = args.linkType;
  if (args.error !== undefined) record.error = toCheckpointError(args.error);

  return record;
}

/**
 * Operator release: clears Failed entries (all of them, or the listed ids) plus every Skipped
 * entry, so the next run retries them. Returns the cleared task ids.
 */
export async function releaseFailedTasks(
  store: CheckpointStore,
  taskIds?: string[],
): Promise<string[]> {
  const records = await store.load();
  const only = taskIds ? new Set(taskIds) : null;
  const cleared: string[] = [];

  for (const [taskId, record] of records) {
    const releasable =
      record.status === "skipped" || (record.status === "failed" && (!only || only.has(taskId)));
    if (!releasable) continue;

    if (await store.clear(taskId)) {
      cleared.push(taskId);
    }
  }

  return cleared;
}
