import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";

import {
  CHECKPOINT_FILE_VERSION,
  CheckpointFileSchema,
  CheckpointRecordSchema,
  type CheckpointFile,
  type CheckpointRecord,
  type CheckpointStore,
} from "./checkpoint.js";
import { CheckpointError } from "./errors.js";
import { isoNow } from "./utils.js";

// =============================================================================
// FILE STORE
// =============================================================================

/**
 * JSON checkpoint on disk. Each write replaces the whole document through a temp file, fsync and
 * rename, so its cost grows with the number of records. Writes are serialized; puts that arrive
 * while one is in flight share the next write, and each put resolves once a write holding its
 * record is on disk.
 */
export class FileCheckpointStore implements CheckpointStore {
  private loading: Promise<Map<string, CheckpointRecord>> | null = null;
  private writeChain: Promise<void> = Promise.resolve();
  private queuedWrite: Promise<void> | null = null;

  constructor(public readonly filePath: string) {}

  async exists(): Promise<boolean> {
    return fse.pathExists(this.filePath);
  }

  async load(): Promise<Map<string, CheckpointRecord>> {
    const records = await this.ensureLoaded();
    return new Map(records);
  }

  async get(taskId: string): Promise<CheckpointRecord | undefined> {
    const records = await this.ensureLoaded();
    return records.get(taskId);
  }

  async put(taskId: string, record: CheckpointRecord): Promise<void> {
    const parsed = CheckpointRecordSchema.safeParse(record);
    if (!parsed.success) {
      throw new CheckpointError(
        `Cannot checkpoint task ${taskId}: ${parsed.error.toString()}`,
        parsed.error,
      );
    }
    if (parsed.data.task_id !== taskId) {
      throw new CheckpointError(
        `Cannot checkpoint task ${taskId}: record belongs to ${parsed.data.task_id}`,
      );
    }

    const records = await this.ensureLoaded();
    records.set(taskId, parsed.data);
    await this.flush(records);
  }

  async clear(taskId: string): Promise<boolean> {
    const records = await this.ensureLoaded();
    if (!records.delete(taskId)) return false;
    await this.flush(records);
    return true;
  }

  private ensureLoaded(): Promise<Map<string, CheckpointRecord>> {
    if (!this.loading) {
      this.loading = readCheckpointFile(this.filePath);
      this.loading.catch(() => {
        this.loading = null;
      });
    }
    return this.loading;
  }

  private flush(records: Map<string, CheckpointRecord>): Promise<void> {
    if (this.queuedWrite) return this.queuedWrite;

    const next = this.writeChain.then(() => {
      // The document is taken when the write starts, so it holds every record set before then.
      this.queuedWrite = null;
      const document: CheckpointFile = {
        version: CHECKPOINT_FILE_VERSION,
        updated_at: isoNow(),
        records: Object.fromEntries(records),
      };
      return writeCheckpointFile(this.filePath, document);
    });
    this.queuedWrite = next;
    // Keep the chain alive after a failed write; the failure still reaches every waiting caller.
    this.writeChain = next.catch(() => undefined);
    return next;
  }
}

// =============================================================================
// MEMORY STORE
// =============================================================================

export class MemoryCheckpointStore implements CheckpointStore {
  private readonly records = new Map<string, CheckpointRecord>();

  constructor(initial: Iterable<CheckpointRecord> = []) {
    for (const record of initial) {
      this.records.set(record.task_id, { ...record });
    }
  }

  async load(): Promise<Map<string, CheckpointRecord>> {
    return new Map(this.records);
  }

  async get(taskId: string): Promise<CheckpointRecord | undefined> {
    return this.records.get(taskId);
  }

  async put(taskId: string, record: CheckpointRecord): Promise<void> {
    this.records.set(taskId, CheckpointRecordSchema.parse(record));
  }

  async clear(taskId: string): Promise<boolean> {
    return this.records.delete(taskId);
  }
}

// =============================================================================
// FILE IO
// =============================================================================

export async function readCheckpointFile(filePath: string): Promise<Map<string, CheckpointRecord>> {
  if (!(await fse.pathExists(filePath))) {
    return new Map();
  }

  let doc: unknown;
  try {
    doc = JSON.parse(await fse.readFile(filePath, "utf8"));
  } catch (err) {
    throw new CheckpointError(`Checkpoint at ${filePath} is not valid JSON`, err);
  }

  const parsed = CheckpointFileSchema.safeParse(doc);
  if (!parsed.success) {
    throw new CheckpointError(
      `Invalid checkpoint at ${filePath}: ${parsed.error.toString()}`,
      parsed.error,
    );
  }

  return new Map(Object.entries(parsed.data.records));
}

async function writeCheckpointFile(filePath: string, document: CheckpointFile): Promise<void> {
  await fse.ensureDir(path.dirname(filePath));

  const tmpPath = `${filePath}.${randomUUID()}.tmp`;
  const handle = await fs.open(tmpPath, "w");

  try {
    await handle.writeFile(JSON.stringify(document, null, 2) + "\n", "utf8");
    await handle.sync();
    await handle.close();
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await handle.close().catch(() => undefined);
    await fse.remove(tmpPath).catch(() => undefined);
    throw new CheckpointError(`Failed to write checkpoint at ${filePath}`, err);
  }
}
