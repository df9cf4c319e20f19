import type { CreateFields } from "../core/plan.js";
import type { RecordKind } from "../core/record-spec.js";
import { ProvisionerError } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type RemoteKey = string;

export type LinkResult =
  | { ok: true; linkType: string }
  | { ok: false; reason: "link_type_mismatch"; attempted: string[] };

/**
 * The three operations the engine needs from a tracker. Implementations own retries, rate
 * limiting and text sanitization; callers only see the final outcome.
 */
export interface RemoteTracker {
  create(kind: RecordKind, fields: CreateFields): Promise<RemoteKey>;
  link(sourceKey: RemoteKey, targetKey: RemoteKey, typeCandidates: string[]): Promise<LinkResult>;
  setField(key: RemoteKey, fieldName: string, value: string): Promise<void>;
}

// =============================================================================
// ERRORS
// =============================================================================

export class RemoteError extends ProvisionerError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "RemoteError";
  }
}

/** Retryable failure (429, 5xx, timeout, network) that outlived the attempt ceiling. */
export class TransientFailure extends RemoteError {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly statusCode?: number,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "TransientFailure";
  }
}

/** The tracker rejected the request outright; retrying will not help. */
export class PermanentFailure extends RemoteError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "PermanentFailure";
  }
}

export function isRejection(error: unknown): error is PermanentFailure {
  return error instanceof PermanentFailure;
}
