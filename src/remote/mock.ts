import type { CreateFields } from "../core/plan.js";
import type { RecordKind } from "../core/record-spec.js";
import { sanitizeKey, sanitizeText } from "../core/sanitize.js";

import {
  PermanentFailure,
  type LinkResult,
  type RemoteKey,
  type RemoteTracker,
} from "./client.js";

// =============================================================================
// TYPES
// =============================================================================

export type TrackerCall =
  | { op: "create"; kind: RecordKind; fields: CreateFields }
  | { op: "link"; sourceKey: RemoteKey; targetKey: RemoteKey; typeCandidates: string[] }
  | { op: "set_field"; key: RemoteKey; fieldName: string; value: string };

/** Return an error to make the call fail; it is thrown before any state changes. */
export type FailureInjection = (call: TrackerCall) => Error | undefined;

export type MockIssue = {
  key: RemoteKey;
  kind: RecordKind;
  fields: CreateFields;
  customFields: Record<string, string>;
};

export type MockLink = {
  sourceKey: RemoteKey;
  targetKey: RemoteKey;
  linkType: string;
};

export type InMemoryTrackerOptions = {
  /** Link type names the fake instance accepts. Default: ["Relates"]. */
  linkTypes?: string[];
  failWith?: FailureInjection;
};

// =============================================================================
// TRACKER
// =============================================================================

export class InMemoryTracker implements RemoteTracker {
  readonly calls: TrackerCall[] = [];
  readonly issues = new Map<RemoteKey, MockIssue>();
  readonly links: MockLink[] = [];

  private readonly linkTypes: string[];
  private readonly counters = new Map<string, number>();
  failWith?: FailureInjection;

  constructor(options: InMemoryTrackerOptions = {}) {
    this.linkTypes = options.linkTypes ?? ["Relates"];
    this.failWith = options.failWith;
  }

  countCalls(op: TrackerCall["op"]): number {
    return this.calls.filter((call) => call.op === op).length;
  }

  async create(kind: RecordKind, fields: CreateFields): Promise<RemoteKey> {
    this.record({ op: "create", kind, fields: { ...fields, labels: [...fields.labels] } });

    if (fields.parentKey && !this.issues.has(fields.parentKey)) {
      throw new PermanentFailure(`Parent issue does not exist: ${fields.parentKey}`, 400);
    }

    const projectKey = sanitizeKey(fields.projectKey);
    const next = (this.counters.get(projectKey) ?? 0) + 1;
    this.counters.set(projectKey, next);

    const key = `${projectKey}-${next}`;
    this.issues.set(key, {
      key,
      kind,
      fields: {
        ...fields,
        summary: sanitizeText(fields.summary, { multiline: false }),
        description: sanitizeText(fields.description),
      },
      customFields: {},
    });
    return key;
  }

  async link(
    sourceKey: RemoteKey,
    targetKey: RemoteKey,
    typeCandidates: string[],
  ): Promise<LinkResult> {
    this.record({ op: "link", sourceKey, targetKey, typeCandidates: [...typeCandidates] });
    this.requireIssue(sourceKey);
    this.requireIssue(targetKey);

    const attempted: string[] = [];
    for (const candidate of typeCandidates) {
      attempted.push(candidate);
      const accepted = this.linkTypes.find(
        (name) => name.toLowerCase() === candidate.trim().toLowerCase(),
      );
      if (accepted) {
        this.links.push({ sourceKey, targetKey, linkType: accepted });
        return { ok: true, linkType: accepted };
      }
    }

    return { ok: false, reason: "link_type_mismatch", attempted };
  }

  async setField(key: RemoteKey, fieldName: string, value: string): Promise<void> {
    this.record({ op: "set_field", key, fieldName, value });
    const issue = this.requireIssue(key);
    issue.customFields[fieldName] = sanitizeText(value);
  }

  private record(call: TrackerCall): void {
    this.calls.push(call);
    const failure = this.failWith?.(call);
    if (failure) throw failure;
  }

  private requireIssue(key: RemoteKey): MockIssue {
    const issue = this.issues.get(key);
    if (!issue) {
      throw new PermanentFailure(`Issue does not exist: ${key}`, 404);
    }
    return issue;
  }
}
