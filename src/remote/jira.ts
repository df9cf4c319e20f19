import { z } from "zod";

import type { CreateFields } from "../core/plan.js";
import type { RecordKind } from "../core/record-spec.js";
import { sanitizeKey, sanitizeText } from "../core/sanitize.js";
import { delay } from "../core/utils.js";

import {
  PermanentFailure,
  RemoteError,
  TransientFailure,
  isRejection,
  type LinkResult,
  type RemoteKey,
  type RemoteTracker,
} from "./client.js";
import { RequestGate } from "./request-gate.js";

// =============================================================================
// TYPES
// =============================================================================

export type JiraIssueTypes = Record<RecordKind, string>;

export type JiraClientOptions = {
  baseUrl: string;
  email: string;
  apiToken: string;
  issueTypes?: Partial<JiraIssueTypes>;
  /** Display name of the field that files a Feature under its epic. */
  epicLinkField?: string;
  maxAttempts?: number;
  backoffMs?: number;
  maxBackoffMs?: number;
  timeoutMs?: number;
  gate?: RequestGate;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
};

type HttpMethod = "GET" | "POST" | "PUT";

type HttpOutcome = {
  status: number;
  text: string;
  retryAfterMs?: number;
};

export const DEFAULT_ISSUE_TYPES: JiraIssueTypes = {
  feature: "New Feature",
  story: "Story",
  subtask: "Sub-task",
};

const API_PREFIX = "/rest/api/2";
const DEFAULT_EPIC_LINK_FIELD = "Epic Link";
const DEFAULT_MAX_ATTEMPTS = 5;
const DEFAULT_BACKOFF_MS = 1500;
const DEFAULT_MAX_BACKOFF_MS = 30_000;
const DEFAULT_TIMEOUT_MS = 45_000;
const RETRIABLE_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);
const CUSTOM_FIELD_ID = /^customfield_\d+$/;

// =============================================================================
// RESPONSE SCHEMAS
// =============================================================================

const CreatedIssueSchema = z.object({ key: z.string().min(1) }).passthrough();

const FieldCatalogueSchema = z.array(
  z.object({ id: z.string(), name: z.string().default("") }).passthrough(),
);

const LinkTypeCatalogueSchema = z
  .object({
    issueLinkTypes: z
      .array(
        z
          .object({
            name: z.string().default(""),
            inward: z.string().default(""),
            outward: z.string().default(""),
          })
          .passthrough(),
      )
      .default([]),
  })
  .passthrough();

type LinkTypeEntry = z.infer<typeof LinkTypeCatalogueSchema>["issueLinkTypes"][number];

// =============================================================================
// CLIENT
// =============================================================================

export class JiraClient implements RemoteTracker {
  private readonly baseUrl: string;
  private readonly authHeader: string;
  private readonly issueTypes: JiraIssueTypes;
  private readonly epicLinkField: string;
  private readonly maxAttempts: number;
  private readonly backoffMs: number;
  private readonly maxBackoffMs: number;
  private readonly timeoutMs: number;
  private readonly gate: RequestGate;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;

  private fieldCatalogue: Promise<Map<string, string>> | null = null;
  private linkTypeCatalogue: Promise<LinkTypeEntry[]> | null = null;

  constructor(options: JiraClientOptions) {
    if (!options.baseUrl || !options.email || !options.apiToken) {
      throw new RemoteError("Jira base URL, email and API token are all required.");
    }

    this.baseUrl = normalizeBaseUrl(options.baseUrl);
    this.authHeader = `Basic ${Buffer.from(`${options.email}:${options.apiToken}`).toString("base64")}`;
    this.issueTypes = { ...DEFAULT_ISSUE_TYPES, ...options.issueTypes };
    this.epicLinkField = options.epicLinkField ?? DEFAULT_EPIC_LINK_FIELD;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.backoffMs = options.backoffMs ?? DEFAULT_BACKOFF_MS;
    this.maxBackoffMs = options.maxBackoffMs ?? DEFAULT_MAX_BACKOFF_MS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.gate = options.gate ?? new RequestGate();
    this.fetchImpl = options.fetch ?? fetch;
    this.sleep = options.sleep ?? delay;
  }

  async create(kind: RecordKind, fields: CreateFields): Promise<RemoteKey> {
    const payload: Record<string, unknown> = {
      project: { key: sanitizeKey(fields.projectKey) },
      issuetype: { name: this.issueTypes[kind] },
      summary: sanitizeText(fields.summary, { multiline: false }),
      description: sanitizeText(fields.description),
    };

    const labels = fields.labels
      .map((label) => sanitizeText(label, { multiline: false }))
      .filter((label) => label.length > 0);
    if (labels.length > 0) {
      payload.labels = labels;
    }
    if (fields.parentKey) {
      payload.parent = { key: sanitizeKey(fields.parentKey) };
    }
    if (fields.epicKey) {
      const epicFieldId = await this.resolveFieldId(this.epicLinkField);
      payload[epicFieldId] = sanitizeKey(fields.epicKey);
    }

    const response = await this.request("POST", "/issue", { fields: payload });
    const parsed = CreatedIssueSchema.safeParse(response);
    if (!parsed.success) {
      throw new PermanentFailure("Jira create issue response did not contain an issue key.");
    }
    return sanitizeKey(parsed.data.key);
  }

  async setField(key: RemoteKey, fieldName: string, value: string): Promise<void> {
    const fieldId = await this.resolveFieldId(fieldName);
    const issuePath = `/issue/${encodeURIComponent(sanitizeKey(key))}`;

    let lastRejection: PermanentFailure | undefined;
    for (const variant of fieldValueVariants(value)) {
      try {
        await this.request("PUT", issuePath, { fields: { [fieldId]: variant } });
        return;
      } catch (err) {
        if (!isRejection(err) || err.statusCode !== 400) throw err;
        lastRejection = err;
      }
    }

    throw (
      lastRejection ??
      new PermanentFailure(`No usable value to set ${fieldName} on ${key}: value is empty.`)
    );
  }

  async link(
    sourceKey: RemoteKey,
    targetKey: RemoteKey,
    typeCandidates: string[],
  ): Promise<LinkResult> {
    const names = await this.resolveLinkTypeNames(typeCandidates);
    const attempted: string[] = [];

    for (const name of names) {
      attempted.push(name);
      try {
        await this.request("POST", "/issueLink", {
          type: { name },
          inwardIssue: { key: sanitizeKey(sourceKey) },
          outwardIssue: { key: sanitizeKey(targetKey) },
        });
        return { ok: true, linkType: name };
      } catch (err) {
        if (!isLinkTypeRejection(err)) throw err;
      }
    }

    return { ok: false, reason: "link_type_mismatch", attempted };
  }

  // ===========================================================================
  // CATALOGUES
  // ===========================================================================

  private async resolveFieldId(fieldName: string): Promise<string> {
    const name = sanitizeText(fieldName, { multiline: false });
    if (CUSTOM_FIELD_ID.test(name)) return name;

    if (!this.fieldCatalogue) {
      this.fieldCatalogue = this.loadFieldCatalogue();
      this.fieldCatalogue.catch(() => {
        this.fieldCatalogue = null;
      });
    }

    const fieldId = (await this.fieldCatalogue).get(name.toLowerCase());
    if (!fieldId) {
      throw new PermanentFailure(`Jira field not found: ${name}`);
    }
    return fieldId;
  }

  private async loadFieldCatalogue(): Promise<Map<string, string>> {
    const response = await this.request("GET", "/field");
    const parsed = FieldCatalogueSchema.safeParse(response);
    if (!parsed.success) {
      throw new PermanentFailure("Jira field listing had an unexpected shape.");
    }

    const byName = new Map<string, string>();
    for (const field of parsed.data) {
      const name = sanitizeText(field.name, { multiline: false }).toLowerCase();
      if (name && !byName.has(name)) byName.set(name, field.id);
    }
    return byName;
  }

  private async resolveLinkTypeNames(candidates: string[]): Promise<string[]> {
    const catalogue = await this.loadLinkTypes();
    const names: string[] = [];

    for (const candidate of candidates) {
      const preferred = sanitizeText(candidate, { multiline: false });
      if (!preferred) continue;

      const wanted = preferred.toLowerCase();
      const match = catalogue.find((entry) =>
        [entry.name, entry.inward, entry.outward].some(
          (label) => sanitizeText(label, { multiline: false }).toLowerCase() === wanted,
        ),
      );
      const resolved = match ? sanitizeText(match.name, { multiline: false }) : preferred;
      if (!names.includes(resolved)) names.push(resolved);
    }

    return names;
  }

  private async loadLinkTypes(): Promise<LinkTypeEntry[]> {
    if (!this.linkTypeCatalogue) {
      this.linkTypeCatalogue = this.fetchLinkTypes();
      this.linkTypeCatalogue.catch(() => {
        this.linkTypeCatalogue = null;
      });
    }
    return this.linkTypeCatalogue;
  }

  private async fetchLinkTypes(): Promise<LinkTypeEntry[]> {
    try {
      const response = await this.request("GET", "/issueLinkType");
      const parsed = LinkTypeCatalogueSchema.safeParse(response);
      return parsed.success ? parsed.data.issueLinkTypes : [];
    } catch (err) {
      // Without the catalogue the candidates are sent as written.
      if (isRejection(err)) return [];
      throw err;
    }
  }

  // ===========================================================================
  // TRANSPORT
  // ===========================================================================

  private async request(method: HttpMethod, apiPath: string, body?: unknown): Promise<unknown> {
    const url = `${this.baseUrl}${API_PREFIX}${apiPath}`;
    let lastDetail = "no response";
    let lastStatus: number | undefined;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      let outcome: HttpOutcome;
      try {
        outcome = await this.gate.run(() => this.send(method, url, body));
      } catch (err) {
        lastDetail = describeNetworkError(err);
        lastStatus = undefined;
        if (attempt < this.maxAttempts) {
          await this.sleep(this.retryDelayMs(attempt));
          continue;
        }
        throw new TransientFailure(
          `Jira request failed after ${attempt} attempts: ${method} ${apiPath} :: ${lastDetail}`,
          attempt,
          undefined,
          err,
        );
      }

      if (RETRIABLE_STATUS_CODES.has(outcome.status)) {
        lastDetail = `${outcome.status} ${truncate(outcome.text)}`;
        lastStatus = outcome.status;
        if (attempt < this.maxAttempts) {
          await this.sleep(Math.max(this.retryDelayMs(attempt), outcome.retryAfterMs ?? 0));
          continue;
        }
        break;
      }

      if (outcome.status >= 400) {
        throw new PermanentFailure(
          `Jira API error ${outcome.status} ${method} ${apiPath}: ${truncate(outcome.text)}`,
          outcome.status,
        );
      }

      return parseBody(outcome.text);
    }

    throw new TransientFailure(
      `Jira request failed after ${this.maxAttempts} attempts: ${method} ${apiPath} :: ${lastDetail}`,
      this.maxAttempts,
      lastStatus,
    );
  }

  private async send(method: HttpMethod, url: string, body?: unknown): Promise<HttpOutcome> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    const headers: Record<string, string> = {
      Accept: "application/json",
      Authorization: this.authHeader,
    };
    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    try {
      const response = await this.fetchImpl(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
      const text = await response.text();
      return {
        status: response.status,
        text,
        retryAfterMs: parseRetryAfter(response.headers.get("retry-after")),
      };
    } finally {
      clearTimeout(timer);
    }
  }

  private retryDelayMs(attempt: number): number {
    return Math.min(this.maxBackoffMs, this.backoffMs * 2 ** (attempt - 1));
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/** Accepts the site root or a REST root, with or without scheme. */
export function normalizeBaseUrl(raw: string): string {
  let base = sanitizeText(raw, { multiline: false });
  if (!/^https?:\/\//i.test(base)) {
    base = `https://${base}`;
  }
  base = base.replace(/\/rest\/api\/[23]\/?$/i, "");
  return base.replace(/\/+$/, "");
}

export function fieldValueVariants(value: string): string[] {
  const base = sanitizeText(value);
  const candidates = [
    base,
    sanitizeText(value, { multiline: false }),
    base.replace(/["']/g, ""),
  ];

  const seen = new Set<string>();
  const variants: string[] = [];
  for (const candidate of candidates) {
    const trimmed = candidate.trim();
    if (!trimmed || seen.has(trimmed)) continue;
    seen.add(trimmed);
    variants.push(trimmed);
  }
  return variants;
}

/**
 * Only an unknown or unusable link type moves on to the next candidate; auth
 * failures and missing issues surface to the caller.
 */
function isLinkTypeRejection(err: unknown): err is PermanentFailure {
  if (!isRejection(err)) return false;
  if (err.statusCode === 400) return true;
  return err.statusCode === 404 && /link ?type/i.test(err.message);
}

function parseBody(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return text;
  }
}

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }
  const at = Date.parse(header);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - Date.now());
}

function describeNetworkError(err: unknown): string {
  if (err instanceof Error && err.name === "AbortError") {
    return "request timed out";
  }
  return err instanceof Error ? err.message : String(err);
}

function truncate(text: string, max = 500): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}
