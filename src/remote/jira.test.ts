import { describe, expect, it } from "vitest";

import { PermanentFailure, TransientFailure } from "./client.js";
import { JiraClient, fieldValueVariants, normalizeBaseUrl, type JiraClientOptions } from "./jira.js";

type RecordedRequest = {
  method: string;
  url: string;
  body: unknown;
  authorization: string | null;
};

type FakeStep = Response | Error | ((init?: RequestInit) => Promise<Response>);

function createFakeFetch(steps: FakeStep[]): { fetchImpl: typeof fetch; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    requests.push({
      method: init?.method ?? "GET",
      url: String(input),
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
      authorization: new Headers(init?.headers).get("authorization"),
    });

    const step = steps.shift();
    if (!step) throw new Error(`unexpected request ${init?.method ?? "GET"} ${String(input)}`);
    if (step instanceof Error) throw step;
    if (typeof step === "function") return step(init);
    return step;
  };
  return { fetchImpl, requests };
}

function json(status: number, body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}

function empty(status: number): Response {
  return new Response(null, { status });
}

function createClient(steps: FakeStep[], overrides: Partial<JiraClientOptions> = {}) {
  const { fetchImpl, requests } = createFakeFetch(steps);
  const sleeps: number[] = [];
  const client = new JiraClient({
    baseUrl: "example.atlassian.net/rest/api/3/",
    email: "bot@example.com",
    apiToken: "test-secret",
    backoffMs: 100,
    maxAttempts: 3,
    fetch: fetchImpl,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    ...overrides,
  });
  return { client, requests, sleeps };
}

const STORY_FIELDS = {
  projectKey: "SURV",
  summary: "Story A",
  description: "Body",
  labels: [],
};

describe("JiraClient.create", () => {
  it("resolves the epic link field and posts a sanitized payload", async () => {
    const { client, requests } = createClient([
      json(200, [
        { id: "summary", name: "Summary" },
        { id: "customfield_10014", name: "Epic Link" },
      ]),
      json(201, { id: "10001", key: "SURV-7" }),
    ]);

    const key = await client.create("feature", {
      projectKey: "SURV",
      summary: "  “Feed Feature”  ",
      description: "Line one\\nLine two",
      labels: ["migration", "  "],
      epicKey: "SURV-1.",
    });

    expect(key).toBe("SURV-7");
    expect(requests.map((r) => `${r.method} ${r.url}`)).toEqual([
      "GET https://example.atlassian.net/rest/api/2/field",
      "POST https://example.atlassian.net/rest/api/2/issue",
    ]);
    expect(requests[1].body).toEqual({
      fields: {
        project: { key: "SURV" },
        issuetype: { name: "New Feature" },
        summary: "Feed Feature",
        description: "Line one\nLine two",
        labels: ["migration"],
        customfield_10014: "SURV-1",
      },
    });
    expect(requests[1].authorization).toBe(
      `Basic ${Buffer.from("bot@example.com:test-secret").toString("base64")}`,
    );
  });

  it("sends the parent key for sub-tasks", async () => {
    const { client, requests } = createClient([json(201, { key: "SURV-9" })]);

    await client.create("subtask", { ...STORY_FIELDS, parentKey: "SURV-8" });

    expect(requests[0].body).toEqual({
      fields: {
        project: { key: "SURV" },
        issuetype: { name: "Sub-task" },
        summary: "Story A",
        description: "Body",
        parent: { key: "SURV-8" },
      },
    });
  });

  it("retries rate limits and server errors, honouring Retry-After", async () => {
    const { client, requests, sleeps } = createClient([
      json(429, { errorMessages: ["slow down"] }, { "retry-after": "3" }),
      json(503, { errorMessages: ["unavailable"] }),
      json(201, { key: "SURV-2" }),
    ]);

    await expect(client.create("story", STORY_FIELDS)).resolves.toBe("SURV-2");
    expect(requests).toHaveLength(3);
    expect(sleeps).toEqual([3000, 200]);
  });

  it("surfaces a TransientFailure once attempts run out", async () => {
    const { client, sleeps } = createClient([
      json(503, {}),
      json(503, {}),
      json(503, {}),
    ]);

    const error = await client.create("story", STORY_FIELDS).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransientFailure);
    expect(error).toMatchObject({ attempts: 3, statusCode: 503 });
    expect(sleeps).toEqual([100, 200]);
  });

  it("treats network errors as transient", async () => {
    const { client, requests } = createClient([
      new TypeError("fetch failed"),
      json(201, { key: "SURV-3" }),
    ]);

    await expect(client.create("story", STORY_FIELDS)).resolves.toBe("SURV-3");
    expect(requests).toHaveLength(2);
  });

  it("counts a per-attempt timeout as transient", async () => {
    const hang = (init?: RequestInit): Promise<Response> =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => {
          reject(Object.assign(new Error("aborted"), { name: "AbortError" }));
        });
      });
    const { client } = createClient([hang], { maxAttempts: 1, timeoutMs: 5 });

    await expect(client.create("story", STORY_FIELDS)).rejects.toThrow(
      "Jira request failed after 1 attempts: POST /issue :: request timed out",
    );
  });

  it("does not retry client errors", async () => {
    const { client, requests } = createClient([json(400, { errors: { summary: "required" } })]);

    const error = await client.create("story", STORY_FIELDS).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PermanentFailure);
    expect(error).toMatchObject({ statusCode: 400 });
    expect(requests).toHaveLength(1);
  });
});

describe("JiraClient.link", () => {
  const LINK_TYPES = {
    issueLinkTypes: [
      { name: "Relates", inward: "relates to", outward: "relates to" },
      { name: "Blocks", inward: "is blocked by", outward: "blocks" },
    ],
  };

  it("resolves candidates against the catalogue and falls back in order", async () => {
    const { client, requests } = createClient([
      json(200, LINK_TYPES),
      json(400, { errorMessages: ["No issue link type with name 'Relates' found."] }),
      empty(201),
    ]);

    const result = await client.link("SURV-2", "SURV-1", ["relates to", "Cloners"]);

    expect(result).toEqual({ ok: true, linkType: "Cloners" });
    expect(requests[1].body).toEqual({
      type: { name: "Relates" },
      inwardIssue: { key: "SURV-2" },
      outwardIssue: { key: "SURV-1" },
    });
    expect(requests[2].body).toMatchObject({ type: { name: "Cloners" } });
  });

  it("reports a mismatch when every candidate is rejected", async () => {
    const { client } = createClient([
      json(200, LINK_TYPES),
      json(404, { errorMessages: ["No issue link type with name 'Blocks' found."] }),
      json(400, {}),
    ]);

    const result = await client.link("SURV-2", "SURV-1", ["Blocks", "Cloners"]);

    expect(result).toEqual({ ok: false, reason: "link_type_mismatch", attempted: ["Blocks", "Cloners"] });
  });

  it("surfaces auth failures instead of trying the next candidate", async () => {
    const { client, requests } = createClient([
      json(200, { issueLinkTypes: [] }),
      json(401, { errorMessages: ["You are not authenticated."] }),
    ]);

    const error = await client.link("SURV-2", "SURV-1", ["Relates", "Blocks"]).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PermanentFailure);
    expect(error).toMatchObject({ statusCode: 401 });
    expect(requests.filter((r) => r.method === "POST")).toHaveLength(1);
  });

  it("surfaces a missing issue instead of reporting a link type mismatch", async () => {
    const { client, requests } = createClient([
      json(200, LINK_TYPES),
      json(404, { errorMessages: ["Issue Does Not Exist"] }),
    ]);

    const error = await client.link("SURV-404", "SURV-1", ["Relates", "Cloners"]).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PermanentFailure);
    expect(error).toMatchObject({ statusCode: 404 });
    expect(requests).toHaveLength(2);
  });
});

describe("JiraClient.setField", () => {
  it("maps the display name to a field id and retries with simpler values", async () => {
    const { client, requests } = createClient([
      json(200, [{ id: "customfield_10200", name: "Acceptance criteria" }]),
      json(400, { errors: { customfield_10200: "Operation value must be a string" } }),
      empty(204),
      empty(204),
    ]);

    await client.setField("SURV-3", "Acceptance criteria", "* one\n* two");
    await client.setField("SURV-4", "acceptance criteria", "done");

    expect(requests.map((r) => `${r.method} ${r.url}`)).toEqual([
      "GET https://example.atlassian.net/rest/api/2/field",
      "PUT https://example.atlassian.net/rest/api/2/issue/SURV-3",
      "PUT https://example.atlassian.net/rest/api/2/issue/SURV-3",
      "PUT https://example.atlassian.net/rest/api/2/issue/SURV-4",
    ]);
    expect(requests[1].body).toEqual({ fields: { customfield_10200: "* one\n* two" } });
    expect(requests[2].body).toEqual({ fields: { customfield_10200: "* one * two" } });
  });

  it("fails permanently for an unknown field", async () => {
    const { client } = createClient([json(200, [{ id: "summary", name: "Summary" }])]);

    await expect(client.setField("SURV-3", "Unknown", "x")).rejects.toThrow(
      "Jira field not found: Unknown",
    );
  });
});

describe("helpers", () => {
  it("normalizes base URLs", () => {
    expect(normalizeBaseUrl("example.atlassian.net")).toBe("https://example.atlassian.net");
    expect(normalizeBaseUrl("https://jira.example.com/rest/api/2/")).toBe("https://jira.example.com");
    expect(normalizeBaseUrl("http://localhost:8080/")).toBe("http://localhost:8080");
  });

  it("derives distinct value variants", () => {
    expect(fieldValueVariants('"Quoted" text')).toEqual(['"Quoted" text', "Quoted text"]);
    expect(fieldValueVariants("   ")).toEqual([]);
  });
});
