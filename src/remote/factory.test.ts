import { describe, expect, it } from "vitest";

import { ProjectConfigSchema } from "../core/config.js";
import { UserFacingError } from "../core/errors.js";

import { createRemoteTracker } from "./factory.js";
import { JiraClient } from "./jira.js";
import { InMemoryTracker } from "./mock.js";

const JIRA_REMOTE = {
  base_url: "https://example.atlassian.net",
  email: "bot@example.com",
  api_token: "test-secret",
};

describe("createRemoteTracker", () => {
  it("builds the in-memory tracker with the configured link types", async () => {
    const config = ProjectConfigSchema.parse({
      name: "dry",
      link_types: ["Blocks"],
      remote: { provider: "mock" },
    });

    const tracker = createRemoteTracker(config);
    expect(tracker).toBeInstanceOf(InMemoryTracker);

    const fields = { projectKey: "SURV", summary: "x", description: "", labels: [] };
    const a = await tracker.create("story", fields);
    const b = await tracker.create("feature", fields);
    await expect(tracker.link(a, b, ["Blocks"])).resolves.toEqual({ ok: true, linkType: "Blocks" });
  });

  it("passes issue types and transport through to the Jira client", async () => {
    const config = ProjectConfigSchema.parse({
      name: "live",
      issue_types: { story: "User Story" },
      remote: JIRA_REMOTE,
    });
    const bodies: unknown[] = [];
    const fakeFetch: typeof fetch = async (_input, init) => {
      bodies.push(typeof init?.body === "string" ? JSON.parse(init.body) : undefined);
      return new Response(JSON.stringify({ key: "SURV-5" }), { status: 201 });
    };

    const tracker = createRemoteTracker(config, { fetch: fakeFetch, sleep: async () => {} });

    expect(tracker).toBeInstanceOf(JiraClient);
    await expect(
      tracker.create("story", { projectKey: "SURV", summary: "s", description: "", labels: [] }),
    ).resolves.toBe("SURV-5");
    expect(bodies).toEqual([
      {
        fields: {
          project: { key: "SURV" },
          issuetype: { name: "User Story" },
          summary: "s",
          description: "",
        },
      },
    ]);
  });

  it("reports missing credentials as a user-facing error", () => {
    const parsed = ProjectConfigSchema.parse({ name: "live", remote: JIRA_REMOTE });
    const config = { ...parsed, remote: { ...parsed.remote, api_token: undefined } };

    expect(() => createRemoteTracker(config)).toThrow(UserFacingError);
    expect(() => createRemoteTracker(config)).toThrow(
      "Jira base URL, email and API token are all required.",
    );
  });
});
