import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { loadProjectConfig } from "../core/config-loader.js";
import { ConfigError, UserFacingError } from "../core/errors.js";

const tempDirs: string[] = [];

function writeConfig(filename: string, contents: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "config-loader-"));
  tempDirs.push(dir);

  const configPath = path.join(dir, filename);
  fs.writeFileSync(configPath, contents, "utf8");
  return configPath;
}

function captureConfigError(configPath: string): { error: UserFacingError; cause: ConfigError } {
  try {
    loadProjectConfig(configPath);
  } catch (err) {
    if (err instanceof UserFacingError && err.cause instanceof ConfigError) {
      return { error: err, cause: err.cause };
    }
    throw err;
  }
  throw new Error("expected config loading to fail");
}

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
  delete process.env.TEST_JIRA_TOKEN;
});

describe("loadProjectConfig", () => {
  it("expands environment variables, resolves relative paths and fills defaults", () => {
    process.env.TEST_JIRA_TOKEN = "test-secret";

    const configPath = writeConfig(
      "provision.yaml",
      `
name: spoofing-migration
checkpoint_path: state/checkpoint.json
source:
  template: ./templates/template.json
  metadata: metadata.json
remote:
  base_url: https://example.atlassian.net
  email: bot@example.com
  api_token: \${TEST_JIRA_TOKEN}
`,
    );
    const configDir = path.dirname(configPath);

    const config = loadProjectConfig(configPath);

    expect(config.remote.api_token).toBe("test-secret");
    expect(config.checkpoint_path).toBe(path.join(configDir, "state", "checkpoint.json"));
    expect(config.source).toEqual({
      template: path.join(configDir, "templates", "template.json"),
      metadata: path.join(configDir, "metadata.json"),
    });
    expect(config.project_key).toBeUndefined();
    expect(config.link_types).toBeUndefined();
    expect(config.max_parallel).toBe(4);
    expect(config.retry_transient_failures).toBe(false);
    expect(config.remote).toMatchObject({
      provider: "jira",
      max_attempts: 5,
      backoff_ms: 1500,
      max_backoff_ms: 30_000,
      timeout_ms: 45_000,
      max_concurrent_requests: 4,
      requests_per_second: 5,
    });
    expect(config.issue_types).toEqual({
      feature: "New Feature",
      story: "Story",
      subtask: "Sub-task",
    });
    expect(config.fields).toEqual({
      acceptance_criteria: "Acceptance criteria",
      epic_link: "Epic Link",
    });
  });

  it("accepts the mock provider without credentials", () => {
    const configPath = writeConfig(
      "mock.yaml",
      `
name: dry
project_key: SURV
link_types: [Relates, Cloners]
remote:
  provider: mock
`,
    );

    const config = loadProjectConfig(configPath);

    expect(config.remote.provider).toBe("mock");
    expect(config.link_types).toEqual(["Relates", "Cloners"]);
    expect(config.checkpoint_path).toBeUndefined();
  });

  it("requires credentials for the jira provider", () => {
    const configPath = writeConfig(
      "no-token.yaml",
      `
name: spoofing-migration
remote:
  base_url: https://example.atlassian.net
  email: bot@example.com
`,
    );

    const { error, cause } = captureConfigError(configPath);

    expect(error.title).toBe("Provisioning config invalid.");
    expect(error.message).toBe(`Provisioning config at ${configPath} is invalid.`);
    expect(cause.message).toBe(
      `Invalid provisioning config at ${configPath}:\nremote.api_token: Required when provider is "jira"`,
    );
  });

  it("names the missing environment variable and where it is used", () => {
    const configPath = writeConfig(
      "missing-env.yaml",
      `
name: spoofing-migration
remote:
  base_url: https://example.atlassian.net
  email: bot@example.com
  api_token: \${MISSING_TEST_TOKEN}
`,
    );

    const { cause } = captureConfigError(configPath);

    expect(cause.message).toBe(
      `Environment variable MISSING_TEST_TOKEN is not set but is referenced in ${configPath} (remote.api_token).`,
    );
  });

  it("surfaces validation errors with key paths and expected types", () => {
    const configPath = writeConfig(
      "invalid.yaml",
      `
name: spoofing-migration
max_parallel: "ten"
extra: true
remote:
  provider: mock
`,
    );

    const { cause } = captureConfigError(configPath);

    expect(cause.message).toContain("max_parallel: Expected number, received string");
    expect(cause.message).toContain("<root>: Unrecognized keys: extra");
  });

  it("reports YAML syntax errors with a location", () => {
    const configPath = writeConfig("broken.yaml", "name: [unclosed\n");

    const { cause } = captureConfigError(configPath);

    expect(cause.message).toMatch(
      /^Failed to parse YAML config at .*broken\.yaml \(line \d+, column \d+\): /,
    );
  });

  it("reports a missing config file", () => {
    const configPath = path.join(os.tmpdir(), "no-such-dir", "provision.yaml");

    let error: unknown;
    try {
      loadProjectConfig(configPath);
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(UserFacingError);
    expect(error).toMatchObject({
      code: "CONFIG_ERROR",
      title: "Provisioning config missing.",
      message: `Provisioning config not found at ${configPath}.`,
    });
  });
});
