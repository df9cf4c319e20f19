import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { afterEach, describe, expect, it } from "vitest";

import { provision } from "../app/provision.js";
import { readCheckpointFile } from "../core/checkpoint-store.js";
import { UserFacingError } from "../core/errors.js";
import { InMemoryTracker } from "../remote/mock.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const FIXTURES = path.resolve(__dirname, "../../test/fixtures/migration");

const tempDirs: string[] = [];

function writeConfig(extra = ""): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "provision-"));
  tempDirs.push(dir);

  const configPath = path.join(dir, "provision.yaml");
  fs.writeFileSync(
    configPath,
    `
name: spoofing
source:
  template: ${path.join(FIXTURES, "template.json")}
  metadata: ${path.join(FIXTURES, "metadata.json")}
remote:
  provider: mock
${extra}`,
    "utf8",
  );
  return configPath;
}

async function captureUserFacingError(promise: Promise<unknown>): Promise<UserFacingError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof UserFacingError) return err;
    throw err;
  }
  throw new Error("expected a UserFacingError");
}

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

describe("provision", () => {
  it("previews the plan without a checkpoint on dry run", async () => {
    const configPath = writeConfig();

    const outcome = await provision({ configPath, dryRun: true, runId: "preview-1" });

    expect(outcome.mode).toBe("preview");
    expect(outcome.templateCounts).toEqual({ features: 3, stories: 4, subtasks: 48 });
    expect(outcome.plan.tasks).toHaveLength(62);
    expect(outcome.report.mode).toBe("preview");
    expect(outcome.report.expected.total).toEqual({
      features: 3,
      stories: 4,
      subtasks: 48,
      links: 4,
      fields: 3,
    });
    const home = process.env.PROVISIONER_HOME ?? "";
    expect(fs.existsSync(path.join(home, "state", "spoofing", "checkpoint.json"))).toBe(false);
  });

  it("runs against the mock tracker, writes the report and resumes idempotently", async () => {
    const configPath = writeConfig();

    const first = await provision({ configPath, runId: "run-1" });
    if (first.mode !== "run") throw new Error("expected a run outcome");

    expect(first.result.status).toBe("complete");
    expect(first.result.remoteCalls).toBe(62);
    expect(first.report.complete).toBe(true);

    const report: unknown = JSON.parse(fs.readFileSync(first.reportPath, "utf8"));
    expect(report).toMatchObject({ mode: "post_run", projectKey: "SURV", complete: true });
    expect(fs.existsSync(first.logPath)).toBe(true);

    const records = await readCheckpointFile(first.checkpointPath);
    expect(records.size).toBe(62);
    expect(records.get("feeds.feature.1")).toMatchObject({ status: "done", remote_key: "SURV-1" });

    const second = await provision({ configPath, runId: "run-2" });
    if (second.mode !== "run") throw new Error("expected a run outcome");

    expect(second.result.remoteCalls).toBe(0);
    expect(second.result.resumed).toBe(true);
    expect(second.report.complete).toBe(true);
  });

  it("reports failed links and skipped sub-tasks without failing the run", async () => {
    const configPath = writeConfig();
    const tracker = new InMemoryTracker({ linkTypes: ["Blocks"] });

    const outcome = await provision({ configPath, runId: "run-3", tracker });
    if (outcome.mode !== "run") throw new Error("expected a run outcome");

    expect(outcome.result.status).toBe("partial");
    expect(outcome.report.failed).toHaveLength(4);
    expect(outcome.report.skipped).toHaveLength(48);
    expect(outcome.report.discrepancies.total).toEqual([
      { kind: "subtasks", expected: 48, actual: 0, missing: 48 },
      { kind: "links", expected: 4, actual: 0, missing: 4 },
    ]);
    expect(outcome.report.complete).toBe(false);
  });

  it("requires a metadata source", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "provision-"));
    tempDirs.push(dir);
    const configPath = path.join(dir, "provision.yaml");
    fs.writeFileSync(configPath, "name: bare\nremote:\n  provider: mock\n", "utf8");

    const error = await captureUserFacingError(provision({ configPath, dryRun: true }));

    expect(error.title).toBe("Metadata source missing.");
    expect(error.message).toBe("No template or metadata file configured for bare.");
  });

  it("turns unreadable sources into record spec errors", async () => {
    const configPath = writeConfig();
    const missing = path.join(os.tmpdir(), "missing-template.json");

    const error = await captureUserFacingError(
      provision({ configPath, dryRun: true, templatePath: missing }),
    );

    expect(error.code).toBe("SPEC_ERROR");
    expect(error.title).toBe("Record specs invalid.");
  });
});
