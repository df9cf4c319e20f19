import { describe, expect, it } from "vitest";

import { PermanentFailure, TransientFailure } from "./client.js";
import { InMemoryTracker } from "./mock.js";

const FIELDS = { projectKey: "surv", summary: "Story A", description: "Body", labels: ["m"] };

describe("InMemoryTracker", () => {
  it("assigns sequential keys per project and records calls", async () => {
    const tracker = new InMemoryTracker();

    const first = await tracker.create("feature", FIELDS);
    const second = await tracker.create("subtask", { ...FIELDS, parentKey: first });

    expect([first, second]).toEqual(["SURV-1", "SURV-2"]);
    expect(tracker.issues.get(second)?.fields.parentKey).toBe("SURV-1");
    expect(tracker.countCalls("create")).toBe(2);
  });

  it("rejects a parent that does not exist", async () => {
    const tracker = new InMemoryTracker();

    await expect(tracker.create("subtask", { ...FIELDS, parentKey: "SURV-9" })).rejects.toThrow(
      PermanentFailure,
    );
    expect(tracker.issues.size).toBe(0);
  });

  it("accepts the first known link type, case-insensitively", async () => {
    const tracker = new InMemoryTracker({ linkTypes: ["Relates", "Blocks"] });
    const a = await tracker.create("story", FIELDS);
    const b = await tracker.create("feature", FIELDS);

    const result = await tracker.link(a, b, ["Cloners", " blocks "]);

    expect(result).toEqual({ ok: true, linkType: "Blocks" });
    expect(tracker.links).toEqual([{ sourceKey: a, targetKey: b, linkType: "Blocks" }]);
  });

  it("reports every attempted candidate on a mismatch", async () => {
    const tracker = new InMemoryTracker();
    const a = await tracker.create("story", FIELDS);
    const b = await tracker.create("feature", FIELDS);

    await expect(tracker.link(a, b, ["Cloners", "Duplicate"])).resolves.toEqual({
      ok: false,
      reason: "link_type_mismatch",
      attempted: ["Cloners", "Duplicate"],
    });
    expect(tracker.links).toEqual([]);
  });

  it("stores field values and rejects unknown issues", async () => {
    const tracker = new InMemoryTracker();
    const key = await tracker.create("story", FIELDS);

    await tracker.setField(key, "Acceptance criteria", "* done");

    expect(tracker.issues.get(key)?.customFields).toEqual({ "Acceptance criteria": "* done" });
    await expect(tracker.setField("SURV-99", "Acceptance criteria", "x")).rejects.toMatchObject({
      statusCode: 404,
    });
  });

  it("injects failures after recording the call", async () => {
    const tracker = new InMemoryTracker({
      failWith: (call) =>
        call.op === "create" ? new TransientFailure("server busy", 5, 503) : undefined,
    });

    await expect(tracker.create("story", FIELDS)).rejects.toThrow("server busy");
    expect(tracker.countCalls("create")).toBe(1);
    expect(tracker.issues.size).toBe(0);
  });
});
