import { z, type ZodIssue } from "zod";

import { sanitizeText } from "./sanitize.js";

// =============================================================================
// SCHEMAS
// =============================================================================

export const RecordKindSchema = z.enum(["feature", "story", "subtask"]);
export type RecordKind = z.infer<typeof RecordKindSchema>;

const RecordSpecBaseSchema = z.object({
  ref: z.string().min(1),
  groupKey: z.string().min(1),
  summary: z.string().min(1),
  description: z.string().default(""),
  acceptanceCriteria: z.string().optional(),
  labels: z.array(z.string()).optional(),
});

export const FeatureSpecSchema = RecordSpecBaseSchema.extend({
  kind: z.literal("feature"),
  epicRef: z.string().optional(),
}).strict();

export const StorySpecSchema = RecordSpecBaseSchema.extend({
  kind: z.literal("story"),
  featureRef: z.string().min(1).optional(),
}).strict();

export const SubTaskSpecSchema = RecordSpecBaseSchema.extend({
  kind: z.literal("subtask"),
  parentRef: z.string().min(1),
}).strict();

export const RecordSpecSchema = z.discriminatedUnion("kind", [
  FeatureSpecSchema,
  StorySpecSchema,
  SubTaskSpecSchema,
]);

export type FeatureSpec = z.infer<typeof FeatureSpecSchema>;
export type StorySpec = z.infer<typeof StorySpecSchema>;
export type SubTaskSpec = z.infer<typeof SubTaskSpecSchema>;
export type RecordSpec = z.infer<typeof RecordSpecSchema>;

/** Accepts loosely-typed input; `parseRecordSpecs` narrows it. */
export type RecordSpecInput = z.input<typeof RecordSpecSchema>;

// =============================================================================
// PARSING
// =============================================================================

export type RecordSpecParseResult =
  | { ok: true; specs: RecordSpec[] }
  | { ok: false; issues: string[] };

export function parseRecordSpecs(input: unknown): RecordSpecParseResult {
  const parsed = z.array(RecordSpecSchema).safeParse(input);
  if (parsed.success) {
    return { ok: true, specs: parsed.data };
  }
  return { ok: false, issues: parsed.error.issues.map(formatSpecIssue) };
}

function formatSpecIssue(issue: ZodIssue): string {
  const location = issue.path.length > 0 ? `records.${issue.path.join(".")}` : "records";

  if (issue.code === "invalid_union_discriminator") {
    const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
    return `${location}: Unrecognized record kind (expected one of ${options})`;
  }
  if (issue.code === "unrecognized_keys") {
    return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
  }
  if (issue.code === "invalid_type") {
    return `${location}: Expected ${issue.expected}, received ${issue.received}`;
  }

  return `${location}: ${issue.message}`;
}

// =============================================================================
// ACCEPTANCE CRITERIA SEPARATION
// =============================================================================

const AC_HEADING = /^\s*(?:h[1-6]\.\s*|#{1,6}\s*|\*+\s*)?acceptance[\s_-]*criteria\s*\**\s*[:\-]/im;

/**
 * Returns a reason when the description carries acceptance-criteria text, either as a heading
 * or as the criteria lines copied whole. Criteria appearing inside a longer line do not count.
 */
export function findEmbeddedAcceptanceCriteria(
  description: string,
  acceptanceCriteria?: string,
): string | null {
  if (AC_HEADING.test(description)) {
    return "description contains an acceptance criteria section";
  }

  const criteria = comparableLines(acceptanceCriteria ?? "");
  if (criteria.length === 0) return null;

  const lines = comparableLines(description);
  if (containsRun(lines, criteria) || lines.includes(criteria.join(" "))) {
    return "description repeats the acceptance criteria text";
  }
  return null;
}

/** One entry per non-empty line, bullet or list marker dropped, case and spacing folded. */
function comparableLines(text: string): string[] {
  return sanitizeText(text)
    .split("\n")
    .map((line) =>
      line
        .replace(/^\s*(?:[*#-]+|\d+[.)])\s+/, "")
        .replace(/\s+/g, " ")
        .replace(/[.;]$/, "")
        .trim()
        .toLowerCase(),
    )
    .filter((line) => line.length > 0);
}

function containsRun(lines: string[], run: string[]): boolean {
  for (let start = 0; start + run.length <= lines.length; start += 1) {
    if (run.every((line, offset) => lines[start + offset] === line)) return true;
  }
  return false;
}
