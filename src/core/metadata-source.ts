/**
 * Metadata source: expands a feed/scenario template plus per-migration metadata into record specs.
 * Purpose: produce the ordered RecordSpec list the plan builder consumes, with placeholders filled.
 * Assumptions: feeds share one Feature; every scenario brings its own Feature.
 */

import { z, type ZodIssue } from "zod";

import { SpecValidationError } from "./errors.js";
import type { RecordSpecInput } from "./record-spec.js";
import { ensureBullets, sanitizeKey, sanitizeText } from "./sanitize.js";
import { readJsonFile, slugify } from "./utils.js";

// =============================================================================
// SCHEMAS
// =============================================================================

const NamedItemSchema = z
  .object({
    name: z.string().optional(),
    feedName: z.string().optional(),
    scenarioName: z.string().optional(),
  })
  .passthrough();

export const MigrationMetadataSchema = z
  .object({
    projectKey: z.string().min(1),
    epicKeyForFeatures: z.string().min(1),
    surveillanceName: z.string().min(1),
    feeds: z.array(NamedItemSchema).default([]),
    scenarios: z.array(NamedItemSchema).default([]),
    labels: z.array(z.string()).default([]),
    linkType: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]).default("Relates"),
  })
  .passthrough();

export type MigrationMetadata = z.infer<typeof MigrationMetadataSchema>;

const TemplateRowSchema = z
  .object({
    summary: z.string().min(1),
    description: z.string().default(""),
    acceptanceCriteria: z.string().default(""),
  })
  .strict();

const TemplateSectionSchema = z
  .object({
    feature: TemplateRowSchema,
    story: TemplateRowSchema,
    subtasks: z.array(TemplateRowSchema).default([]),
  })
  .strict();

export const MigrationTemplateSchema = z
  .object({
    feed: TemplateSectionSchema,
    scenario: TemplateSectionSchema,
  })
  .strict();

export type MigrationTemplate = z.infer<typeof MigrationTemplateSchema>;
export type TemplateRow = z.infer<typeof TemplateRowSchema>;

// =============================================================================
// TYPES
// =============================================================================

export type MetadataSource = {
  projectKey: string;
  linkTypeCandidates: string[];
  specs: RecordSpecInput[];
  expected: TemplateCounts;
};

export type TemplateCounts = {
  features: number;
  stories: number;
  subtasks: number;
};

type Placeholders = {
  surveillanceName: string;
  feedName?: string;
  scenarioName?: string;
};

export const FEED_FEATURE_GROUP = "feeds";

// =============================================================================
// PUBLIC API
// =============================================================================

export async function loadMetadataSource(
  templatePath: string,
  metadataPath: string,
): Promise<MetadataSource> {
  const template = parseDocument(
    MigrationTemplateSchema,
    await readDocument(templatePath, "template"),
    "template",
  );
  const metadata = parseDocument(
    MigrationMetadataSchema,
    await readDocument(metadataPath, "metadata"),
    "metadata",
  );

  return {
    projectKey: sanitizeKey(metadata.projectKey),
    linkTypeCandidates: toArray(metadata.linkType),
    specs: expandTemplate(template, metadata),
    expected: templateCounts(template, metadata),
  };
}

export function expandTemplate(
  template: MigrationTemplate,
  metadata: MigrationMetadata,
): RecordSpecInput[] {
  const specs: RecordSpecInput[] = [];
  const surveillanceName = sanitizeText(metadata.surveillanceName, { multiline: false });
  const epicRef = sanitizeKey(metadata.epicKeyForFeatures);
  const labels = metadata.labels;

  const feedNames = metadata.feeds.map((feed, idx) =>
    itemName(feed.name ?? feed.feedName, `Feed-${idx + 1}`),
  );

  if (feedNames.length > 0) {
    const section = template.feed;
    const featureRef = "feed.feature";
    specs.push({
      kind: "feature",
      ref: featureRef,
      groupKey: FEED_FEATURE_GROUP,
      epicRef,
      labels,
      ...renderRow(section.feature, { surveillanceName }),
    });

    for (const feedName of feedNames) {
      const vars: Placeholders = { surveillanceName, feedName };
      const groupKey = `feed-${slugify(feedName)}`;
      const storyRef = `feed.story.${feedName}`;
      const story = renderRow(section.story, vars);
      if (!section.story.summary.includes("FEED_NAME") && feedNames.length > 1) {
        story.summary = `${story.summary} - ${feedName}`;
      }

      specs.push({ kind: "story", ref: storyRef, groupKey, featureRef, labels, ...story });
      section.subtasks.forEach((row, idx) => {
        specs.push({
          kind: "subtask",
          ref: `feed.subtask.${feedName}.${idx + 1}`,
          groupKey,
          parentRef: storyRef,
          labels,
          ...renderRow(row, vars),
        });
      });
    }
  }

  metadata.scenarios.forEach((scenario, idx) => {
    const section = template.scenario;
    const scenarioName = itemName(scenario.name ?? scenario.scenarioName, `Scenario-${idx + 1}`);
    const vars: Placeholders = { surveillanceName, scenarioName };
    const groupKey = `scenario-${slugify(scenarioName)}`;
    const featureRef = `scenario.feature.${scenarioName}`;
    const storyRef = `scenario.story.${scenarioName}`;

    specs.push({
      kind: "feature",
      ref: featureRef,
      groupKey,
      epicRef,
      labels,
      ...renderRow(section.feature, vars),
    });
    specs.push({
      kind: "story",
      ref: storyRef,
      groupKey,
      featureRef,
      labels,
      ...renderRow(section.story, vars),
    });
    section.subtasks.forEach((row, subIdx) => {
      specs.push({
        kind: "subtask",
        ref: `scenario.subtask.${scenarioName}.${subIdx + 1}`,
        groupKey,
        parentRef: storyRef,
        labels,
        ...renderRow(row, vars),
      });
    });
  });

  return specs;
}

export function templateCounts(
  template: MigrationTemplate,
  metadata: Pick<MigrationMetadata, "feeds" | "scenarios">,
): TemplateCounts {
  const feeds = metadata.feeds.length;
  const scenarios = metadata.scenarios.length;
  return {
    features: (feeds > 0 ? 1 : 0) + scenarios,
    stories: feeds + scenarios,
    subtasks: feeds * template.feed.subtasks.length + scenarios * template.scenario.subtasks.length,
  };
}

export function applyPlaceholders(text: string, vars: Placeholders): string {
  return text
    .replaceAll("SURVEILLANCE_NAME", vars.surveillanceName)
    .replaceAll("SCENARIO_NAME", vars.scenarioName ?? "")
    .replaceAll("FEED_NAME", vars.feedName ?? "");
}

// =============================================================================
// INTERNALS
// =============================================================================

function renderRow(
  row: TemplateRow,
  vars: Placeholders,
): { summary: string; description: string; acceptanceCriteria?: string } {
  const rendered: { summary: string; description: string; acceptanceCriteria?: string } = {
    summary: applyPlaceholders(row.summary, vars),
    description: ensureBullets(applyPlaceholders(row.description, vars)),
  };
  const criteria = applyPlaceholders(row.acceptanceCriteria, vars);
  if (criteria.trim()) {
    rendered.acceptanceCriteria = criteria;
  }
  return rendered;
}

function itemName(raw: string | undefined, fallback: string): string {
  return sanitizeText(raw ?? "", { multiline: false }) || fallback;
}

function toArray(value: string | string[]): string[] {
  return typeof value === "string" ? [value] : [...value];
}

async function readDocument(filePath: string, label: string): Promise<unknown> {
  try {
    return await readJsonFile(filePath);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new SpecValidationError([`${label}: could not read ${filePath}: ${detail}`], err);
  }
}

function parseDocument<Out>(
  schema: z.ZodType<Out, z.ZodTypeDef, unknown>,
  doc: unknown,
  label: string,
): Out {
  const parsed = schema.safeParse(doc);
  if (!parsed.success) {
    throw new SpecValidationError(
      parsed.error.issues.map((issue) => formatDocumentIssue(label, issue)),
      parsed.error,
    );
  }
  return parsed.data;
}

function formatDocumentIssue(label: string, issue: ZodIssue): string {
  const location = issue.path.length > 0 ? `${label}.${issue.path.join(".")}` : label;
  if (issue.code === "invalid_type") {
    return `${location}: Expected ${issue.expected}, received ${issue.received}`;
  }
  return `${location}: ${issue.message}`;
}
