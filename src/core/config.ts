import { z } from "zod";

const RemoteSchema = z
  .object({
    provider: z.enum(["jira", "mock"]).default("jira"),
    base_url: z.string().min(1).optional(),
    email: z.string().min(1).optional(),
    api_token: z.string().min(1).optional(),

    max_attempts: z.number().int().positive().default(5),
    backoff_ms: z.number().int().nonnegative().default(1500),
    max_backoff_ms: z.number().int().positive().default(30_000),
    timeout_ms: z.number().int().positive().default(45_000),

    // Shared by every branch of a run.
    max_concurrent_requests: z.number().int().positive().default(4),
    requests_per_second: z.number().nonnegative().default(5),
  })
  .strict()
  .superRefine((remote, ctx) => {
    if (remote.provider !== "jira") return;
    for (const key of ["base_url", "email", "api_token"] as const) {
      if (!remote[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `Required when provider is "jira"`,
        });
      }
    }
  });

const IssueTypesSchema = z
  .object({
    feature: z.string().min(1).default("New Feature"),
    story: z.string().min(1).default("Story"),
    subtask: z.string().min(1).default("Sub-task"),
  })
  .strict();

const FieldsSchema = z
  .object({
    acceptance_criteria: z.string().min(1).default("Acceptance criteria"),
    epic_link: z.string().min(1).default("Epic Link"),
  })
  .strict();

const SourceSchema = z
  .object({
    template: z.string().min(1),
    metadata: z.string().min(1),
  })
  .strict();

export const ProjectConfigSchema = z
  .object({
    name: z.string().min(1),
    // Default: the metadata source's projectKey.
    project_key: z.string().min(1).optional(),

    // Default: <home>/state/<name>/checkpoint.json
    checkpoint_path: z.string().min(1).optional(),

    max_parallel: z.number().int().positive().default(4),
    retry_transient_failures: z.boolean().default(false),

    // Default: the metadata source's linkType.
    link_types: z.array(z.string().min(1)).min(1).optional(),
    labels: z.array(z.string()).default([]),

    source: SourceSchema.optional(),
    remote: RemoteSchema,
    issue_types: IssueTypesSchema.default({}),
    fields: FieldsSchema.default({}),
  })
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type RemoteConfig = ProjectConfig["remote"];
