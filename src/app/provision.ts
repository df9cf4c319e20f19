/**
 * Provisioning entry point: config -> metadata source -> plan -> engine -> reconciliation report.
 * Usage: const outcome = await provision({ configPath: "provision.yaml" }).
 */

import { loadProjectConfig } from "../core/config-loader.js";
import { FileCheckpointStore } from "../core/checkpoint-store.js";
import {
  CheckpointError,
  SpecValidationError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
} from "../core/errors.js";
import { JsonlLogger } from "../core/logger.js";
import { loadMetadataSource, type TemplateCounts } from "../core/metadata-source.js";
import { reconciliationReportPath, runLogPath } from "../core/paths.js";
import type { RunPlan } from "../core/plan.js";
import { buildPlan } from "../core/plan-builder.js";
import { defaultRunId, writeJsonFile } from "../core/utils.js";
import type { RemoteTracker } from "../remote/client.js";
import { createRemoteTracker } from "../remote/factory.js";

import { createAppContext, type AppContext } from "./context.js";
import { runPlan, type RunResult } from "./engine/execution-engine.js";
import { reconcile, type ReconciliationReport } from "./engine/reconciler.js";

// =============================================================================
// TYPES
// =============================================================================

export type ProvisionOptions = {
  configPath: string;
  /** Build and reconcile the plan without touching the tracker or the checkpoint. */
  dryRun?: boolean;
  runId?: string;
  signal?: AbortSignal;
  provisionerHome?: string;
  templatePath?: string;
  metadataPath?: string;
  tracker?: RemoteTracker;
  fetch?: typeof fetch;
};

export type ProvisionPreview = {
  mode: "preview";
  runId: string;
  plan: RunPlan;
  templateCounts: TemplateCounts;
  report: ReconciliationReport;
};

export type ProvisionRun = {
  mode: "run";
  runId: string;
  plan: RunPlan;
  templateCounts: TemplateCounts;
  result: RunResult;
  report: ReconciliationReport;
  checkpointPath: string;
  logPath: string;
  reportPath: string;
};

export type ProvisionOutcome = ProvisionPreview | ProvisionRun;

// =============================================================================
// PUBLIC API
// =============================================================================

export async function provision(options: ProvisionOptions): Promise<ProvisionOutcome> {
  const config = loadProjectConfig(options.configPath);
  const context = createAppContext({
    configPath: options.configPath,
    config,
    provisionerHome: options.provisionerHome,
  });
  const runId = options.runId ?? defaultRunId();

  try {
    const { plan, templateCounts } = await preparePlan(context, options);

    if (options.dryRun) {
      return { mode: "preview", runId, plan, templateCounts, report: reconcile(plan) };
    }

    return await executePlan(context, options, { runId, plan, templateCounts });
  } catch (err) {
    throw normalizeProvisionError(err);
  }
}

// =============================================================================
// STEPS
// =============================================================================

async function preparePlan(
  context: AppContext,
  options: ProvisionOptions,
): Promise<{ plan: RunPlan; templateCounts: TemplateCounts }> {
  const { config } = context;
  const templatePath = options.templatePath ?? config.source?.template;
  const metadataPath = options.metadataPath ?? config.source?.metadata;
  if (!templatePath || !metadataPath) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Metadata source missing.",
      message: `No template or metadata file configured for ${context.projectName}.`,
      hint: "Set source.template and source.metadata in the config.",
    });
  }

  const source = await loadMetadataSource(templatePath, metadataPath);
  const plan = buildPlan(source.specs, {
    projectKey: config.project_key ?? source.projectKey,
    linkTypeCandidates: config.link_types ?? source.linkTypeCandidates,
    labels: config.labels,
    acceptanceCriteriaField: config.fields.acceptance_criteria,
  });

  return { plan, templateCounts: source.expected };
}

async function executePlan(
  context: AppContext,
  options: ProvisionOptions,
  input: { runId: string; plan: RunPlan; templateCounts: TemplateCounts },
): Promise<ProvisionRun> {
  const { config, projectName, paths } = context;
  const { runId, plan } = input;

  const tracker = options.tracker ?? createRemoteTracker(config, { fetch: options.fetch });
  const store = new FileCheckpointStore(context.checkpointPath);
  const logPath = runLogPath(projectName, runId, paths);
  const logger = new JsonlLogger(logPath, runId);

  try {
    const result = await runPlan(plan, store, tracker, {
      runId,
      logger,
      signal: options.signal,
      maxParallel: config.max_parallel,
      retryTransientFailures: config.retry_transient_failures,
    });

    const report = reconcile(plan, await store.load());
    const reportPath = reconciliationReportPath(projectName, runId, paths);
    await writeJsonFile(reportPath, report);

    return {
      mode: "run",
      runId,
      plan,
      templateCounts: input.templateCounts,
      result,
      report,
      checkpointPath: context.checkpointPath,
      logPath,
      reportPath,
    };
  } finally {
    logger.close();
  }
}

// =============================================================================
// ERRORS
// =============================================================================

function normalizeProvisionError(error: unknown): unknown {
  if (error instanceof SpecValidationError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.spec,
      title: "Record specs invalid.",
      message: error.message,
      hint: "Fix the template or metadata and rerun. No remote calls were made.",
      cause: error,
    });
  }

  if (error instanceof CheckpointError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.checkpoint,
      title: "Checkpoint unusable.",
      message: error.message,
      hint: "Inspect the checkpoint file; completed work is recorded there.",
      next: "Rerun once the checkpoint is readable to resume where the run stopped.",
      cause: error,
    });
  }

  return error;
}
