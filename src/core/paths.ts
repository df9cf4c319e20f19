import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type PathsContext = {
  provisionerHome: string;
};

export type ResolveProvisionerHomeOptions = {
  provisionerHome?: string;
  cwd?: string;
};

// =============================================================================
// CONTEXT
// =============================================================================

export function resolveProvisionerHome(opts: ResolveProvisionerHomeOptions = {}): string {
  if (opts.provisionerHome) {
    return path.resolve(opts.provisionerHome);
  }

  if (process.env.PROVISIONER_HOME) {
    return path.resolve(process.env.PROVISIONER_HOME);
  }

  return path.join(path.resolve(opts.cwd ?? process.cwd()), ".provisioner");
}

export function createPathsContext(opts: ResolveProvisionerHomeOptions = {}): PathsContext {
  return { provisionerHome: resolveProvisionerHome(opts) };
}

// =============================================================================
// PATH HELPERS
// =============================================================================

export function provisionerHome(paths?: PathsContext): string {
  return resolveProvisionerHome({ provisionerHome: paths?.provisionerHome });
}

export function stateBaseDir(projectName: string, paths?: PathsContext): string {
  return path.join(provisionerHome(paths), "state", projectName);
}

export function checkpointPath(projectName: string, paths?: PathsContext): string {
  return path.join(stateBaseDir(projectName, paths), "checkpoint.json");
}

export function runLogsDir(projectName: string, runId: string, paths?: PathsContext): string {
  return path.join(provisionerHome(paths), "logs", projectName, `run-${runId}`);
}

export function runLogPath(projectName: string, runId: string, paths?: PathsContext): string {
  return path.join(runLogsDir(projectName, runId, paths), "events.jsonl");
}

export function reconciliationReportPath(
  projectName: string,
  runId: string,
  paths?: PathsContext,
): string {
  return path.join(runLogsDir(projectName, runId, paths), "reconciliation.json");
}
