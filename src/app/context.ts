/**
 * AppContext resolves config + paths for one provisioning project without mutating globals.
 * Purpose: make the config file and PROVISIONER_HOME explicit for entrypoints and tests.
 * Assumptions: config has already been validated by the loader.
 * Usage: const ctx = createAppContext({ configPath, config }).
 */

import path from "node:path";

import type { ProjectConfig } from "../core/config.js";
import {
  checkpointPath,
  createPathsContext,
  resolveProvisionerHome,
  type PathsContext,
} from "../core/paths.js";

// =============================================================================
// TYPES
// =============================================================================

export type AppContext = {
  projectName: string;
  configPath: string;
  config: ProjectConfig;
  provisionerHome: string;
  checkpointPath: string;
  paths: PathsContext;
};

export type CreateAppContextInput = {
  configPath: string;
  config: ProjectConfig;
  provisionerHome?: string;
  cwd?: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createAppContext(input: CreateAppContextInput): AppContext {
  const provisionerHome = resolveProvisionerHome({
    provisionerHome: input.provisionerHome,
    cwd: input.cwd,
  });
  const paths = createPathsContext({ provisionerHome });
  const projectName = input.config.name;

  return {
    projectName,
    configPath: path.resolve(input.configPath),
    config: input.config,
    provisionerHome,
    checkpointPath: input.config.checkpoint_path ?? checkpointPath(projectName, paths),
    paths,
  };
}
