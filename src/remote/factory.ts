import type { ProjectConfig } from "../core/config.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

import { RemoteError, type RemoteTracker } from "./client.js";
import { JiraClient } from "./jira.js";
import { InMemoryTracker } from "./mock.js";
import { RequestGate } from "./request-gate.js";

export type RemoteTrackerDeps = {
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
};

export function createRemoteTracker(
  config: ProjectConfig,
  deps: RemoteTrackerDeps = {},
): RemoteTracker {
  const remote = config.remote;

  if (remote.provider === "mock") {
    return new InMemoryTracker({ linkTypes: config.link_types });
  }

  const gate = new RequestGate({
    maxConcurrent: remote.max_concurrent_requests,
    requestsPerSecond: remote.requests_per_second,
    sleep: deps.sleep,
  });

  try {
    return new JiraClient({
      baseUrl: remote.base_url ?? "",
      email: remote.email ?? "",
      apiToken: remote.api_token ?? "",
      issueTypes: config.issue_types,
      epicLinkField: config.fields.epic_link,
      maxAttempts: remote.max_attempts,
      backoffMs: remote.backoff_ms,
      maxBackoffMs: remote.max_backoff_ms,
      timeoutMs: remote.timeout_ms,
      gate,
      fetch: deps.fetch,
      sleep: deps.sleep,
    });
  } catch (err) {
    if (!(err instanceof RemoteError)) throw err;
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.remote,
      title: "Remote tracker not configured.",
      message: err.message,
      hint: "Set remote.base_url, remote.email and remote.api_token, or use provider: mock.",
      cause: err,
    });
  }
}
