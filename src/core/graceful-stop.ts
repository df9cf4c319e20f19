/*
Cooperative stop plumbing: OS signals become an AbortSignal, and the engine polls a stop
controller built from that signal between dispatches.
*/

// =============================================================================
// TYPES
// =============================================================================

export type StopRequest = { kind: "signal"; signal?: string };

export type StopController = { readonly reason: StopRequest | null; cleanup: () => void };

type SignalSource = {
  once(event: NodeJS.Signals, listener: () => void): unknown;
  off(event: NodeJS.Signals, listener: () => void): unknown;
};

export type StopSignalHandle = {
  signal: AbortSignal;
  dispose: () => void;
};

// =============================================================================
// SIGNALS
// =============================================================================

/**
 * Aborts the returned signal on the first SIGINT/SIGTERM. The abort reason carries the signal
 * name. Call `dispose` once the run has settled so the listeners do not outlive it.
 */
export function createStopSignal(
  opts: { signals?: NodeJS.Signals[]; source?: SignalSource } = {},
): StopSignalHandle {
  const signals = opts.signals ?? ["SIGINT", "SIGTERM"];
  const source: SignalSource = opts.source ?? process;
  const controller = new AbortController();

  const handlers = signals.map((name) => {
    const handler = (): void => {
      controller.abort({ signal: name });
    };
    source.once(name, handler);
    return { name, handler };
  });

  return {
    signal: controller.signal,
    dispose() {
      for (const { name, handler } of handlers) {
        source.off(name, handler);
      }
    },
  };
}

export function buildStopController(signal?: AbortSignal): StopController {
  let reason: StopRequest | null = null;

  const onAbort = (): void => {
    if (reason) return;
    reason = { kind: "signal", signal: normalizeAbortReason(signal?.reason) };
  };

  if (signal) {
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort);
    }
  }

  return {
    get reason() {
      return reason;
    },
    cleanup() {
      if (signal) {
        signal.removeEventListener("abort", onAbort);
      }
    },
  };
}

export function normalizeAbortReason(reason: unknown): string | undefined {
  if (reason === undefined || reason === null) return undefined;
  if (typeof reason === "string") return reason;
  if (reason instanceof Error) return reason.message;

  if (typeof reason === "object") {
    if ("signal" in reason && typeof reason.signal === "string") return reason.signal;
    if ("type" in reason && typeof reason.type === "string") return reason.type;
  }

  return String(reason);
}
