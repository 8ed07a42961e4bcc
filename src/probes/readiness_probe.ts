import type { ProbeFailureReason, ProbeResult, ReadinessProbe } from "../contracts/service";
import { describeCause } from "../errors/service_errors";

export const probeReady = (detail?: string): ProbeResult => ({
  ready: true,
  observedAt: new Date().toISOString(),
  ...(detail ? { detail } : {}),
});

export const probeNotReady = (reason: ProbeFailureReason, detail: string): ProbeResult => ({
  ready: false,
  observedAt: new Date().toISOString(),
  reason,
  detail,
});

export function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/** Readiness of the current process itself, e.g. "gate satisfied and listening". */
export function createFlagProbe(isReady: () => boolean, detail = "not ready"): ReadinessProbe {
  return {
    async check() {
      return isReady() ? probeReady() : probeNotReady("starting", detail);
    },
  };
}

type ProbeSession = { close(): Promise<void> };

type CloseOutcome = { failed: false } | { failed: true; error: unknown };

/**
 * Opens a throwaway session, runs `use` against it and closes it. An abort on
 * `signal` closes the session straight away, which also fails whatever `use`
 * is still waiting on. A close failure is reported in the result: a session
 * that cannot be closed leaks one connection per gate round.
 */
export async function probeWithSession<S extends ProbeSession>(args: {
  open: (signal?: AbortSignal) => Promise<S>;
  use: (session: S) => Promise<ProbeResult>;
  classify: (error: unknown) => ProbeResult;
  signal?: AbortSignal;
}): Promise<ProbeResult> {
  const { signal } = args;
  let session: S | null = null;
  let closing: Promise<CloseOutcome> | null = null;

  const close = (): Promise<CloseOutcome> => {
    if (!session) return Promise.resolve({ failed: false });
    closing ??= session.close().then(
      (): CloseOutcome => ({ failed: false }),
      (error: unknown): CloseOutcome => ({ failed: true, error })
    );
    return closing;
  };
  // close() never rejects; its outcome is read again below.
  const onAbort = () => void close();
  signal?.addEventListener("abort", onAbort, { once: true });

  let result: ProbeResult;
  try {
    session = await args.open(signal);
    result = signal?.aborted ? probeNotReady("error", "probe cancelled") : await args.use(session);
  } catch (error) {
    result = signal?.aborted ? probeNotReady("error", `probe cancelled: ${describeCause(error)}`) : args.classify(error);
  } finally {
    signal?.removeEventListener("abort", onAbort);
  }

  const closed = await close();
  if (!closed.failed) return result;
  const closeDetail = `session close failed: ${describeCause(closed.error)}`;
  return result.ready
    ? probeNotReady("error", closeDetail)
    : { ...result, detail: result.detail ? `${result.detail}; ${closeDetail}` : closeDetail };
}
