const DEFAULT_TIMEOUT_MS = 30_000;

function mergeSignals(external: AbortSignal | null | undefined, own: AbortSignal): AbortSignal {
  return external ? AbortSignal.any([external, own]) : own;
}

export type HttpFetchInit = RequestInit & {
  timeoutMs?: number;
};

function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    void work.then(resolve, reject).finally(() => signal.removeEventListener('abort', onAbort));
  });
}

/**
 * Single outbound request bounded by a timeout. The timeout covers both the
 * response head and `read`, so a peer that stalls mid-body still fails. The
 * caller's own signal, if any, still aborts the request. No retries.
 */
export async function httpRequest<T>(
  input: RequestInfo | URL,
  init: HttpFetchInit,
  read: (res: Response) => Promise<T>
): Promise<T> {
  const { timeoutMs, ...reqInit } = init;
  const timeout =
    typeof timeoutMs === 'number' && Number.isFinite(timeoutMs) ? timeoutMs : DEFAULT_TIMEOUT_MS;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(new Error(`timed out after ${timeout}ms`)), timeout);
  const signal = mergeSignals(reqInit.signal, controller.signal);

  try {
    const res = await fetch(input, { ...reqInit, signal });
    return await untilAborted(read(res), signal);
  } finally {
    clearTimeout(timeoutId);
  }
}

/** Response head only; the body is read outside the timeout. */
export function httpFetch(input: RequestInfo | URL, init: HttpFetchInit = {}): Promise<Response> {
  return httpRequest(input, init, async (res) => res);
}
