const PROBE_TIMEOUT_MS = 3000;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export const isRuntimeReachable = async (endpoint: string, path = "/api/version"): Promise<boolean> => {
  try {
    const response = await fetch(`${endpoint}${path}`, { signal: AbortSignal.timeout(PROBE_TIMEOUT_MS) });
    return response.ok;
  } catch {
    return false;
  }
};

export type WaitOptions = {
  timeoutMs: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
};

/** Poll the runtime's version endpoint with exponential backoff until it answers or the timeout passes. */
export async function waitForRuntime(endpoint: string, options: WaitOptions): Promise<boolean> {
  const { timeoutMs, initialDelayMs = 200, maxDelayMs = 2000 } = options;
  const deadline = Date.now() + timeoutMs;
  let delay = initialDelayMs;
  for (;;) {
    if (await isRuntimeReachable(endpoint)) return true;
    const remaining = deadline - Date.now();
    if (remaining <= 0) return false;
    await sleep(Math.min(delay, remaining));
    delay = Math.min(delay * 2, maxDelayMs);
  }
}
