/**
 * Shared test utilities
 */

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Poll `predicate` until it holds or `timeoutMs` elapses
 */
export async function waitFor(predicate: () => boolean, timeoutMs = 2000, intervalMs = 5): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await delay(intervalMs);
  }
}

/**
 * Deterministic id source: job-1, job-2, ...
 */
export function sequentialIds(prefix = 'job'): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}
