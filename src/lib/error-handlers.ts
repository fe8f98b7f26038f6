/**
 * Failure boundaries for work that must not take its caller down:
 * one webhook event, one profile lookup.
 */

export type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Run a task to completion and capture a rejection as a value.
 * The caller decides how the failure is logged and what it falls back to.
 */
export async function settle<T>(task: () => Promise<T>): Promise<Settled<T>> {
  try {
    return { ok: true, value: await task() };
  } catch (error) {
    return { ok: false, error };
  }
}
