/** A fallible probe: resolves to a value, or null to hand over to the next strategy. */
export type Strategy<T> = () => Promise<T | null>;

/** Try each strategy in order and return the first non-null result. Later strategies never run. */
export async function firstOf<T>(strategies: readonly Strategy<T>[]): Promise<T | null> {
  for (const strategy of strategies) {
    const result = await strategy();
    if (result !== null) return result;
  }
  return null;
}

/**
 * Run a side effect whose failure must not stop the caller.
 * Returns whether it succeeded; callers are free to ignore the answer.
 */
export async function attemptBestEffort(effect: () => Promise<boolean>): Promise<boolean> {
  try {
    return await effect();
  } catch {
    return false;
  }
}
