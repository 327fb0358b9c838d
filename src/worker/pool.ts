export type Settled<T> =
  | {index: number; status: "fulfilled"; value: T}
  | {index: number; status: "rejected"; reason: unknown};

/**
 * Runs `task` over `items` with at most `width` tasks in flight. Results
 * are returned in completion order; a rejected task never stops the others.
 */
export async function runPool<I, T>(
  items: readonly I[],
  width: number,
  task: (item: I, index: number) => Promise<T>
): Promise<Settled<T>[]> {
  const settled: Settled<T>[] = [];
  let next = 0;

  async function lane(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      try {
        const value = await task(items[index], index);
        settled.push({index, status: "fulfilled", value});
      } catch (reason) {
        settled.push({index, status: "rejected", reason});
      }
    }
  }

  const requested = Number.isFinite(width) ? Math.floor(width) : 1;
  const lanes = Math.max(1, Math.min(requested, items.length));
  await Promise.all(Array.from({length: lanes}, () => lane()));
  return settled;
}
