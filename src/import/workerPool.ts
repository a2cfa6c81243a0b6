export type SettledTask<T> =
  | { status: "fulfilled"; value: T }
  | { status: "rejected"; reason: unknown };

/**
 * Runs `tasks` with at most `concurrency` in flight. Every task runs to completion;
 * a rejection is captured in its slot and never cancels the others. Results keep the
 * input order.
 */
export async function runPool<T>(
  tasks: ReadonlyArray<() => Promise<T>>,
  concurrency: number = 4
): Promise<SettledTask<T>[]> {
  const results = new Array<SettledTask<T>>(tasks.length);
  const limit = Math.max(1, Math.min(Math.floor(concurrency), tasks.length));
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < tasks.length) {
      const index = next;
      next += 1;
      const task = tasks[index];
      if (!task) continue;
      try {
        results[index] = { status: "fulfilled", value: await task() };
      } catch (reason) {
        results[index] = { status: "rejected", reason };
      }
    }
  };

  await Promise.all(Array.from({ length: limit }, () => worker()));
  return results;
}
