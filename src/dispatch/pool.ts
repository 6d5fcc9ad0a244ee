/**
 * Runs `task` for every index in [0, count) with at most `concurrency`
 * tasks in flight. Tasks are started in index order; each writes its own
 * slot, so completion order does not matter to the caller.
 */
export async function runBounded(
  count: number,
  concurrency: number,
  task: (index: number) => Promise<void>,
): Promise<void> {
  let next = 0;
  const worker = async () => {
    while (next < count) {
      const index = next++;
      await task(index);
    }
  };
  const workers = Math.max(1, Math.min(concurrency, count));
  await Promise.all(Array.from({ length: workers }, () => worker()));
}
