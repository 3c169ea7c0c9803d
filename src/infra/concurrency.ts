export async function mapWithConcurrency<TInput, TOutput>(
  items: readonly TInput[],
  limit: number,
  worker: (item: TInput, index: number) => Promise<TOutput>,
): Promise<TOutput[]> {
  const results: TOutput[] = new Array<TOutput>(items.length);
  const queue = items.map((item, index) => ({ item, index }));

  async function runLane(): Promise<void> {
    for (let next = queue.shift(); next; next = queue.shift()) {
      results[next.index] = await worker(next.item, next.index);
    }
  }

  const laneCount = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: laneCount }, () => runLane()));
  return results;
}
