interface LockState {
  tail: Promise<void>;
  pending: number;
}

/** FIFO mutex per key; state for a key is dropped once nobody waits on it. */
export class KeyedLock {
  private readonly locks = new Map<string, LockState>();

  async run<TOutput>(key: string, operation: () => Promise<TOutput>): Promise<TOutput> {
    const lockState = this.locks.get(key) ?? { tail: Promise.resolve(), pending: 0 };
    this.locks.set(key, lockState);
    lockState.pending += 1;

    const acquire = lockState.tail;
    let releaseTail: () => void = () => {};
    const releaseSignal = new Promise<void>((resolve) => {
      releaseTail = resolve;
    });
    lockState.tail = lockState.tail.then(() => releaseSignal);

    await acquire;
    try {
      return await operation();
    } finally {
      releaseTail();
      lockState.pending -= 1;
      if (lockState.pending === 0) {
        this.locks.delete(key);
      }
    }
  }
}
