export interface RunLockPort {
  withLock<TOutput>(scope: string, operation: () => Promise<TOutput>): Promise<TOutput>;
}
