/**
 * Runs async operations one at a time, in call order.
 *
 * A failed operation rejects its own caller but does not break the chain
 * for the ones queued behind it. Not reentrant: calling `run` from inside
 * an operation waits on itself forever.
 */
export class SerialLock {
  private chain: Promise<void> = Promise.resolve();

  run<T>(operation: () => Promise<T> | T): Promise<T> {
    const next = this.chain.then(() => operation());
    this.chain = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }
}
