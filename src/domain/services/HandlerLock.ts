/** Releases a held {@link HandlerLock}. Calling it more than once has no effect. */
export type ReleaseFn = () => void;

/**
 * FIFO async mutex guarding one exclusive handler.
 *
 * A fault while the lock is held poisons it. Poisoning does not block
 * acquisition; the holder inspects `poisoned` and decides whether to
 * proceed (`recover()`) or give up.
 */
export class HandlerLock {
  private tail: Promise<void> = Promise.resolve();
  private held = false;
  private poisonCause: { readonly error: unknown } | null = null;

  get locked(): boolean {
    return this.held;
  }

  get poisoned(): boolean {
    return this.poisonCause !== null;
  }

  /** The error that poisoned the lock, or `undefined` when it is not poisoned. */
  get cause(): unknown {
    return this.poisonCause?.error;
  }

  /** Wait for every earlier holder to release, then take the lock. */
  async acquire(): Promise<ReleaseFn> {
    const previous = this.tail;
    let releaseRef!: () => void;
    this.tail = new Promise<void>((resolve) => {
      releaseRef = resolve;
    });

    await previous;
    this.held = true;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.held = false;
      releaseRef();
    };
  }

  poison(error: unknown): void {
    this.poisonCause = { error };
  }

  /** Clear the poisoned flag. Returns `true` when the lock was poisoned. */
  recover(): boolean {
    const wasPoisoned = this.poisoned;
    this.poisonCause = null;
    return wasPoisoned;
  }
}
