/**
 * ExclusiveLock serializes async critical sections on one shared resource.
 * Used to keep at most one request in flight against an upstream that must
 * not be called concurrently.
 */

export class ExclusiveLock {
  private tail: Promise<unknown> = Promise.resolve();
  private pending = 0;

  /** Callers waiting for or holding the lock. */
  get queued(): number {
    return this.pending;
  }

  /**
   * Run `fn` once every earlier holder has settled.
   * The result (or rejection) of `fn` is returned to the caller; a rejection
   * never blocks later holders.
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    this.pending++;

    const result = new Promise<T>((resolve, reject) => {
      previous
        .catch(() => {
          // an earlier holder's failure belongs to that holder's caller
        })
        .then(() => fn())
        .then(resolve, reject);
    });

    this.tail = result
      .catch(() => {
        // keep the chain alive for the next holder
      })
      .finally(() => {
        this.pending--;
      });

    return result;
  }
}
