/**
 * Admits one unit of work at a time, in arrival order. A failed unit does not
 * block the ones queued behind it.
 */
export class SingleSlotLock {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  runExclusive<T>(work: () => Promise<T> | T): Promise<T> {
    this.queued += 1;
    const run = this.tail.then(work).finally(() => {
      this.queued -= 1;
    });
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /** Units admitted or waiting. */
  get pending(): number {
    return this.queued;
  }
}
