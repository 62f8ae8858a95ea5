// packages/common/src/serial.ts

/**
 * Runs async units of work one at a time, in submission order.
 * A unit that rejects does not stop later units.
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();
  private _pending = 0;

  get pending(): number {
    return this._pending;
  }

  run<T>(fn: () => Promise<T>): Promise<T> {
    this._pending++;
    const next = this.tail.then(fn).finally(() => {
      this._pending--;
    });
    this.tail = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }
}
