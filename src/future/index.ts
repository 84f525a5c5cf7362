/**
 * Handles for outcomes that settle later.
 *
 * @module future
 */

/**
 * Pending outcome of a call issued without awaiting it.
 *
 * The handle settles exactly once. `cancel()` is best effort: it asks the
 * underlying work to stop, and the handle then rejects with whatever error
 * the work produced (for a client call, the translated transport error).
 *
 * @example
 * ```typescript
 * const future = client.executeAsync('DescribeTable', { TableName: 'users' });
 * // ... other work ...
 * const result = await future;
 * ```
 */
export class FutureResult<T> implements PromiseLike<T> {
  private readonly promise: Promise<T>;
  private readonly onCancel: () => void;
  private settled = false;
  private cancelled = false;

  constructor(promise: Promise<T>, onCancel: () => void = () => undefined) {
    this.onCancel = onCancel;
    this.promise = promise.finally(() => {
      this.settled = true;
    });
    // Rejections surface through wait()/then(); an unobserved handle must not
    // raise an unhandled rejection
    void this.promise.catch(() => undefined);
  }

  /**
   * Wait for the outcome.
   */
  wait(): Promise<T> {
    return this.promise;
  }

  /**
   * Request cancellation.
   *
   * @returns false when the outcome has already settled or cancel was
   *          already requested
   */
  cancel(): boolean {
    if (this.settled || this.cancelled) {
      return false;
    }
    this.cancelled = true;
    this.onCancel();
    return true;
  }

  get isSettled(): boolean {
    return this.settled;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  then<TResult1 = T, TResult2 = never>(
    onfulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): Promise<TResult1 | TResult2> {
    return this.promise.then(onfulfilled, onrejected);
  }

  catch<TResult = never>(
    onrejected?: ((reason: unknown) => TResult | PromiseLike<TResult>) | null
  ): Promise<T | TResult> {
    return this.promise.catch(onrejected);
  }
}
