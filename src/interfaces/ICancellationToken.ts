/**
 * Cancellation token interface
 *
 * A cooperative stop flag shared by the walker, the digest engine and the
 * scheduler. Setting it never interrupts an in-flight read; it only stops new
 * reads and new submissions at the next check.
 */
export interface ICancellationToken {
  /** True once cancel() has been called and until reset() */
  readonly isCancelled: boolean;

  /** Request a cooperative stop */
  cancel(): void;

  /**
   * Clear the flag so the token can drive another pass
   *
   * A token is not reset automatically. Passing a cancelled token to a new
   * scan or verification makes it return an empty partial result at once.
   */
  reset(): void;
}
