/**
 * Cooperative cancellation flag
 */

import { ICancellationToken } from "../interfaces/ICancellationToken";

export class CancellationToken implements ICancellationToken {
  private cancelled: boolean = false;

  get isCancelled(): boolean {
    return this.cancelled;
  }

  cancel(): void {
    this.cancelled = true;
  }

  reset(): void {
    this.cancelled = false;
  }
}
