// Dispatch-order tokens so a slow response never overwrites a newer one

export type FreshnessScope =
  | 'projects'
  | 'status'
  | 'connection'
  | `agents:${string}`
  | `messages:${string}`;

export class FreshnessTracker {
  private counter = 0;
  private readonly applied: Map<FreshnessScope, number> = new Map();

  // Taken when a request is dispatched, not when it completes
  next(): number {
    this.counter += 1;
    return this.counter;
  }

  lastApplied(scope: FreshnessScope): number {
    return this.applied.get(scope) ?? 0;
  }

  isFresh(scope: FreshnessScope, token: number): boolean {
    return token > this.lastApplied(scope);
  }

  /**
   * Record an apply for the scope.
   * Returns false (and records nothing) when a newer token already landed.
   */
  claim(scope: FreshnessScope, token: number): boolean {
    if (!this.isFresh(scope, token)) {
      return false;
    }
    this.applied.set(scope, token);
    return true;
  }

  reset(): void {
    this.applied.clear();
  }
}
