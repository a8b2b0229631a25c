/**
 * Tracks which keys are currently being produced to detect circular dependencies.
 * Uses an insertion-ordered Set, so `path()` is the current resolution chain.
 * enter/leave must be balanced (use try/finally).
 */
export class CycleDetector<K = string> {
  private readonly resolving = new Set<K>();

  enter(key: K): void {
    this.resolving.add(key);
  }

  leave(key: K): void {
    this.resolving.delete(key);
  }

  isResolving(key: K): boolean {
    return this.resolving.has(key);
  }

  path(): K[] {
    return [...this.resolving];
  }
}
