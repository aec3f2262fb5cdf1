/**
 * An explicitly cached capability check.
 *
 * The check runs on first read and its answer is kept until `invalidate()`
 * is called (backend re-initialization, or a test forcing a re-check).
 */
export class CachedCapability<T> {
  private cached: { value: T } | null = null;
  private readonly check: () => T;

  constructor(check: () => T) {
    this.check = check;
  }

  get value(): T {
    if (this.cached === null) {
      this.cached = { value: this.check() };
    }
    return this.cached.value;
  }

  get isCached(): boolean {
    return this.cached !== null;
  }

  invalidate(): void {
    this.cached = null;
  }
}
