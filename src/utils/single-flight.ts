/**
 * Lazily built, process-wide value with single-flight initialization.
 *
 * The first caller starts the build; callers arriving while it runs await the
 * same promise. A failed build is not cached, so the next caller retries.
 */
export class LazySingleton<T> {
  private holder: { value: T; builtAt: number } | null = null;
  private pending: Promise<T> | null = null;
  private generation = 0;

  constructor(
    private readonly build: () => Promise<T>,
    private readonly ttlMs: number = Number.POSITIVE_INFINITY,
    private readonly now: () => number = Date.now
  ) {}

  async get(): Promise<T> {
    if (this.holder && this.now() - this.holder.builtAt < this.ttlMs) {
      return this.holder.value;
    }

    if (this.pending) {
      return this.pending;
    }

    const generation = this.generation;
    const pending = this.build().then((value) => {
      // A build started before invalidate() must not repopulate the slot.
      if (generation === this.generation) {
        this.holder = { value, builtAt: this.now() };
      }
      return value;
    });
    this.pending = pending;

    try {
      return await pending;
    } finally {
      if (this.pending === pending) {
        this.pending = null;
      }
    }
  }

  /**
   * Drop the built value; the next get() rebuilds.
   */
  invalidate(): void {
    this.generation++;
    this.holder = null;
    this.pending = null;
  }

  isBuilt(): boolean {
    return this.holder !== null;
  }
}
