// This module bounds concurrent work with first-come, first-served waiting.

export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  public constructor(permits: number) {
    this.available = permits;
  }

  public get pending(): number {
    return this.waiters.length;
  }

  // Resolves once a permit is held; the returned function gives it back exactly once.
  public async acquire(): Promise<() => void> {
    if (this.available > 0) {
      this.available -= 1;
    } else {
      await new Promise<void>((resolve) => {
        this.waiters.push(resolve);
      });
    }

    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      this.release();
    };
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      // The permit passes straight to the next waiter.
      next();
      return;
    }

    this.available += 1;
  }
}
