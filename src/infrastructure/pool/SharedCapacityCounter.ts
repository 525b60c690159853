/**
 * Shared Capacity Counter
 *
 * Single source of truth for the number of live connections across every
 * destination pool. Reservation is a synchronous compare-and-increment, so no
 * other task can run between the check against the cap and the increment.
 */

export type ReleaseListener = () => void;

export class SharedCapacityCounter {
  private count = 0;
  private readonly listeners: Set<ReleaseListener> = new Set();

  constructor(private readonly max: number) {}

  get value(): number {
    return this.count;
  }

  get capacity(): number {
    return this.max;
  }

  tryReserve(): boolean {
    if (this.count >= this.max) {
      return false;
    }
    this.count++;
    return true;
  }

  release(): void {
    if (this.count === 0) {
      console.warn('Capacity released with no live connections; release ignored');
      return;
    }
    this.count--;

    // Copy first: a listener may unsubscribe while being notified
    for (const listener of Array.from(this.listeners)) {
      listener();
    }
  }

  onRelease(listener: ReleaseListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
