/**
 * Lets an event through only if at least `intervalMs` elapsed since the last
 * accepted event with the same key. Used to drop repeated taps on one button.
 */
export class Debouncer {
  private readonly intervalMs: number;
  private readonly now: () => number;
  private readonly lastAccepted = new Map<string, number>();

  constructor(intervalMs = 50, now: () => number = () => performance.now()) {
    this.intervalMs = Math.max(0, intervalMs);
    this.now = now;
  }

  allow(key: string): boolean {
    const now = this.now();
    const last = this.lastAccepted.get(key);
    if (last !== undefined && now - last < this.intervalMs) {
      return false;
    }
    this.lastAccepted.set(key, now);
    return true;
  }

  reset(key?: string): void {
    if (key === undefined) {
      this.lastAccepted.clear();
    } else {
      this.lastAccepted.delete(key);
    }
  }
}
