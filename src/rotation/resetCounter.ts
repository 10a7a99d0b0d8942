/**
 * Counts completed rotations and tells the caller when the rotating geometry
 * is due for a rebuild. Pure logic.
 */
export class ResetCounter {
  private current = 0;

  constructor(readonly resetEvery: number) {}

  get enabled(): boolean {
    return this.resetEvery > 0;
  }

  get count(): number {
    return this.current;
  }

  /** Record one finished rotation. Returns true when a reset is due; the count is then already 0. */
  record(): boolean {
    if (!this.enabled) return false;
    this.current++;
    if (this.current >= this.resetEvery) {
      this.current = 0;
      return true;
    }
    return false;
  }

  clear(): void {
    this.current = 0;
  }
}
