import type { RotatingView, TickLabelsPort } from './AppContext';

export type RotationTickerDeps = {
  /** Rotated in this order on every tick. */
  views: readonly RotatingView[];
  labels: TickLabelsPort;
  intervalMs: number;
  rotationDurationSec: number;
};

/**
 * The one periodic timer of the app: every interval it bumps the elapsed
 * seconds count and starts a quarter turn on each view.
 */
export class RotationTicker {
  private seconds = 0;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly deps: RotationTickerDeps) {}

  get elapsedSeconds(): number {
    return this.seconds;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer !== null) return;
    this.timer = setInterval(() => this.tick(), this.deps.intervalMs);
  }

  stop(): void {
    if (this.timer === null) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  tick(): void {
    const { views, labels, rotationDurationSec } = this.deps;
    this.seconds++;
    labels.setElapsedSeconds(this.seconds);
    for (const v of views) v.rotate(rotationDurationSec);
    labels.setRotationCount(`Rotations: ${this.seconds}`);
  }
}
