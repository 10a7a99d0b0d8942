export type LogFn = (s: string) => void;

/** Per-view drift indicator. */
export interface ErrorIndicatorPort {
  show(delta: number): void;
  hide(): void;
}

/** Labels the rotation ticker writes after each tick. */
export interface TickLabelsPort {
  setElapsedSeconds(seconds: number): void;
  setRotationCount(text: string): void;
}

/** What the ticker and the direction control need from a test view. */
export interface RotatingView {
  rotate(durationSec: number): void;
  setClockwise(clockwise: boolean): void;
}

export type AppContext = {
  raf: (cb: FrameRequestCallback) => number;
  cancelRaf: (id: number) => void;
  log: LogFn;
};
