export type DriftCheck = {
  /** Distance in degrees to the nearest multiple of 90°, in [0, 45]. */
  delta: number;
  isBad: boolean;
};

export function radToDeg(radians: number): number {
  return radians * 180 / Math.PI;
}

/**
 * Distance of an angle (degrees) to the nearest multiple of 90°.
 */
export function driftFromDegrees(degrees: number): number {
  const a = Math.abs(degrees);
  return Math.abs(a - 90 * Math.round(a / 90));
}

/**
 * Check a Z euler value for rotational drift.
 * A rotation is "bad" when it sits more than `thresholdDeg` away from a quarter turn.
 */
export function checkAngleDrift(radians: number, thresholdDeg: number): DriftCheck {
  const delta = driftFromDegrees(radToDeg(radians));
  return { delta, isBad: delta > thresholdDeg };
}
