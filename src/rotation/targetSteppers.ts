import radianTable from './radianTable.json';

export type RotationStrategy = 'rotateBy' | 'rotateByReset' | 'rotateTo' | 'rotateWith';

/** Z sign for a rotation direction: clockwise turns towards negative Z. */
export function directionSign(clockwise: boolean): -1 | 1 {
  return clockwise ? -1 : 1;
}

/**
 * Cycles an absolute target angle through 90, 180, 270, 0 (degrees),
 * computing each value from the previous one.
 */
export class AbsoluteAngleStepper {
  private toAngle = 0;

  get current(): number {
    return this.toAngle;
  }

  next(): number {
    this.toAngle += 90;
    if (this.toAngle > 270) this.toAngle = 0;
    return this.toAngle;
  }
}

/**
 * Cycles through quarter turns read from a precomputed radian table,
 * so no arithmetic accumulates between steps.
 */
export class RadianTableStepper {
  private index = 0;

  constructor(private readonly table: readonly number[] = radianTable) {
    if (table.length === 0) throw new Error('Radian table must not be empty');
  }

  get current(): number {
    return this.table[this.index];
  }

  next(): number {
    this.index++;
    if (this.index > this.table.length - 1) this.index = 0;
    return this.table[this.index];
  }
}
