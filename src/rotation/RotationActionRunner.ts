import * as THREE from 'three';

type RotateByAction = {
  kind: 'by';
  node: THREE.Object3D;
  dz: number;
  age: number;
  dur: number;
  /** Fraction of `dz` already applied. */
  applied: number;
  onComplete?: () => void;
};

type RotateToAction = {
  kind: 'to';
  node: THREE.Object3D;
  target: THREE.Quaternion;
  /** Captured on the first update, like a scene graph action that starts when it first runs. */
  from: THREE.Quaternion | null;
  age: number;
  dur: number;
  onComplete?: () => void;
};

type RotationAction = RotateByAction | RotateToAction;

const Z_AXIS = new THREE.Vector3(0, 0, 1);

/**
 * Time-driven rotation actions about the Z axis for three.js nodes.
 *
 * `rotateBy` composes the node's quaternion with a small increment on every
 * update, so rounding error accumulates the way it does in a scene graph's
 * relative rotation action. `rotateTo` slerps to an absolute orientation along
 * the shortest arc and snaps to it at the end.
 */
export class RotationActionRunner {
  private readonly actions: RotationAction[] = [];

  get activeCount(): number {
    return this.actions.length;
  }

  rotateBy(node: THREE.Object3D, dz: number, durationSec: number, onComplete?: () => void): void {
    this.actions.push({ kind: 'by', node, dz, age: 0, dur: durationSec, applied: 0, onComplete });
  }

  rotateTo(node: THREE.Object3D, z: number, durationSec: number, onComplete?: () => void): void {
    const target = new THREE.Quaternion().setFromEuler(new THREE.Euler(0, 0, z));
    this.actions.push({ kind: 'to', node, target, from: null, age: 0, dur: durationSec, onComplete });
  }

  isRunning(node: THREE.Object3D): boolean {
    return this.actions.some((a) => a.node === node);
  }

  /** Drop every action on `node` without running completion callbacks. */
  stop(node: THREE.Object3D): void {
    for (let i = this.actions.length - 1; i >= 0; i--) {
      if (this.actions[i].node === node) this.actions.splice(i, 1);
    }
  }

  update(dt: number): void {
    const finished: RotationAction[] = [];
    for (let i = 0; i < this.actions.length; ) {
      const a = this.actions[i];
      a.age += dt;
      const t = a.dur > 0 ? Math.min(1, a.age / a.dur) : 1;
      if (a.kind === 'by') stepBy(a, t);
      else stepTo(a, t);
      if (t >= 1) {
        this.actions.splice(i, 1);
        finished.push(a);
      } else {
        i++;
      }
    }
    // Callbacks may queue or stop actions, so run them once the list is settled.
    for (const a of finished) a.onComplete?.();
  }
}

function stepBy(a: RotateByAction, t: number): void {
  const inc = t - a.applied;
  if (inc <= 0) return;
  a.node.rotateOnAxis(Z_AXIS, a.dz * inc);
  a.applied = t;
}

function stepTo(a: RotateToAction, t: number): void {
  if (!a.from) {
    a.from = a.node.quaternion.clone();
    // Shortest unit arc: q and -q describe the same orientation.
    if (a.from.dot(a.target) < 0) {
      a.target.set(-a.target.x, -a.target.y, -a.target.z, -a.target.w);
    }
  }
  if (t >= 1) a.node.quaternion.copy(a.target);
  else a.node.quaternion.slerpQuaternions(a.from, a.target, t);
}
