import * as THREE from 'three';
import type { ErrorIndicatorPort, LogFn, RotatingView } from '../app/AppContext';
import type { ViewDefinition } from '../config/viewDefinitions';
import { createSceneAndCamera } from '../render/createScene';
import { disposeTree, makeCenterBlock, makeCenterLines, makeGrid } from '../render/lineGrid';
import { applyDefaultLighting } from '../world/lighting';
import { checkAngleDrift, radToDeg } from '../rotation/angleDrift';
import { ResetCounter } from '../rotation/resetCounter';
import type { RotationActionRunner } from '../rotation/RotationActionRunner';
import { AbsoluteAngleStepper, RadianTableStepper, directionSign } from '../rotation/targetSteppers';
import type { RotationStrategy } from '../rotation/targetSteppers';

export type RotationTestViewOptions = {
  def: ViewDefinition;
  runner: RotationActionRunner;
  indicator: ErrorIndicatorPort;
  thresholdDeg: number;
  clockwise?: boolean;
  log?: LogFn;
  aspect?: number;
};

type CenterBlock = THREE.Mesh<THREE.BoxGeometry, THREE.MeshPhongMaterial>;

const ERROR_COLOR = 0xff0000;

const LOG_LABELS: Record<RotationStrategy, string> = {
  rotateBy: 'RotateBy',
  rotateByReset: 'RotateByReset',
  rotateTo: 'RotateTo',
  rotateWith: 'RotateWith',
};

/**
 * One viewport of the demo: a fixed camera, light and pair of center lines, plus
 * a grid and a center block that rotate a quarter turn on every `rotate()` call.
 *
 * When a rotation finishes the view checks the center block's Z euler angle for
 * drift and flags it on the indicator and by painting the block red.
 */
export class RotationTestView implements RotatingView {
  readonly scene: THREE.Scene;
  readonly camera: THREE.PerspectiveCamera;
  readonly counter: ResetCounter;

  private grid: THREE.Group;
  private center: CenterBlock;
  private clockwise: boolean;

  private readonly def: ViewDefinition;
  private readonly runner: RotationActionRunner;
  private readonly indicator: ErrorIndicatorPort;
  private readonly thresholdDeg: number;
  private readonly log: LogFn;

  private readonly angleStepper = new AbsoluteAngleStepper();
  private readonly tableStepper = new RadianTableStepper();

  constructor(opts: RotationTestViewOptions) {
    this.def = opts.def;
    this.runner = opts.runner;
    this.indicator = opts.indicator;
    this.thresholdDeg = opts.thresholdDeg;
    this.clockwise = opts.clockwise ?? true;
    this.log = opts.log ?? ((s) => console.warn(s));
    this.counter = new ResetCounter(opts.def.resetEvery);

    const { scene, camera } = createSceneAndCamera(opts.def.background, opts.aspect);
    this.scene = scene;
    this.camera = camera;
    applyDefaultLighting(scene);

    this.center = makeCenterBlock(opts.def.centerColor);
    this.grid = makeGrid(opts.def.lineColor);
    scene.add(this.center, this.grid);
    for (const line of makeCenterLines(opts.def.centerLineColor)) scene.add(line);

    this.indicator.hide();
  }

  get centerBlock(): CenterBlock {
    return this.center;
  }

  get gridGroup(): THREE.Group {
    return this.grid;
  }

  setClockwise(clockwise: boolean): void {
    this.clockwise = clockwise;
  }

  /** Starts a quarter turn, unless the previous one is still running (frames paused in a hidden tab). */
  rotate(durationSec: number): void {
    if (this.runner.isRunning(this.center)) return;
    const sign = directionSign(this.clockwise);
    const done = () => this.onRotationComplete();
    switch (this.def.strategy) {
      case 'rotateBy':
      case 'rotateByReset': {
        const dz = (Math.PI / 2) * sign;
        this.runner.rotateBy(this.grid, dz, durationSec);
        this.runner.rotateBy(this.center, dz, durationSec, done);
        return;
      }
      case 'rotateTo': {
        const z = (this.angleStepper.next() * Math.PI / 180) * sign;
        this.runner.rotateTo(this.grid, z, durationSec);
        this.runner.rotateTo(this.center, z, durationSec, done);
        return;
      }
      case 'rotateWith': {
        const z = this.tableStepper.next() * sign;
        this.runner.rotateTo(this.grid, z, durationSec);
        this.runner.rotateTo(this.center, z, durationSec, done);
        return;
      }
    }
  }

  /** Throw away the rotating grid and center block and build fresh ones at rest. */
  recreate(): void {
    this.runner.stop(this.center);
    this.runner.stop(this.grid);
    this.scene.remove(this.center, this.grid);
    disposeTree(this.center);
    disposeTree(this.grid);

    this.center = makeCenterBlock(this.def.centerColor);
    this.grid = makeGrid(this.def.lineColor);
    this.scene.add(this.center, this.grid);
    this.counter.clear();
  }

  dispose(): void {
    this.runner.stop(this.center);
    this.runner.stop(this.grid);
    disposeTree(this.scene);
  }

  private onRotationComplete(): void {
    if (this.counter.record()) this.recreate();

    const z = this.center.rotation.z;
    const { delta, isBad } = checkAngleDrift(z, this.thresholdDeg);
    if (isBad) {
      const angle = radToDeg(z) * directionSign(this.clockwise);
      this.log(`Bad Z euler value in ${LOG_LABELS[this.def.strategy]}: Angle: ${angle}°, Delta: ${delta}`);
      this.indicator.show(delta);
      this.center.material.color.setHex(ERROR_COLOR);
    } else {
      this.indicator.hide();
      this.center.material.color.setHex(this.def.centerColor);
    }
  }
}
