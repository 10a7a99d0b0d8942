import type * as THREE from 'three';
import type { AppContext } from './AppContext';
import { createFrameClock } from './frameClock';
import type { RotationActionRunner } from '../rotation/RotationActionRunner';
import { containerSize } from '../render/createRenderer';

export type Viewport = {
  container: Pick<HTMLElement, 'clientWidth' | 'clientHeight'>;
  renderer: Pick<THREE.WebGLRenderer, 'render' | 'setSize'>;
  scene: THREE.Scene;
  camera: THREE.PerspectiveCamera;
};

export type RunLoopDeps = {
  ctx: Pick<AppContext, 'raf' | 'cancelRaf'>;
  runner: RotationActionRunner;
  viewports: readonly Viewport[];
  maxFrameDtSec: number;
  win?: Pick<Window, 'addEventListener' | 'removeEventListener'>;
};

/**
 * rAF loop: advances running rotation actions by the frame delta, then renders
 * every viewport.
 */
export function startRunLoop(deps: RunLoopDeps): { dispose(): void } {
  const { ctx, runner, viewports, win } = deps;
  const clock = createFrameClock({ maxFrameDtSec: deps.maxFrameDtSec });
  let rafId = 0;

  const step = (t: number) => {
    runner.update(clock.advance(t / 1000));
    for (const v of viewports) v.renderer.render(v.scene, v.camera);
    rafId = ctx.raf(step);
  };

  const onResize = () => {
    for (const v of viewports) {
      const { width, height } = containerSize(v.container);
      v.camera.aspect = width / height;
      v.camera.updateProjectionMatrix();
      v.renderer.setSize(width, height);
    }
  };

  onResize();
  win?.addEventListener('resize', onResize);
  rafId = ctx.raf(step);

  return {
    dispose() {
      win?.removeEventListener('resize', onResize);
      ctx.cancelRaf(rafId);
    },
  };
}
