import type * as THREE from 'three';
import type { AppContext } from './AppContext';
import { bindDirectionControl } from './directionControl';
import { RotationTicker } from './rotationTicker';
import { startRunLoop } from './runLoop';
import type { Viewport } from './runLoop';
import { APP_CONFIG } from '../config/appConfig';
import { VIEW_DEFINITIONS } from '../config/viewDefinitions';
import { createRenderer } from '../render/createRenderer';
import { RotationActionRunner } from '../rotation/RotationActionRunner';
import { createHud } from '../ui/createHud';
import { DomErrorLabel, DomTickLabels } from '../ui/hudLabels';
import { RotationTestView } from '../view/RotationTestView';

function browserStorage(log: AppContext['log']): Storage | null {
  // Accessing localStorage itself throws when storage is blocked.
  try {
    return window.localStorage;
  } catch (err) {
    log(`Web Storage unavailable, direction will not persist: ${String(err)}`);
    return null;
  }
}

/**
 * Bootstrap: wire DOM, four test views, the one-second rotation timer and the render loop.
 */
export function createApp(ctx: AppContext = {
  raf: (cb) => requestAnimationFrame(cb),
  cancelRaf: (id) => cancelAnimationFrame(id),
  log: (s) => console.warn(s),
}): { dispose(): void } {
  const hud = createHud(VIEW_DEFINITIONS);
  const storage = browserStorage(ctx.log);

  const runner = new RotationActionRunner();
  const viewports: Viewport[] = [];
  const renderers: THREE.WebGLRenderer[] = [];
  const views = hud.views.map((refs) => {
    const renderer = createRenderer(refs.container);
    renderers.push(renderer);
    const view = new RotationTestView({
      def: refs.def,
      runner,
      indicator: new DomErrorLabel(refs.errorLabel),
      thresholdDeg: APP_CONFIG.ERROR_THRESHOLD_DEG,
      log: ctx.log,
    });
    viewports.push({ container: refs.container, renderer, scene: view.scene, camera: view.camera });
    return view;
  });

  bindDirectionControl(hud.directionSel, views, storage, ctx.log);

  const ticker = new RotationTicker({
    views,
    labels: new DomTickLabels(hud.elapsedLabel, hud.views.map((v) => v.countLabel)),
    intervalMs: APP_CONFIG.TICK_INTERVAL_MS,
    rotationDurationSec: APP_CONFIG.ROTATION_DURATION_SEC,
  });

  const loop = startRunLoop({ ctx, runner, viewports, maxFrameDtSec: APP_CONFIG.MAX_FRAME_DT_SEC, win: window });
  ticker.start();

  return {
    dispose() {
      ticker.stop();
      loop.dispose();
      for (const v of views) v.dispose();
      for (const renderer of renderers) {
        renderer.dispose();
        renderer.domElement.remove();
      }
    },
  };
}
