import * as THREE from 'three';
import { APP_CONFIG } from '../config/appConfig';

/** One renderer per viewport, sized to and mounted in its container. */
export function createRenderer(container: HTMLElement): THREE.WebGLRenderer {
  const renderer = new THREE.WebGLRenderer({ antialias: true });
  const pixelRatio = Math.min(APP_CONFIG.DESKTOP_PIXEL_RATIO_CAP, window.devicePixelRatio);
  renderer.setPixelRatio(pixelRatio);
  const { width, height } = containerSize(container);
  renderer.setSize(width, height);
  container.appendChild(renderer.domElement);
  return renderer;
}

export function containerSize(container: Pick<HTMLElement, 'clientWidth' | 'clientHeight'>): { width: number; height: number } {
  // Hidden or not-yet-laid-out containers report 0; keep the renderer valid.
  return {
    width: Math.max(1, container.clientWidth),
    height: Math.max(1, container.clientHeight),
  };
}
