import * as THREE from 'three';
import { APP_CONFIG } from '../config/appConfig';

/**
 * Add the single omni light every test viewport uses.
 */
export function applyDefaultLighting(scene: THREE.Scene): THREE.PointLight {
  // No distance falloff so the far grid corners stay lit.
  const light = new THREE.PointLight(APP_CONFIG.LIGHT_COLOR, 1, 0, 0);
  light.position.set(APP_CONFIG.LIGHT_POS.x, APP_CONFIG.LIGHT_POS.y, APP_CONFIG.LIGHT_POS.z);
  scene.add(light);
  // Keeps faces turned away from the light readable.
  scene.add(new THREE.AmbientLight(0xffffff, 0.35));
  return light;
}
