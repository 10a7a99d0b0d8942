import * as THREE from 'three';
import { APP_CONFIG } from '../config/appConfig';

export type CreatedScene = {
  scene: THREE.Scene;
  camera: THREE.PerspectiveCamera;
};

export function createSceneAndCamera(background: number, aspect = 1): CreatedScene {
  const scene = new THREE.Scene();
  scene.background = new THREE.Color(background);

  const camera = new THREE.PerspectiveCamera(
    APP_CONFIG.CAMERA_FOV_DEG,
    aspect,
    APP_CONFIG.CAMERA_NEAR,
    APP_CONFIG.CAMERA_FAR
  );
  camera.position.set(APP_CONFIG.CAMERA_START_POS.x, APP_CONFIG.CAMERA_START_POS.y, APP_CONFIG.CAMERA_START_POS.z);
  scene.add(camera);

  return { scene, camera };
}
