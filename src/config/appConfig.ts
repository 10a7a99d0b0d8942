export const APP_CONFIG = {
  // Renderer pixel ratio cap.
  DESKTOP_PIXEL_RATIO_CAP: 2,

  // Rotation schedule.
  TICK_INTERVAL_MS: 1000,
  ROTATION_DURATION_SEC: 0.25,
  RESET_EVERY_ROTATIONS: 10,

  // Drift threshold, in degrees.
  ERROR_THRESHOLD_DEG: 0.1,

  // Longest frame the action runner will advance in one go.
  MAX_FRAME_DT_SEC: 0.1,

  // Camera defaults.
  CAMERA_FOV_DEG: 92.5,
  CAMERA_NEAR: 0.1,
  CAMERA_FAR: 100,
  CAMERA_START_POS: { x: 0, y: 0, z: 10 },

  // Omni light.
  LIGHT_COLOR: 0xffffff,
  LIGHT_POS: { x: -5, y: 5, z: 10 },

  // Web Storage key for the rotation direction.
  DIRECTION_PREF_KEY: 'DirectionIndex',
} as const;
