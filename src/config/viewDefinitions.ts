import type { RotationStrategy } from '../rotation/targetSteppers';
import { APP_CONFIG } from './appConfig';

export type ViewDefinition = {
  /** Prefix of the DOM ids: `#<id>View`, `#<id>Count`, `#<id>Error`. */
  id: string;
  strategy: RotationStrategy;
  background: number;
  lineColor: number;
  centerColor: number;
  centerLineColor: number;
  /** Rebuild the rotating geometry after this many rotations. 0 disables resets. */
  resetEvery: number;
};

// Order matters: the ticker rotates views in this order.
export const VIEW_DEFINITIONS: readonly ViewDefinition[] = [
  {
    id: 'rotateBy',
    strategy: 'rotateBy',
    background: 0xff0000,
    lineColor: 0xffffff,
    centerColor: 0x00ffff,
    centerLineColor: 0xffff00,
    resetEvery: 0,
  },
  {
    id: 'rotateByReset',
    strategy: 'rotateByReset',
    background: 0xbf3333,
    lineColor: 0xffffff,
    centerColor: 0x000000,
    centerLineColor: 0xffff00,
    resetEvery: APP_CONFIG.RESET_EVERY_ROTATIONS,
  },
  {
    id: 'rotateTo',
    strategy: 'rotateTo',
    background: 0x00ff00,
    lineColor: 0x000000,
    centerColor: 0xff00ff,
    centerLineColor: 0x000000,
    resetEvery: 0,
  },
  {
    id: 'rotateWith',
    strategy: 'rotateWith',
    background: 0x0000ff,
    lineColor: 0xffffff,
    centerColor: 0xffff00,
    centerLineColor: 0x00ffff,
    resetEvery: 0,
  },
];
