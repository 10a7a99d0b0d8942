import { describe, it, expect, vi } from 'vitest';
import { RotationTestView } from '../src/view/RotationTestView';
import { RotationActionRunner } from '../src/rotation/RotationActionRunner';
import type { ViewDefinition } from '../src/config/viewDefinitions';
import type { RotationStrategy } from '../src/rotation/targetSteppers';

const CENTER_COLOR = 0x00ffff;

function makeDef(strategy: RotationStrategy, resetEvery = 0): ViewDefinition {
  return {
    id: strategy,
    strategy,
    background: 0x202020,
    lineColor: 0xffffff,
    centerColor: CENTER_COLOR,
    centerLineColor: 0xffff00,
    resetEvery,
  };
}

function setup(strategy: RotationStrategy, resetEvery = 0) {
  const runner = new RotationActionRunner();
  const indicator = { show: vi.fn(), hide: vi.fn() };
  const log = vi.fn();
  const view = new RotationTestView({ def: makeDef(strategy, resetEvery), runner, indicator, thresholdDeg: 0.1, log });
  const turn = () => {
    view.rotate(0.25);
    runner.update(0.25);
  };
  return { runner, indicator, log, view, turn };
}

describe('RotationTestView scene', () => {
  it('builds the rotating grid and center block and starts with the indicator hidden', () => {
    const { view, indicator } = setup('rotateBy');
    expect(view.gridGroup.children.length).toBe(42);
    expect(view.scene.children).toContain(view.gridGroup);
    expect(view.scene.children).toContain(view.centerBlock);
    expect(view.camera.fov).toBe(92.5);
    expect(view.camera.position.z).toBe(10);
    expect(indicator.hide).toHaveBeenCalledTimes(1);
  });
});

describe('RotationTestView rotateBy', () => {
  it('turns the grid and the center block a quarter turn clockwise', () => {
    const { view, indicator, turn } = setup('rotateBy');
    turn();
    expect(view.centerBlock.rotation.z).toBeCloseTo(-Math.PI * 0.5, 10);
    expect(view.gridGroup.rotation.z).toBeCloseTo(-Math.PI * 0.5, 10);
    expect(indicator.show).not.toHaveBeenCalled();
    expect(indicator.hide).toHaveBeenCalledTimes(2);
    expect(view.centerBlock.material.color.getHex()).toBe(CENTER_COLOR);
  });

  it('turns counter-clockwise after the direction changes', () => {
    const { view, turn } = setup('rotateBy');
    view.setClockwise(false);
    turn();
    expect(view.centerBlock.rotation.z).toBeCloseTo(Math.PI * 0.5, 10);
  });

  it('flags drift past the threshold and recovers once it clears', () => {
    const { view, indicator, log, turn } = setup('rotateBy');
    view.centerBlock.rotation.z = 0.3;
    turn();

    expect(indicator.show).toHaveBeenCalledTimes(1);
    expect(indicator.show.mock.calls[0][0]).toBeCloseTo(17.1887339, 5);
    expect(view.centerBlock.material.color.getHex()).toBe(0xff0000);
    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toMatch(/^Bad Z euler value in RotateBy: Angle: 72\.811\d*°, Delta: 17\.188\d*$/);

    view.centerBlock.rotation.z = 0;
    turn();
    expect(indicator.show).toHaveBeenCalledTimes(1);
    expect(view.centerBlock.material.color.getHex()).toBe(CENTER_COLOR);
  });
});

describe('RotationTestView rotateByReset', () => {
  it('rebuilds the rotating geometry once the reset count is reached', () => {
    const { view, turn } = setup('rotateByReset', 2);
    const firstCenter = view.centerBlock;
    const firstGrid = view.gridGroup;

    turn();
    expect(view.counter.count).toBe(1);
    expect(view.centerBlock).toBe(firstCenter);

    turn();
    expect(view.counter.count).toBe(0);
    expect(view.centerBlock).not.toBe(firstCenter);
    expect(view.gridGroup).not.toBe(firstGrid);
    expect(view.centerBlock.rotation.z).toBe(0);
    expect(view.gridGroup.rotation.z).toBe(0);
    expect(view.scene.children).not.toContain(firstCenter);
    expect(view.scene.children).not.toContain(firstGrid);
    expect(view.scene.children).toContain(view.centerBlock);
  });

  it('labels drift lines with its own strategy name', () => {
    const { view, log, turn } = setup('rotateByReset', 10);
    view.centerBlock.rotation.z = 0.3;
    turn();
    expect(log.mock.calls[0][0]).toMatch(/^Bad Z euler value in RotateByReset: /);
  });
});

describe('RotationTestView rotateTo', () => {
  it('walks through the absolute quarter turns without drift', () => {
    const { view, indicator, turn } = setup('rotateTo');
    turn();
    expect(view.centerBlock.rotation.z).toBeCloseTo(-Math.PI * 0.5, 10);
    turn();
    expect(Math.abs(view.centerBlock.rotation.z)).toBeCloseTo(Math.PI, 10);
    turn();
    expect(view.centerBlock.rotation.z).toBeCloseTo(Math.PI * 0.5, 10);
    turn();
    expect(view.centerBlock.rotation.z).toBeCloseTo(0, 10);
    expect(indicator.show).not.toHaveBeenCalled();
  });
});

describe('RotationTestView rotateWith', () => {
  it('follows the radian table', () => {
    const { view, indicator, turn } = setup('rotateWith');
    view.setClockwise(false);
    turn();
    expect(view.centerBlock.rotation.z).toBeCloseTo(Math.PI * 0.5, 10);
    turn();
    turn();
    // 270° counter-clockwise is the same orientation as -90°.
    expect(view.centerBlock.rotation.z).toBeCloseTo(-Math.PI * 0.5, 10);
    expect(view.gridGroup.rotation.z).toBeCloseTo(-Math.PI * 0.5, 10);
    expect(indicator.show).not.toHaveBeenCalled();
  });
});

describe('RotationTestView while frames are paused', () => {
  it('does not queue another turn while the previous one is still running', () => {
    const { view, runner } = setup('rotateBy');
    view.rotate(0.25);
    view.rotate(0.25);
    view.rotate(0.25);
    expect(runner.activeCount).toBe(2);
    runner.update(0.25);
    expect(view.centerBlock.rotation.z).toBeCloseTo(-Math.PI * 0.5, 10);
  });

  it('does not advance the absolute target for a skipped tick', () => {
    const { view, runner } = setup('rotateTo');
    view.rotate(0.25);
    view.rotate(0.25);
    runner.update(0.25);
    view.rotate(0.25);
    runner.update(0.25);
    expect(Math.abs(view.centerBlock.rotation.z)).toBeCloseTo(Math.PI, 10);
  });
});

describe('RotationTestView dispose', () => {
  it('stops running actions', () => {
    const { view, runner } = setup('rotateBy');
    view.rotate(0.25);
    expect(runner.activeCount).toBe(2);
    view.dispose();
    expect(runner.activeCount).toBe(0);
  });
});
