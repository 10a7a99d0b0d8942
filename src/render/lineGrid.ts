import * as THREE from 'three';

export type LinePoint = { x: number; y: number };

/** Thickness along Z of every line box. */
const LINE_DEPTH = 0.01;

/**
 * Build a "line" from a very thin box. Lines are axis aligned: when both ends
 * share a Y value the box spans X, otherwise it spans Y.
 *
 * The box is centered on `from`, not between the two ends.
 */
export function makeLine(from: LinePoint, to: LinePoint, color: number, lineWidth = 0.01): THREE.Mesh {
  const horizontal = from.y === to.y;
  const width = horizontal ? Math.abs(from.x - to.x) : lineWidth;
  const height = horizontal ? lineWidth : Math.abs(from.y - to.y);
  const mesh = new THREE.Mesh(
    new THREE.BoxGeometry(width, height, LINE_DEPTH),
    new THREE.MeshPhongMaterial({ color })
  );
  mesh.position.set(from.x, from.y, 0);
  mesh.name = 'GridNodes';
  return mesh;
}

/**
 * The rotating grid: 21 horizontal lines (y = 10 .. -10) and 21 vertical ones
 * (x = -10 .. 10), one unit apart.
 */
export function makeGrid(color: number): THREE.Group {
  const grid = new THREE.Group();
  grid.name = 'grid';
  for (let y = 10; y >= -10; y--) {
    const line = makeLine({ x: 0, y }, { x: 20, y }, color, 0.1);
    line.name = `Horizontal,${y}`;
    grid.add(line);
  }
  for (let x = -10; x <= 10; x++) {
    const line = makeLine({ x, y: 0 }, { x, y: 20 }, color, 0.1);
    line.name = `Vertical,${x}`;
    grid.add(line);
  }
  return grid;
}

/** The two fixed reference lines through the origin. These never rotate. */
export function makeCenterLines(color: number): THREE.Mesh[] {
  const width = 0.1;
  const vertical = makeLine({ x: 0, y: 20 }, { x: 0, y: -80 }, color, width);
  const horizontal = makeLine({ x: -20, y: 0 }, { x: 80, y: 0 }, color, width);
  return [vertical, horizontal];
}

export function makeCenterBlock(color: number): THREE.Mesh<THREE.BoxGeometry, THREE.MeshPhongMaterial> {
  const block = new THREE.Mesh(
    new THREE.BoxGeometry(6, 6, 1),
    new THREE.MeshPhongMaterial({ color, specular: 0xffffff })
  );
  block.name = 'centerBlock';
  return block;
}

/** Release geometries and materials under `root`. */
export function disposeTree(root: THREE.Object3D): void {
  root.traverse((obj) => {
    if (!(obj instanceof THREE.Mesh)) return;
    obj.geometry.dispose();
    const materials: THREE.Material[] = Array.isArray(obj.material) ? obj.material : [obj.material];
    for (const m of materials) m.dispose();
  });
}
