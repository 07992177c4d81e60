import { AtomCandidate, AtomCandidates, Lattice, Vec2 } from '../types';

/**
 * Offset of the first atom row/column: the remainder of the arena size by the
 * cell spacing, or a full cell when the size divides evenly.
 */
export function phase(size: number, side: number): number {
  const r = size % side;
  return r !== 0 ? r : side;
}

export function createLattice(
  width: number,
  height: number,
  side: number,
  atomR: number
): Lattice {
  return {
    side,
    atomR,
    xBegin: phase(width, side),
    yBegin: phase(height, side),
  };
}

function candidate(x: number, y: number, point: Vec2): AtomCandidate {
  return { x, y, distance: Math.hypot(point.x - x, point.y - y) };
}

/**
 * The four floor/ceil combinations of the grid coordinates of `point`.
 * Entries repeat when `point` lies on a grid line.
 */
export function nearestCenters(point: Vec2, lattice: Lattice): AtomCandidates {
  const { side, xBegin, yBegin } = lattice;
  const gx = (point.x - xBegin) / side;
  const gy = (point.y - yBegin) / side;

  const x0 = Math.floor(gx) * side + xBegin;
  const x1 = Math.ceil(gx) * side + xBegin;
  const y0 = Math.floor(gy) * side + yBegin;
  const y1 = Math.ceil(gy) * side + yBegin;

  return [
    candidate(x0, y0, point),
    candidate(x1, y0, point),
    candidate(x0, y1, point),
    candidate(x1, y1, point),
  ];
}

export function nearestCenter(point: Vec2, lattice: Lattice): AtomCandidate {
  const candidates = nearestCenters(point, lattice);
  let best = candidates[0];
  for (let i = 1; i < candidates.length; i++) {
    if (candidates[i].distance < best.distance) best = candidates[i];
  }
  return best;
}

/**
 * Atom centers inside the arena, row by row, for drawing. The last column
 * and row sit on the right and bottom walls.
 */
export function listAtomCenters(lattice: Lattice, width: number, height: number): Vec2[] {
  const centers: Vec2[] = [];
  for (let y = lattice.yBegin; y <= height; y += lattice.side) {
    for (let x = lattice.xBegin; x <= width; x += lattice.side) {
      centers.push({ x, y });
    }
  }
  return centers;
}
