import { Lattice, Particle } from '../types';
import { PLACEMENT_TRIALS, TWO_PI } from './config';
import { nearestCenters } from './lattice';
import { appendParticle, ParticleStore, truncateParticles } from './particleData';

export type RandomSource = () => number;

export interface PlacementOptions {
  width: number;
  height: number;
  lattice: Lattice;
  electronR: number;
  trials?: number;
  random?: RandomSource;
}

function clearOfAtoms(x: number, y: number, lattice: Lattice, electronR: number): boolean {
  const minDistance = lattice.atomR + electronR;
  return nearestCenters({ x, y }, lattice).every((c) => c.distance > minDistance);
}

/**
 * Pick a random position and direction for a new electron.
 *
 * Up to `trials` uniform positions are drawn; the first one clear of every
 * nearby atom wins. When all of them overlap an atom the last draw is kept.
 */
export function randomParticle(options: PlacementOptions): Particle {
  const {
    width,
    height,
    lattice,
    electronR,
    trials = PLACEMENT_TRIALS,
    random = Math.random,
  } = options;

  let x = 0;
  let y = 0;
  let placed = false;

  for (let trial = 0; trial < trials && !placed; trial++) {
    x = random() * width;
    y = random() * height;
    placed = clearOfAtoms(x, y, lattice, electronR);
  }

  if (!placed) {
    console.warn(
      `No free spot found after ${trials} trials, placing electron over an atom at (${x.toFixed(1)}, ${y.toFixed(1)})`
    );
  }

  const phi = random() * TWO_PI;
  return { x, y, phi };
}

/**
 * Grow or shrink a store to `count` particles. Removal takes the most
 * recently added particles; growth appends randomly placed ones.
 */
export function resizeParticles(
  store: ParticleStore,
  count: number,
  options: PlacementOptions
): void {
  if (count < store.count) {
    truncateParticles(store, count);
    return;
  }

  while (store.count < count) {
    appendParticle(store, randomParticle(options));
  }
}
