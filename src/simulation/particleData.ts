/**
 * TypedArray-based particle storage
 *
 * Each particle is stored as 3 consecutive doubles: [x, y, phi].
 * A store keeps spare capacity at the end of its array so that appending
 * does not reallocate on every add; only the first `count` records are live.
 */

import { Particle } from '../types';

export const FLOATS_PER_PARTICLE = 3;

// Offsets within each particle's data
export const OFFSET_X = 0;
export const OFFSET_Y = 1;
export const OFFSET_PHI = 2;

export interface ParticleStore {
  data: Float64Array;
  count: number;
}

/**
 * Create an empty store with room for `capacity` particles
 */
export function createParticleStore(capacity = 16): ParticleStore {
  return {
    data: new Float64Array(Math.max(1, capacity) * FLOATS_PER_PARTICLE),
    count: 0,
  };
}

export function getParticleCount(store: ParticleStore): number {
  return store.count;
}

export function getParticle(store: ParticleStore, index: number): Particle {
  const offset = index * FLOATS_PER_PARTICLE;
  return {
    x: store.data[offset + OFFSET_X],
    y: store.data[offset + OFFSET_Y],
    phi: store.data[offset + OFFSET_PHI],
  };
}

export function setParticle(store: ParticleStore, index: number, particle: Particle): void {
  const offset = index * FLOATS_PER_PARTICLE;
  store.data[offset + OFFSET_X] = particle.x;
  store.data[offset + OFFSET_Y] = particle.y;
  store.data[offset + OFFSET_PHI] = particle.phi;
}

function ensureCapacity(store: ParticleStore, count: number): void {
  const needed = count * FLOATS_PER_PARTICLE;
  if (needed <= store.data.length) return;

  let length = store.data.length;
  while (length < needed) length *= 2;

  const grown = new Float64Array(length);
  grown.set(store.data.subarray(0, store.count * FLOATS_PER_PARTICLE));
  store.data = grown;
}

/**
 * Append one particle at the end of the store. Position bounds are not checked.
 */
export function appendParticle(store: ParticleStore, particle: Particle): void {
  ensureCapacity(store, store.count + 1);
  setParticle(store, store.count, particle);
  store.count++;
}

/**
 * Drop particles from the end until at most `count` remain
 */
export function truncateParticles(store: ParticleStore, count: number): void {
  store.count = Math.max(0, Math.min(store.count, count));
}

/**
 * Create a deep copy of the live part of a store
 */
export function cloneParticleStore(store: ParticleStore): ParticleStore {
  return {
    data: store.data.slice(0, Math.max(1, store.count) * FLOATS_PER_PARTICLE),
    count: store.count,
  };
}

/**
 * Overwrite `dest` with the contents of `source`
 */
export function copyParticleStore(source: ParticleStore, dest: ParticleStore): void {
  ensureCapacity(dest, source.count);
  dest.data.set(source.data.subarray(0, source.count * FLOATS_PER_PARTICLE));
  dest.count = source.count;
}

export function toParticleObjects(store: ParticleStore): Particle[] {
  const particles: Particle[] = [];
  for (let i = 0; i < store.count; i++) {
    particles.push(getParticle(store, i));
  }
  return particles;
}

/**
 * Extract interleaved [x0, y0, x1, y1, ...] positions for drawing
 */
export function extractPositions(store: ParticleStore, out?: Float64Array): Float64Array {
  const positions = out || new Float64Array(store.count * 2);

  for (let i = 0; i < store.count; i++) {
    const offset = i * FLOATS_PER_PARTICLE;
    positions[i * 2 + 0] = store.data[offset + OFFSET_X];
    positions[i * 2 + 1] = store.data[offset + OFFSET_Y];
  }

  return positions;
}
