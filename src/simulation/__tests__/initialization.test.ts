import { describe, it, expect, vi, afterEach } from 'vitest';
import { randomParticle, resizeParticles, PlacementOptions } from '../initialization';
import { createLattice, nearestCenters } from '../lattice';
import { createParticleStore, getParticle, getParticleCount, toParticleObjects } from '../particleData';
import { seededRandom, sequence } from './seededRandom';

const lattice = createLattice(400, 400, 25, 5);

function placement(random: () => number): PlacementOptions {
  return { width: 400, height: 400, lattice, electronR: 2, random };
}

describe('Electron placement', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should reject positions overlapping an atom', () => {
    // first trial lands on the atom at (200, 200), second one between atoms
    const particle = randomParticle(placement(sequence([0.5, 0.5, 0.53125, 0.53125, 0.25])));

    expect(particle.x).toBe(212.5);
    expect(particle.y).toBe(212.5);
    expect(particle.phi).toBeCloseTo(Math.PI / 2);
  });

  it('should keep the last trial when every trial overlaps', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const random = vi.fn(sequence([0.5]));

    const particle = randomParticle(placement(random));

    expect(particle).toEqual({ x: 200, y: 200, phi: Math.PI });
    // 9 trials of two coordinates, then the direction
    expect(random).toHaveBeenCalledTimes(19);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should honor a custom trial count', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const random = vi.fn(sequence([0.5]));

    randomParticle({ ...placement(random), trials: 2 });

    expect(random).toHaveBeenCalledTimes(5);
  });

  it('should place random electrons clear of atoms in a sparse lattice', () => {
    const random = seededRandom(7);
    const minDistance = lattice.atomR + 2;

    for (let i = 0; i < 200; i++) {
      const particle = randomParticle(placement(random));
      expect(particle.x).toBeGreaterThanOrEqual(0);
      expect(particle.x).toBeLessThan(400);
      expect(particle.y).toBeGreaterThanOrEqual(0);
      expect(particle.y).toBeLessThan(400);
      expect(particle.phi).toBeGreaterThanOrEqual(0);
      expect(particle.phi).toBeLessThan(Math.PI * 2);
      nearestCenters(particle, lattice).forEach((c) => {
        expect(c.distance).toBeGreaterThan(minDistance);
      });
    }
  });

  describe('resizeParticles', () => {
    it('should grow the store with random electrons', () => {
      const store = createParticleStore();
      resizeParticles(store, 5, placement(seededRandom(1)));
      expect(getParticleCount(store)).toBe(5);
    });

    it('should remove the most recently added electrons when shrinking', () => {
      const store = createParticleStore();
      resizeParticles(store, 5, placement(seededRandom(2)));
      const firstTwo = toParticleObjects(store).slice(0, 2);

      resizeParticles(store, 2, placement(seededRandom(3)));

      expect(getParticleCount(store)).toBe(2);
      expect(getParticle(store, 0)).toEqual(firstTwo[0]);
      expect(getParticle(store, 1)).toEqual(firstTwo[1]);
    });
  });
});
