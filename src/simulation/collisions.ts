import { Lattice, Particle, Vec2 } from '../types';
import { TWO_PI } from './config';
import { nearestCenter } from './lattice';

export function normalizeAngle(phi: number): number {
  const wrapped = phi % TWO_PI;
  return wrapped < 0 ? wrapped + TWO_PI : wrapped;
}

export interface Arena {
  width: number;
  height: number;
  electronR: number;
}

/**
 * Mirror an electron that left the arena back inside it.
 *
 * Each wall is checked on its own, so a corner overshoot is corrected on both
 * axes independently rather than as one consistent corner bounce.
 * Mutates `p` and returns the summed overshoot (the wall impulse).
 */
export function reflectFromBorders(p: Particle, arena: Arena): number {
  const { width, height, electronR } = arena;
  const bottom = height - electronR;
  const right = width - electronR;
  let impulse = 0;

  if (p.y - electronR > height - 2 * electronR) {
    const overshoot = p.y - bottom;
    p.y = bottom - overshoot;
    p.phi = TWO_PI - p.phi;
    impulse += overshoot;
  }
  if (p.x - electronR > width - 2 * electronR) {
    const overshoot = p.x - right;
    p.x = right - overshoot;
    p.phi = 3 * Math.PI - p.phi;
    impulse += overshoot;
  }
  if (p.y - electronR < 0) {
    const overshoot = electronR - p.y;
    p.y = electronR + overshoot;
    p.phi = TWO_PI - p.phi;
    impulse += overshoot;
  }
  if (p.x - electronR < 0) {
    const overshoot = electronR - p.x;
    p.x = electronR + overshoot;
    p.phi = 3 * Math.PI - p.phi;
    impulse += overshoot;
  }

  p.phi = normalizeAngle(p.phi);
  return impulse;
}

/**
 * Fraction `t` of the segment `from -> to` at which it first touches the
 * circle of radius `r` around `center`, clamped to [0, 1].
 * Null when the segment's line misses the circle, has zero length, or starts
 * inside the circle (an electron placed in an overlap travels straight out).
 */
export function timeOfImpact(from: Vec2, to: Vec2, center: Vec2, r: number): number | null {
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  const fx = from.x - center.x;
  const fy = from.y - center.y;

  const a = dx * dx + dy * dy;
  if (a === 0) return null;

  const b = 2 * (fx * dx + fy * dy);
  const c = fx * fx + fy * fy - r * r;
  if (c < 0) return null;

  const discriminant = b * b - 4 * a * c;
  if (discriminant < 0) return null;

  const t = (-b - Math.sqrt(discriminant)) / (2 * a);
  return Math.min(1, Math.max(0, t));
}

/**
 * Bounce an electron off the nearest atom when its step ended inside one.
 *
 * The electron is moved back to the point of impact, its direction is
 * mirrored about the surface normal there, and it travels the rest of the
 * step along the new direction. Only one bounce is resolved per step.
 * Mutates `p`; returns whether a bounce happened.
 */
export function reflectFromAtom(
  p: Particle,
  previous: Vec2,
  lattice: Lattice,
  electronR: number
): boolean {
  const reach = lattice.atomR + electronR;
  const center = nearestCenter(p, lattice);
  if (center.distance > reach) return false;

  const t = timeOfImpact(previous, p, center, reach);
  if (t === null) return false;

  const dx = p.x - previous.x;
  const dy = p.y - previous.y;
  const hitX = previous.x + t * dx;
  const hitY = previous.y + t * dy;

  const beta = Math.atan2(hitY - center.y, hitX - center.x);
  const phi = normalizeAngle(2 * beta - p.phi - Math.PI);
  const remaining = (1 - t) * Math.hypot(dx, dy);

  p.x = hitX + remaining * Math.cos(phi);
  p.y = hitY + remaining * Math.sin(phi);
  p.phi = phi;
  return true;
}
