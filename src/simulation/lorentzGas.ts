import {
  HistorySnapshot,
  Lattice,
  Particle,
  SimulationParameters,
  StepMode,
} from '../types';
import { DEFAULT_PARAMETERS, TRACE_DT, TRACE_STEPS } from './config';
import { normalizeAngle, reflectFromAtom, reflectFromBorders } from './collisions';
import { RandomSource, resizeParticles } from './initialization';
import { createLattice } from './lattice';
import {
  appendParticle,
  cloneParticleStore,
  copyParticleStore,
  createParticleStore,
  extractPositions,
  FLOATS_PER_PARTICLE,
  OFFSET_PHI,
  OFFSET_X,
  OFFSET_Y,
  ParticleStore,
} from './particleData';
import { StatisticsAccumulator } from './statistics';

/**
 * Everything one simulation owns. All operations below take it explicitly;
 * there is no module-level simulation.
 */
export interface SimulationState {
  params: SimulationParameters;
  lattice: Lattice;
  particles: ParticleStore;
  stats: StatisticsAccumulator;
  saved: ParticleStore | null;
}

export interface SimulationStateOptions {
  capacity?: number;
  measurePeriod?: number;
}

export function createSimulationState(
  overrides: Partial<SimulationParameters> = {},
  options: SimulationStateOptions = {}
): SimulationState {
  const params: SimulationParameters = { ...DEFAULT_PARAMETERS, ...overrides };
  return {
    params,
    lattice: createLattice(params.width, params.height, params.side, params.atomR),
    particles: createParticleStore(),
    stats: new StatisticsAccumulator({
      width: params.width,
      nbins: params.nbins,
      bin: params.bin,
      capacity: options.capacity,
      measurePeriod: options.measurePeriod,
    }),
    saved: null,
  };
}

function rebuildLattice(state: SimulationState): void {
  const { width, height, side, atomR } = state.params;
  state.lattice = createLattice(width, height, side, atomR);
}

export function setDimensions(state: SimulationState, width: number, height: number): void {
  state.params.width = width;
  state.params.height = height;
  rebuildLattice(state);
  state.stats.setWidth(width);
}

export function setSide(state: SimulationState, side: number): void {
  state.params.side = side;
  rebuildLattice(state);
}

export function setAtomR(state: SimulationState, atomR: number): void {
  state.params.atomR = atomR;
  state.lattice = { ...state.lattice, atomR };
}

export function setElectronR(state: SimulationState, electronR: number): void {
  state.params.electronR = electronR;
}

export function setSpeed(state: SimulationState, speed: number): void {
  state.params.speed = speed;
}

export function setBinsCount(state: SimulationState, nbins: number): void {
  state.params.nbins = nbins;
  state.stats.setBinsCount(nbins, state.params.width);
}

export function setBinIndex(state: SimulationState, bin: number): void {
  state.params.bin = bin;
  state.stats.setBinIndex(bin);
}

export function setPaintTraceOnly(state: SimulationState, paintTraceOnly: boolean): void {
  state.params.paintTraceOnly = paintTraceOnly;
}

export function addParticle(state: SimulationState, x: number, y: number, angle: number): void {
  appendParticle(state.particles, { x, y, phi: normalizeAngle(angle) });
}

export function setParticleCount(
  state: SimulationState,
  count: number,
  random?: RandomSource
): void {
  const { width, height, electronR } = state.params;
  resizeParticles(state.particles, count, {
    width,
    height,
    electronR,
    lattice: state.lattice,
    random,
  });
}

export function clearStatistics(state: SimulationState): void {
  state.stats.clear();
}

/**
 * Remember the current particles. A later save replaces the earlier one.
 */
export function saveSnapshot(state: SimulationState): void {
  state.saved = cloneParticleStore(state.particles);
}

/**
 * Restore the particles remembered by the last `saveSnapshot`.
 * Throws if nothing was saved.
 */
export function loadSnapshot(state: SimulationState): void {
  if (!state.saved) {
    throw new Error('loadSnapshot() called without a prior saveSnapshot()');
  }
  copyParticleStore(state.saved, state.particles);
}

/**
 * Advance every electron by `dt` milliseconds.
 *
 * Each electron moves in a straight line, is mirrored back from the walls and
 * then bounces off at most one atom. In 'normal' mode wall impulse and dwell
 * time are accumulated and a history sample may be taken; 'speculative' steps
 * only move particles.
 */
export function step(
  state: SimulationState,
  dt: number,
  mode: StepMode = state.params.paintTraceOnly ? 'speculative' : 'normal'
): void {
  const { params, lattice, particles, stats } = state;
  const { width, height, electronR } = params;
  const arena = { width, height, electronR };
  const distance = (params.speed * dt) / 1000;
  const record = mode === 'normal';
  const weight = particles.count > 0 ? dt / particles.count : 0;
  const data = particles.data;

  for (let i = 0; i < particles.count; i++) {
    const offset = i * FLOATS_PER_PARTICLE;
    const oldX = data[offset + OFFSET_X];
    const oldY = data[offset + OFFSET_Y];
    const phi = data[offset + OFFSET_PHI];

    const p: Particle = {
      x: oldX + Math.cos(phi) * distance,
      y: oldY + Math.sin(phi) * distance,
      phi,
    };

    const impulse = reflectFromBorders(p, arena);
    reflectFromAtom(p, { x: oldX, y: oldY }, lattice, electronR);

    data[offset + OFFSET_X] = p.x;
    data[offset + OFFSET_Y] = p.y;
    data[offset + OFFSET_PHI] = p.phi;

    if (record) {
      stats.addImpulse(impulse);
      stats.recordTransit(oldX, p.x, weight);
    }
  }

  if (record) {
    stats.advance(dt);
    stats.maybeSample();
  }
}

/**
 * Predicted short-term paths: positions after each of `steps` speculative
 * steps, starting with the current ones. Works on a copy of the particles,
 * so the simulation itself is left untouched.
 */
export function traceTrajectories(
  state: SimulationState,
  steps = TRACE_STEPS,
  dt = TRACE_DT
): Float64Array[] {
  const shadow: SimulationState = {
    ...state,
    particles: cloneParticleStore(state.particles),
    saved: null,
  };

  const frames = [extractPositions(shadow.particles)];
  for (let i = 0; i < steps; i++) {
    step(shadow, dt, 'speculative');
    frames.push(extractPositions(shadow.particles));
  }
  return frames;
}

export function getPositions(state: SimulationState): Float64Array {
  return extractPositions(state.particles);
}

export function getHistory(state: SimulationState): HistorySnapshot {
  return state.stats.snapshot();
}
