export interface Vec2 {
  x: number;
  y: number;
}

export interface Particle {
  x: number;
  y: number;
  phi: number;
}

/**
 * Square grid of atoms. Centers sit at `xBegin + i * side`, `yBegin + j * side`.
 */
export interface Lattice {
  side: number;
  atomR: number;
  xBegin: number;
  yBegin: number;
}

export interface AtomCandidate {
  x: number;
  y: number;
  distance: number;
}

export type AtomCandidates = [AtomCandidate, AtomCandidate, AtomCandidate, AtomCandidate];

export interface SimulationParameters {
  width: number;
  height: number;
  side: number;
  atomR: number;
  electronR: number;
  speed: number;
  nbins: number;
  bin: number;
  paintTraceOnly: boolean;
}

export type StepMode = 'normal' | 'speculative';

export type PlotKind = 'probability' | 'pressure';

export type Rgb = [number, number, number];

export interface HistorySnapshot {
  time: number[];
  prob: number[];
  impulses: number[];
  density: number[];
}

export interface PlotSeries {
  x: number[];
  y: number[];
}

export interface BinCell {
  index: number;
  x0: number;
  x1: number;
  density: number;
  color: Rgb;
  distinguished: boolean;
}
