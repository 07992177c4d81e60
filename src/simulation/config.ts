import { SimulationParameters } from '../types';

export const DEFAULT_PARAMETERS: SimulationParameters = {
  width: 400,
  height: 400,
  side: 25,
  atomR: 5,
  electronR: 2,
  speed: 100,
  nbins: 10,
  bin: 0,
  paintTraceOnly: false,
};

// History capacity; sampling stops once every series holds this many entries
export const MAX_HISTORY = 10000;

// Simulated milliseconds between two history samples
export const MEASURE_PERIOD = 100;

// Random positions tried before an overlapping placement is accepted
export const PLACEMENT_TRIALS = 9;

// Samples shown by a plot
export const PLOT_WINDOW = 200;

export const TRACE_STEPS = 50;
export const TRACE_DT = 40;

export const TWO_PI = Math.PI * 2;
