import { HistorySnapshot, PlotKind, PlotSeries } from '../types';
import { MAX_HISTORY, MEASURE_PERIOD, PLOT_WINDOW } from './config';
import { History } from './history';

export interface StatisticsOptions {
  width: number;
  nbins: number;
  bin: number;
  capacity?: number;
  measurePeriod?: number;
}

/**
 * Running dwell-time and wall-impulse sums, sampled into bounded histories.
 *
 * The arena is cut into `nbins` vertical slices along x. Time is in
 * milliseconds of simulated time; the time series stores it in units of
 * 100 ms.
 */
export class StatisticsAccumulator {
  readonly history: History;
  readonly measurePeriod: number;

  nbins: number;
  bin: number;
  binWidth: number;

  timeFull = 0;
  timeInside = 0;
  impulseSum = 0;
  timeInsideAll: Float64Array;
  density: Float64Array;

  private lastSampledTime: number | null = null;

  constructor(options: StatisticsOptions) {
    const { width, nbins, bin, capacity = MAX_HISTORY, measurePeriod = MEASURE_PERIOD } = options;
    this.history = new History(capacity);
    this.measurePeriod = measurePeriod;
    this.nbins = nbins;
    this.bin = bin;
    this.binWidth = width / nbins;
    this.timeInsideAll = new Float64Array(nbins);
    this.density = new Float64Array(nbins);
  }

  binOf(x: number): number {
    return Math.floor(x / this.binWidth);
  }

  /**
   * Credit `weight` of dwell time to the bin holding both endpoints of a move
   */
  recordTransit(fromX: number, toX: number, weight: number): void {
    const b = this.binOf(fromX);
    if (b !== this.binOf(toX) || b < 0 || b >= this.nbins) return;

    this.timeInsideAll[b] += weight;
    if (b === this.bin) {
      this.timeInside += weight;
    }
  }

  addImpulse(impulse: number): void {
    this.impulseSum += impulse;
  }

  advance(dt: number): void {
    this.timeFull += dt;
  }

  /**
   * Append one sample when a sampling period has elapsed since the last one.
   * Nothing is sampled before any time has passed or once history is full.
   */
  maybeSample(): boolean {
    if (this.history.full || this.timeFull <= 0) return false;
    if (
      this.lastSampledTime !== null &&
      this.lastSampledTime + this.measurePeriod > this.timeFull
    ) {
      return false;
    }

    this.lastSampledTime = this.timeFull;
    this.history.append(this.timeFull / 100, this.timeInside / this.timeFull, this.impulseSum);
    this.updateDensity();
    return true;
  }

  private updateDensity(): void {
    let total = 0;
    for (let b = 0; b < this.nbins; b++) {
      this.density[b] = this.timeInsideAll[b] / this.timeFull;
      total += this.density[b];
    }
    if (total <= 0) return;
    for (let b = 0; b < this.nbins; b++) {
      this.density[b] /= total;
    }
  }

  clear(): void {
    this.timeFull = 0;
    this.timeInside = 0;
    this.impulseSum = 0;
    this.lastSampledTime = null;
    this.timeInsideAll = new Float64Array(this.nbins);
    this.density = new Float64Array(this.nbins);
    this.history.clear();
  }

  /**
   * Repartition the arena. Per-bin sums restart; global time and impulse continue.
   */
  setBinsCount(nbins: number, width: number): void {
    this.nbins = nbins;
    this.binWidth = width / nbins;
    this.timeInsideAll = new Float64Array(nbins);
    this.density = new Float64Array(nbins);
  }

  setWidth(width: number): void {
    this.binWidth = width / this.nbins;
  }

  setBinIndex(bin: number): void {
    this.bin = bin;
  }

  snapshot(): HistorySnapshot {
    return {
      time: this.history.time.toArray(),
      prob: this.history.prob.toArray(),
      impulses: this.history.impulses.toArray(),
      density: Array.from(this.density),
    };
  }
}

/**
 * Cumulative wall impulse per unit time. Samples are only taken once time has
 * elapsed, so every `time[i]` is positive.
 */
export function pressureSeries(history: HistorySnapshot): PlotSeries {
  return {
    x: history.time.slice(),
    y: history.time.map((t, i) => history.impulses[i] / t),
  };
}

/**
 * The most recent `window` samples of one plotted quantity
 */
export function selectPlotSeries(
  history: HistorySnapshot,
  kind: PlotKind,
  window = PLOT_WINDOW
): PlotSeries {
  const series =
    kind === 'probability'
      ? { x: history.time, y: history.prob }
      : pressureSeries(history);

  const start = Math.max(0, series.x.length - window);
  return { x: series.x.slice(start), y: series.y.slice(start) };
}
