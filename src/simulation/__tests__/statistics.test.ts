import { describe, it, expect } from 'vitest';
import { BoundedSeries, History } from '../history';
import { pressureSeries, selectPlotSeries, StatisticsAccumulator } from '../statistics';

describe('BoundedSeries', () => {
  it('should stop appending once full and keep the earliest values', () => {
    const series = new BoundedSeries(3);

    [1, 2, 3, 4, 5].forEach((v) => series.push(v));

    expect(series.full).toBe(true);
    expect(series.toArray()).toEqual([1, 2, 3]);
    expect(series.push(6)).toBe(false);
    expect(series.last()).toBe(3);
  });

  it('should hand out copies', () => {
    const series = new BoundedSeries(3);
    series.push(1);
    const copy = series.toArray();
    copy.push(2);
    expect(series.length).toBe(1);
  });
});

describe('History', () => {
  it('should keep all series at equal length', () => {
    const history = new History(2);

    expect(history.append(1, 0.5, 0)).toBe(true);
    expect(history.append(2, 0.4, 1)).toBe(true);
    expect(history.append(3, 0.3, 2)).toBe(false);

    expect(history.time.toArray()).toEqual([1, 2]);
    expect(history.prob.toArray()).toEqual([0.5, 0.4]);
    expect(history.impulses.toArray()).toEqual([0, 1]);
  });
});

describe('StatisticsAccumulator', () => {
  function accumulator(): StatisticsAccumulator {
    return new StatisticsAccumulator({ width: 100, nbins: 4, bin: 1, measurePeriod: 50 });
  }

  it('should split the width into equal bins', () => {
    const stats = accumulator();
    expect(stats.binWidth).toBe(25);
    expect(stats.binOf(0)).toBe(0);
    expect(stats.binOf(24.9)).toBe(0);
    expect(stats.binOf(25)).toBe(1);
    expect(stats.binOf(99)).toBe(3);
  });

  it('should only credit moves that stay inside one bin', () => {
    const stats = accumulator();

    stats.recordTransit(30, 40, 10);
    stats.recordTransit(10, 30, 10);
    stats.recordTransit(60, 70, 30);

    expect(Array.from(stats.timeInsideAll)).toEqual([0, 10, 30, 0]);
    expect(stats.timeInside).toBe(10);
  });

  it('should not sample before any time has elapsed', () => {
    const stats = accumulator();
    expect(stats.maybeSample()).toBe(false);
    expect(stats.history.length).toBe(0);
  });

  it('should sample once per measuring period', () => {
    const stats = accumulator();
    stats.recordTransit(30, 40, 10);
    stats.recordTransit(60, 70, 30);
    stats.addImpulse(3);

    stats.advance(40);
    expect(stats.maybeSample()).toBe(true);

    stats.advance(20);
    expect(stats.maybeSample()).toBe(false);

    stats.advance(30);
    expect(stats.maybeSample()).toBe(true);

    const snapshot = stats.snapshot();
    expect(snapshot.time).toEqual([0.4, 0.9]);
    expect(snapshot.prob[0]).toBe(0.25);
    expect(snapshot.prob[1]).toBeCloseTo(10 / 90);
    expect(snapshot.impulses).toEqual([3, 3]);
    expect(snapshot.density).toHaveLength(4);
    [0, 0.25, 0.75, 0].forEach((expected, b) => {
      expect(snapshot.density[b]).toBeCloseTo(expected);
    });
  });

  it('should stop sampling when history is full', () => {
    const stats = new StatisticsAccumulator({ width: 100, nbins: 4, bin: 1, capacity: 3, measurePeriod: 10 });

    for (let i = 0; i < 10; i++) {
      stats.advance(10);
      stats.maybeSample();
    }

    expect(stats.history.length).toBe(3);
    expect(stats.history.full).toBe(true);
    expect(stats.snapshot().time).toEqual([0.1, 0.2, 0.3]);
  });

  it('should restart per-bin sums but keep global sums when rebinned', () => {
    const stats = accumulator();
    stats.recordTransit(30, 40, 10);
    stats.addImpulse(2);
    stats.advance(50);

    stats.setBinsCount(2, 100);

    expect(stats.binWidth).toBe(50);
    expect(Array.from(stats.timeInsideAll)).toEqual([0, 0]);
    expect(Array.from(stats.density)).toEqual([0, 0]);
    expect(stats.timeFull).toBe(50);
    expect(stats.impulseSum).toBe(2);
  });

  it('should reset everything on clear', () => {
    const stats = accumulator();
    stats.recordTransit(30, 40, 10);
    stats.addImpulse(2);
    stats.advance(50);
    stats.maybeSample();

    stats.clear();

    expect(stats.timeFull).toBe(0);
    expect(stats.timeInside).toBe(0);
    expect(stats.impulseSum).toBe(0);
    expect(stats.history.length).toBe(0);
    expect(Array.from(stats.timeInsideAll)).toEqual([0, 0, 0, 0]);

    // sampling starts over right away
    stats.advance(10);
    expect(stats.maybeSample()).toBe(true);
  });
});

describe('Plot series', () => {
  const history = {
    time: [1, 2, 4],
    prob: [0, 0.2, 0.3],
    impulses: [0, 4, 10],
    density: [1],
  };

  it('should divide cumulative impulse by elapsed time', () => {
    expect(pressureSeries(history)).toEqual({ x: [1, 2, 4], y: [0, 2, 2.5] });
  });

  it('should keep only the last samples of the window', () => {
    expect(selectPlotSeries(history, 'probability', 2)).toEqual({ x: [2, 4], y: [0.2, 0.3] });
    expect(selectPlotSeries(history, 'pressure', 1)).toEqual({ x: [4], y: [2.5] });
  });
});
