import { BinCell, Rgb } from '../types';

// An empty bin blends into the arena background; the densest one is full blue
export const EMPTY_BIN_COLOR: Rgb = [1, 1, 1];
export const DENSEST_BIN_COLOR: Rgb = [0, 0.5, 1];

/**
 * Blend from the empty-bin color to the densest-bin color by `share`,
 * a bin's density relative to the densest bin, clamped to [0, 1].
 */
export function shadeForDensity(share: number): Rgb {
  const s = Math.min(1, Math.max(0, share));
  return [
    EMPTY_BIN_COLOR[0] + s * (DENSEST_BIN_COLOR[0] - EMPTY_BIN_COLOR[0]),
    EMPTY_BIN_COLOR[1] + s * (DENSEST_BIN_COLOR[1] - EMPTY_BIN_COLOR[1]),
    EMPTY_BIN_COLOR[2] + s * (DENSEST_BIN_COLOR[2] - EMPTY_BIN_COLOR[2]),
  ];
}

/**
 * Vertical slices of the arena with their share of dwell time, shaded
 * relative to the densest slice.
 */
export function buildBinOverlay(
  density: ArrayLike<number>,
  width: number,
  distinguishedBin: number
): BinCell[] {
  const nbins = density.length;
  const binWidth = width / nbins;

  let maxDensity = 0;
  for (let b = 0; b < nbins; b++) {
    maxDensity = Math.max(maxDensity, density[b]);
  }

  const cells: BinCell[] = [];
  for (let b = 0; b < nbins; b++) {
    cells.push({
      index: b,
      x0: b * binWidth,
      x1: (b + 1) * binWidth,
      density: density[b],
      color: shadeForDensity(maxDensity > 0 ? density[b] / maxDensity : 0),
      distinguished: b === distinguishedBin,
    });
  }
  return cells;
}
