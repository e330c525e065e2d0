/**
 * Color palettes and marker symbol sets
 *
 * Continuous palettes map a normalized value t (0-1) to an HSL color string;
 * categorical palettes are fixed color cycles. Both are pure so that the
 * same data always gets the same colors.
 */

import type { CategoricalPalette, ContinuousPalette, MarkerSymbol } from '@/types/dashboard';

// ============= Continuous Palettes =============

/**
 * Piecewise-linear HSL interpolation between evenly spaced stops
 */
function hslRamp(stops: readonly (readonly [number, number, number])[]): (t: number) => string {
  return (t) => {
    const scaled = t * (stops.length - 1);
    const i = Math.min(Math.floor(scaled), stops.length - 2);
    const s = scaled - i;
    const [h0, s0, l0] = stops[i];
    const [h1, s1, l1] = stops[i + 1];
    const h = Math.round(h0 + (h1 - h0) * s);
    const sat = Math.round(s0 + (s1 - s0) * s);
    const light = Math.round(l0 + (l1 - l0) * s);
    return `hsl(${h}, ${sat}%, ${light}%)`;
  };
}

export const CONTINUOUS_PALETTES: Record<ContinuousPalette, (t: number) => string> = {
  // Purple -> blue -> green -> yellow
  viridis: hslRamp([[270, 70, 25], [240, 80, 35], [180, 70, 45], [100, 65, 55], [60, 50, 70]]),
  // Purple -> pink -> orange -> yellow
  plasma: hslRamp([[280, 80, 25], [260, 90, 45], [50, 80, 55], [40, 90, 75]]),
  // Black -> purple -> red -> yellow
  inferno: hslRamp([[280, 60, 10], [290, 80, 25], [20, 90, 40], [40, 90, 55], [60, 70, 85]]),
  // Navy -> teal -> olive -> yellow, colorblind-friendly
  cividis: hslRamp([[235, 50, 25], [210, 70, 35], [180, 60, 45], [80, 50, 55], [50, 80, 80]]),
  // Two stops; the hue sweeps 240 -> 0 through cyan, green and yellow
  blue_red: hslRamp([[240, 70, 50], [0, 70, 50]]),
  // Diverging blue -> white -> red
  coolwarm: hslRamp([[220, 70, 50], [220, 0, 95], [10, 70, 50]]),
  // Two stops; the hue sweeps 0 -> 240 through yellow, green and cyan
  spectral: hslRamp([[0, 80, 50], [240, 80, 50]]),
  blues: hslRamp([[215, 60, 90], [215, 90, 35]]),
  greens: hslRamp([[140, 50, 90], [140, 90, 35]]),
  // Improved rainbow
  turbo: hslRamp([[260, 70, 35], [220, 90, 50], [180, 85, 55], [120, 80, 50], [50, 90, 50], [5, 90, 45]]),
};

// ============= Categorical Palettes =============

export const CATEGORICAL_PALETTES: Record<CategoricalPalette, readonly string[]> = {
  plotly: [
    '#636efa', '#ef553b', '#00cc96', '#ab63fa', '#ffa15a',
    '#19d3f3', '#ff6692', '#b6e880', '#ff97ff', '#fecb52',
  ],

  default: [
    'hsl(173, 80%, 45%)', // Teal
    'hsl(217, 70%, 50%)', // Blue
    'hsl(142, 76%, 45%)', // Green
    'hsl(38, 92%, 50%)',  // Orange
    'hsl(280, 65%, 55%)', // Purple
    'hsl(350, 70%, 55%)', // Red
    'hsl(200, 70%, 45%)', // Cyan
    'hsl(95, 60%, 45%)',  // Lime
    'hsl(320, 60%, 55%)', // Magenta
    'hsl(55, 80%, 45%)',  // Yellow
  ],

  tableau10: [
    '#4e79a7', '#f28e2b', '#e15759', '#76b7b2', '#59a14f',
    '#edc948', '#b07aa1', '#ff9da7', '#9c755f', '#bab0ac',
  ],

  set1: [
    '#e41a1c', '#377eb8', '#4daf4a', '#984ea3', '#ff7f00',
    '#ffff33', '#a65628', '#f781bf', '#999999',
  ],

  set2: [
    '#66c2a5', '#fc8d62', '#8da0cb', '#e78ac3', '#a6d854',
    '#ffd92f', '#e5c494', '#b3b3b3',
  ],

  paired: [
    '#a6cee3', '#1f78b4', '#b2df8a', '#33a02c', '#fb9a99',
    '#e31a1c', '#fdbf6f', '#ff7f00', '#cab2d6', '#6a3d9a',
  ],
};

// ============= Symbols =============

export const MARKER_SYMBOLS: readonly MarkerSymbol[] = [
  'circle', 'square', 'diamond', 'cross', 'x', 'triangle-up', 'triangle-down', 'star',
];

/** Symbols the map renderer can draw */
export const MAP_SYMBOLS: readonly MarkerSymbol[] = ['circle', 'square', 'triangle-up', 'star'];

/**
 * Map symbols fall back to circle when the map renderer cannot draw them
 */
export function toMapSymbol(symbol: MarkerSymbol): MarkerSymbol {
  return MAP_SYMBOLS.includes(symbol) ? symbol : 'circle';
}

// ============= Color Utility Functions =============

/**
 * Get categorical color by index (wraps around)
 */
export function getCategoricalColor(
  index: number,
  palette: CategoricalPalette = 'plotly'
): string {
  const colors = CATEGORICAL_PALETTES[palette];
  return colors[index % colors.length];
}

/**
 * Get continuous color by normalized value
 */
export function getContinuousColor(
  t: number, // 0-1 normalized value
  palette: ContinuousPalette = 'viridis'
): string {
  const clampedT = Math.max(0, Math.min(1, t));
  return CONTINUOUS_PALETTES[palette](clampedT);
}

/**
 * Normalize a value to 0-1 range
 */
export function normalizeValue(value: number, min: number, max: number): number {
  if (max === min) return 0.5;
  return (value - min) / (max - min);
}

/**
 * Smallest and largest value, in one pass. Null when there are none.
 */
export function valueRange(values: Iterable<number>): { min: number; max: number } | null {
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return min <= max ? { min, max } : null;
}
