/**
 * Chart Geometry
 *
 * Plain number crunching for the inline SVG charts. No DOM, no React.
 */

export interface PlotArea {
  readonly width: number;
  readonly height: number;
  readonly left: number;
  readonly right: number;
  readonly top: number;
  readonly bottom: number;
}

export const DEFAULT_PLOT: PlotArea = {
  width: 640,
  height: 280,
  left: 64,
  right: 16,
  top: 16,
  bottom: 40,
};

export const innerWidth = (plot: PlotArea): number => plot.width - plot.left - plot.right;
export const innerHeight = (plot: PlotArea): number => plot.height - plot.top - plot.bottom;

/**
 * Rounds a maximum up to 1, 2 or 5 times a power of ten. Non-positive
 * maxima give 1 so that an all-zero chart still has an axis.
 */
export const niceCeiling = (max: number): number => {
  if (!Number.isFinite(max) || max <= 0) return 1;

  const magnitude = 10 ** Math.floor(Math.log10(max));
  const normalized = max / magnitude;
  if (normalized <= 1) return magnitude;
  if (normalized <= 2) return 2 * magnitude;
  if (normalized <= 5) return 5 * magnitude;
  return 10 * magnitude;
};

/** Evenly spaced ticks from 0 to `max`, inclusive. */
export const axisTicks = (max: number, count = 4): number[] =>
  Array.from({ length: count + 1 }, (_, i) => (max * i) / count);

/** Y pixel for a value on a 0..max axis. */
export const scaleY = (plot: PlotArea, max: number, value: number): number =>
  plot.top + innerHeight(plot) * (1 - value / max);

/** X pixel for the index-th of `count` evenly spaced points. */
export const pointX = (plot: PlotArea, index: number, count: number): number =>
  count <= 1
    ? plot.left + innerWidth(plot) / 2
    : plot.left + (innerWidth(plot) * index) / (count - 1);

// ─────────────────────────────────────────────────────────────────────────────
// Pie
// ─────────────────────────────────────────────────────────────────────────────

export interface PieSlice {
  readonly fraction: number;
  /** Radians, clockwise from 12 o'clock */
  readonly start: number;
  readonly end: number;
}

/**
 * Slices for non-negative values. Negative values count as zero; an all-zero
 * input gives zero-width slices.
 */
export const pieSlices = (values: readonly number[]): PieSlice[] => {
  const clamped = values.map((v) => (v > 0 ? v : 0));
  const total = clamped.reduce((sum, v) => sum + v, 0);

  let cursor = 0;
  return clamped.map((value) => {
    const fraction = total === 0 ? 0 : value / total;
    const start = cursor;
    cursor += fraction * 2 * Math.PI;
    return { fraction, start, end: cursor };
  });
};

const polar = (cx: number, cy: number, r: number, angle: number): string =>
  `${(cx + r * Math.sin(angle)).toFixed(2)} ${(cy - r * Math.cos(angle)).toFixed(2)}`;

/** SVG path for one wedge. A full circle cannot be drawn as one arc; callers draw a circle. */
export const wedgePath = (cx: number, cy: number, r: number, slice: PieSlice): string => {
  const largeArc = slice.end - slice.start > Math.PI ? 1 : 0;
  return (
    `M ${cx.toFixed(2)} ${cy.toFixed(2)} L ${polar(cx, cy, r, slice.start)} ` +
    `A ${r.toFixed(2)} ${r.toFixed(2)} 0 ${String(largeArc)} 1 ${polar(cx, cy, r, slice.end)} Z`
  );
};

export const CHART_PALETTE = [
  '#2563eb',
  '#f97316',
  '#10b981',
  '#e11d48',
  '#8b5cf6',
  '#0ea5e9',
  '#eab308',
  '#64748b',
  '#db2777',
  '#14b8a6',
] as const;

export const paletteColor = (index: number): string =>
  CHART_PALETTE[index % CHART_PALETTE.length] ?? '#2563eb';
