import { describe, it, expect } from 'vitest';

import {
  DEFAULT_PLOT,
  axisTicks,
  niceCeiling,
  paletteColor,
  pieSlices,
  pointX,
  scaleY,
  wedgePath,
} from '@/modules/dashboard/shell/render/chart-geometry.js';

describe('niceCeiling', () => {
  it('rounds up to 1, 2 or 5 times a power of ten', () => {
    expect(niceCeiling(0.7)).toBe(1);
    expect(niceCeiling(130)).toBe(200);
    expect(niceCeiling(2600)).toBe(5000);
    expect(niceCeiling(5000)).toBe(5000);
    expect(niceCeiling(7100)).toBe(10000);
  });

  it('gives 1 for empty axes', () => {
    expect(niceCeiling(0)).toBe(1);
    expect(niceCeiling(-5)).toBe(1);
    expect(niceCeiling(Number.NaN)).toBe(1);
  });
});

describe('axisTicks', () => {
  it('spaces ticks evenly from zero', () => {
    expect(axisTicks(200)).toEqual([0, 50, 100, 150, 200]);
  });
});

describe('scaleY and pointX', () => {
  it('maps zero to the bottom and max to the top', () => {
    expect(scaleY(DEFAULT_PLOT, 100, 0)).toBe(240);
    expect(scaleY(DEFAULT_PLOT, 100, 100)).toBe(16);
  });

  it('spreads points across the plot and centres a single one', () => {
    expect(pointX(DEFAULT_PLOT, 0, 3)).toBe(64);
    expect(pointX(DEFAULT_PLOT, 2, 3)).toBe(624);
    expect(pointX(DEFAULT_PLOT, 0, 1)).toBe(344);
  });
});

describe('pieSlices', () => {
  it('splits the circle proportionally', () => {
    const slices = pieSlices([1, 3]);

    expect(slices.map((s) => s.fraction)).toEqual([0.25, 0.75]);
    expect(slices[0]?.end).toBeCloseTo(Math.PI / 2);
    expect(slices[1]?.end).toBeCloseTo(2 * Math.PI);
  });

  it('treats negative values as zero', () => {
    expect(pieSlices([-4, 2]).map((s) => s.fraction)).toEqual([0, 1]);
  });

  it('gives zero-width slices for an all-zero input', () => {
    expect(pieSlices([0, 0]).map((s) => s.fraction)).toEqual([0, 0]);
  });
});

describe('wedgePath', () => {
  it('draws a quarter wedge from twelve o clock', () => {
    expect(wedgePath(100, 100, 50, { fraction: 0.25, start: 0, end: Math.PI / 2 })).toBe(
      'M 100.00 100.00 L 100.00 50.00 A 50.00 50.00 0 0 1 150.00 100.00 Z'
    );
  });

  it('uses the large arc flag past half a circle', () => {
    expect(wedgePath(0, 0, 1, { fraction: 0.75, start: 0, end: 1.5 * Math.PI })).toContain(
      ' 0 1 1 '
    );
  });
});

describe('paletteColor', () => {
  it('cycles through the palette', () => {
    expect(paletteColor(0)).toBe('#2563eb');
    expect(paletteColor(10)).toBe('#2563eb');
    expect(paletteColor(11)).toBe('#f97316');
  });
});
