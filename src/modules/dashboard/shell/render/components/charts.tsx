/**
 * Inline SVG Charts
 *
 * Static line, bar, grouped bar and pie charts. Values arrive as plain numbers;
 * labels and legends are already formatted by the caller.
 */

// eslint-disable-next-line @typescript-eslint/naming-convention -- React is a third-party naming standard
import * as React from 'react';

import { formatCompactCurrency, formatCurrency } from '../../../core/format.js';
import {
  DEFAULT_PLOT,
  axisTicks,
  innerHeight,
  innerWidth,
  niceCeiling,
  paletteColor,
  pieSlices,
  pointX,
  scaleY,
  wedgePath,
  type PlotArea,
} from '../chart-geometry.js';
import { colors } from '../styles.js';

import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface LineSeries {
  name: string;
  /** Aligned with the chart labels; null leaves a gap */
  values: readonly (number | null)[];
}

export interface BarDatum {
  label: string;
  value: number;
}

export interface PieDatum {
  label: string;
  amount: Decimal;
}

// ─────────────────────────────────────────────────────────────────────────────
// Shared parts
// ─────────────────────────────────────────────────────────────────────────────

const labelStyle = { fontSize: '11px', fill: colors.muted };

const ValueAxis = ({ plot, max }: { plot: PlotArea; max: number }): React.ReactElement => (
  <g>
    {axisTicks(max).map((tick) => {
      const y = scaleY(plot, max, tick);
      return (
        <g key={tick}>
          <line
            x1={plot.left}
            x2={plot.width - plot.right}
            y1={y}
            y2={y}
            stroke={colors.border}
            strokeWidth={1}
          />
          <text x={plot.left - 6} y={y + 4} textAnchor="end" style={labelStyle}>
            {formatCompactCurrency(tick)}
          </text>
        </g>
      );
    })}
  </g>
);

const Legend = ({ names }: { names: readonly string[] }): React.ReactElement | null => {
  if (names.length < 2) return null;

  return (
    <div style={{ fontSize: '12px', margin: '4px 0 0' }}>
      {names.map((name, i) => (
        <span key={name} style={{ marginRight: '14px', whiteSpace: 'nowrap' }}>
          <span
            style={{
              display: 'inline-block',
              width: '10px',
              height: '10px',
              marginRight: '4px',
              backgroundColor: paletteColor(i),
            }}
          />
          {name}
        </span>
      ))}
    </div>
  );
};

const maxOf = (values: readonly (number | null)[]): number =>
  niceCeiling(values.reduce<number>((max, v) => (v !== null && v > max ? v : max), 0));

// ─────────────────────────────────────────────────────────────────────────────
// Line chart
// ─────────────────────────────────────────────────────────────────────────────

export interface LineChartProps {
  title: string;
  labels: readonly string[];
  series: readonly LineSeries[];
}

export const LineChart = ({ title, labels, series }: LineChartProps): React.ReactElement => {
  const plot = DEFAULT_PLOT;
  const max = maxOf(series.flatMap((s) => s.values));
  const labelEvery = Math.max(1, Math.ceil(labels.length / 12));

  return (
    <figure style={{ margin: '0 0 16px' }}>
      <svg
        xmlns="http://www.w3.org/2000/svg"
        width={plot.width}
        height={plot.height}
        viewBox={`0 0 ${String(plot.width)} ${String(plot.height)}`}
        role="img"
        aria-label={title}
      >
        <ValueAxis plot={plot} max={max} />
        {labels.map((label, i) =>
          i % labelEvery === 0 ? (
            <text
              key={label}
              x={pointX(plot, i, labels.length)}
              y={plot.height - plot.bottom + 16}
              textAnchor="middle"
              style={labelStyle}
            >
              {label}
            </text>
          ) : null
        )}
        {series.map((s, si) => {
          const color = paletteColor(si);
          const points = s.values.flatMap((v, i) =>
            v === null
              ? []
              : [{ key: i, x: pointX(plot, i, labels.length), y: scaleY(plot, max, v) }]
          );
          return (
            <g key={s.name}>
              <polyline
                fill="none"
                stroke={color}
                strokeWidth={2}
                points={points.map((p) => `${p.x.toFixed(2)},${p.y.toFixed(2)}`).join(' ')}
              />
              {points.map((p) => (
                <circle key={p.key} cx={p.x} cy={p.y} r={3} fill={color} />
              ))}
            </g>
          );
        })}
      </svg>
      <Legend names={series.map((s) => s.name)} />
    </figure>
  );
};

// ─────────────────────────────────────────────────────────────────────────────
// Bar charts
// ─────────────────────────────────────────────────────────────────────────────

export interface GroupedBarChartProps {
  title: string;
  groups: readonly string[];
  series: readonly { name: string; values: readonly number[] }[];
}

/** One group per label, one bar per series inside the group. */
export const GroupedBarChart = ({
  title,
  groups,
  series,
}: GroupedBarChartProps): React.ReactElement => {
  const plot = DEFAULT_PLOT;
  const max = maxOf(series.flatMap((s) => s.values));
  const groupWidth = innerWidth(plot) / Math.max(1, groups.length);
  const barWidth = (groupWidth * 0.8) / Math.max(1, series.length);
  const baseline = plot.top + innerHeight(plot);

  return (
    <figure style={{ margin: '0 0 16px' }}>
      <svg
        xmlns="http://www.w3.org/2000/svg"
        width={plot.width}
        height={plot.height}
        viewBox={`0 0 ${String(plot.width)} ${String(plot.height)}`}
        role="img"
        aria-label={title}
      >
        <ValueAxis plot={plot} max={max} />
        {groups.map((group, gi) => {
          const groupX = plot.left + gi * groupWidth + groupWidth * 0.1;
          return (
            <g key={group}>
              {series.map((s, si) => {
                const value = s.values[gi] ?? 0;
                const y = scaleY(plot, max, Math.max(0, value));
                return (
                  <rect
                    key={s.name}
                    x={groupX + si * barWidth}
                    y={y}
                    width={Math.max(1, barWidth - 2)}
                    height={baseline - y}
                    fill={paletteColor(si)}
                  >
                    <title>{`${s.name} ${group}: ${formatCompactCurrency(value)}`}</title>
                  </rect>
                );
              })}
              <text
                x={groupX + (groupWidth * 0.8) / 2}
                y={baseline + 16}
                textAnchor="middle"
                style={labelStyle}
              >
                {group}
              </text>
            </g>
          );
        })}
      </svg>
      <Legend names={series.map((s) => s.name)} />
    </figure>
  );
};

export interface BarChartProps {
  title: string;
  bars: readonly BarDatum[];
}

export const BarChart = ({ title, bars }: BarChartProps): React.ReactElement => (
  <GroupedBarChart
    title={title}
    groups={bars.map((b) => b.label)}
    series={[{ name: title, values: bars.map((b) => b.value) }]}
  />
);

// ─────────────────────────────────────────────────────────────────────────────
// Pie chart
// ─────────────────────────────────────────────────────────────────────────────

export interface PieChartProps {
  title: string;
  data: readonly PieDatum[];
}

export const PieChart = ({ title, data }: PieChartProps): React.ReactElement => {
  const size = 240;
  const radius = 110;
  const center = size / 2;
  const slices = pieSlices(data.map((d) => d.amount.toNumber()));

  return (
    <figure style={{ margin: '0 0 16px', display: 'flex', gap: '24px', alignItems: 'center' }}>
      <svg
        xmlns="http://www.w3.org/2000/svg"
        width={size}
        height={size}
        viewBox={`0 0 ${String(size)} ${String(size)}`}
        role="img"
        aria-label={title}
      >
        {slices.map((slice, i) => {
          const label = data[i]?.label ?? '';
          if (slice.fraction >= 1) {
            return <circle key={label} cx={center} cy={center} r={radius} fill={paletteColor(i)} />;
          }
          if (slice.fraction === 0) return null;
          return (
            <path
              key={label}
              d={wedgePath(center, center, radius, slice)}
              fill={paletteColor(i)}
              stroke="#ffffff"
              strokeWidth={1}
            />
          );
        })}
      </svg>
      <table style={{ fontSize: '12px', borderCollapse: 'collapse' }}>
        <tbody>
          {data.map((d, i) => (
            <tr key={d.label}>
              <td style={{ padding: '2px 6px' }}>
                <span
                  style={{
                    display: 'inline-block',
                    width: '10px',
                    height: '10px',
                    backgroundColor: paletteColor(i),
                  }}
                />
              </td>
              <td style={{ padding: '2px 6px' }}>{d.label}</td>
              <td style={{ padding: '2px 6px', textAlign: 'right' }}>{formatCurrency(d.amount)}</td>
              <td style={{ padding: '2px 6px', textAlign: 'right', color: colors.muted }}>
                {`${((slices[i]?.fraction ?? 0) * 100).toFixed(1)}%`}
              </td>
            </tr>
          ))}
        </tbody>
      </table>
    </figure>
  );
};
