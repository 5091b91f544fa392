import { DEVICES, METRICS, type Device, type Metric, type WeeklyAggregate } from './types.js';

export interface TierPercentages {
  good: number;
  ni: number;
  poor: number;
}

export interface TrendPoint extends TierPercentages {
  weekStart: string;
  total: number;
}

export interface TrendSeries {
  metric: Metric;
  device: Device;
  points: TrendPoint[];
}

/** Share of `total` per tier, 0-100. Null when nothing was observed. */
export function tierPercentages(row: Pick<WeeklyAggregate, 'good' | 'ni' | 'poor' | 'total'>): TierPercentages | null {
  if (row.total <= 0) {
    return null;
  }
  return {
    good: (row.good * 100) / row.total,
    ni: (row.ni * 100) / row.total,
    poor: (row.poor * 100) / row.total,
  };
}

export function formatPercent(value: number): string {
  return (Math.round(value * 10) / 10).toFixed(1);
}

/** Rows belonging to the `weeks` most recent weeks present. */
export function restrictToRecentWeeks<T extends Pick<WeeklyAggregate, 'weekStart'>>(rows: readonly T[], weeks: number): T[] {
  if (weeks <= 0) {
    return [];
  }
  const recent = new Set(Array.from(new Set(rows.map((row) => row.weekStart))).sort().slice(-weeks));
  return rows.filter((row) => recent.has(row.weekStart));
}

/** One series per metric/device, skipping weeks with a zero total. */
export function buildTrendSeries(rows: readonly WeeklyAggregate[]): TrendSeries[] {
  const series: TrendSeries[] = [];
  for (const metric of METRICS) {
    for (const device of DEVICES) {
      const points: TrendPoint[] = [];
      const matching = rows
        .filter((row) => row.metric === metric && row.device === device)
        .sort((a, b) => (a.weekStart < b.weekStart ? -1 : a.weekStart > b.weekStart ? 1 : 0));
      for (const row of matching) {
        const pct = tierPercentages(row);
        if (pct) {
          points.push({ weekStart: row.weekStart, total: row.total, ...pct });
        }
      }
      if (points.length > 0) {
        series.push({ metric, device, points });
      }
    }
  }
  return series;
}
