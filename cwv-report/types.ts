export const METRICS = ['LCP', 'INP', 'CLS'] as const;
export const DEVICES = ['mobile', 'desktop'] as const;
export const TIERS = ['good', 'ni', 'poor'] as const;

export type Metric = (typeof METRICS)[number];
export type Device = (typeof DEVICES)[number];
export type Tier = (typeof TIERS)[number];

export const DEVICE_LABELS: Record<Device, string> = {
  mobile: 'Mobile',
  desktop: 'Desktop',
};

export const TIER_LABELS: Record<Tier, string> = {
  good: 'Good',
  ni: 'NI',
  poor: 'Poor',
};

export interface MetricSample {
  metric: Metric;
  device: Device;
  /** YYYY-MM-DD, Sunday of the collection period's last week */
  weekStart: string;
  p75: number;
  /** Origin or page URL the value was reported for */
  page: string;
}

export interface ClassifiedSample extends MetricSample {
  tier: Tier;
}

export interface WeeklyAggregate {
  weekStart: string;
  metric: Metric;
  device: Device;
  good: number;
  ni: number;
  poor: number;
  total: number;
}

export type HistoryRow = WeeklyAggregate;

export function isMetric(value: unknown): value is Metric {
  return typeof value === 'string' && METRICS.some((metric) => metric === value);
}

export function rowKey(row: Pick<WeeklyAggregate, 'weekStart' | 'metric' | 'device'>): string {
  return `${row.weekStart}|${row.metric}|${row.device}`;
}

export function compareRows(
  a: Pick<WeeklyAggregate, 'weekStart' | 'metric' | 'device'>,
  b: Pick<WeeklyAggregate, 'weekStart' | 'metric' | 'device'>
): number {
  if (a.weekStart !== b.weekStart) {
    return a.weekStart < b.weekStart ? -1 : 1;
  }
  if (a.metric !== b.metric) {
    return METRICS.indexOf(a.metric) - METRICS.indexOf(b.metric);
  }
  return DEVICES.indexOf(a.device) - DEVICES.indexOf(b.device);
}
