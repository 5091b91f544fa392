import { classifySample } from './classify.js';
import { compareRows, rowKey, type ClassifiedSample, type MetricSample, type WeeklyAggregate } from './types.js';

/**
 * Folds samples into per-week, per-metric, per-device tier counts.
 *
 * Only weeks listed in `weeks` are counted. A key with no samples yields no
 * row, so `total` is always the number of pages actually observed.
 */
export function aggregate(samples: Iterable<MetricSample>, weeks: Iterable<string>): WeeklyAggregate[] {
  const window = new Set(weeks);
  const tallies = new Map<string, WeeklyAggregate>();

  for (const sample of samples) {
    if (!window.has(sample.weekStart)) {
      continue;
    }
    const classified = classifySample(sample);
    const key = rowKey(classified);
    let tally = tallies.get(key);
    if (!tally) {
      tally = {
        weekStart: classified.weekStart,
        metric: classified.metric,
        device: classified.device,
        good: 0,
        ni: 0,
        poor: 0,
        total: 0,
      };
      tallies.set(key, tally);
    }
    tally[classified.tier]++;
    tally.total++;
  }

  return Array.from(tallies.values()).sort(compareRows);
}

/** The `count` most recent distinct weeks present in the samples, oldest first. */
export function recentWeeks(samples: Iterable<Pick<MetricSample, 'weekStart'>>, count: number): string[] {
  const weeks = new Set<string>();
  for (const sample of samples) {
    weeks.add(sample.weekStart);
  }
  const sorted = Array.from(weeks).sort();
  return count > 0 ? sorted.slice(-count) : [];
}

export function latestWeek(rows: Iterable<Pick<WeeklyAggregate, 'weekStart'>>): string | null {
  let latest: string | null = null;
  for (const row of rows) {
    if (latest === null || row.weekStart > latest) {
      latest = row.weekStart;
    }
  }
  return latest;
}

/** Pages whose sample for `week` landed in the Poor tier, with the offending metrics. */
export function poorPages(samples: Iterable<MetricSample>, week: string): Array<{ page: string; hits: string[] }> {
  const byPage = new Map<string, string[]>();
  const classified: ClassifiedSample[] = [];
  for (const sample of samples) {
    if (sample.weekStart === week) {
      classified.push(classifySample(sample));
    }
  }
  classified.sort(compareRows);

  for (const sample of classified) {
    if (sample.tier !== 'poor') {
      continue;
    }
    const hits = byPage.get(sample.page) ?? [];
    hits.push(`${sample.device} ${sample.metric}`);
    byPage.set(sample.page, hits);
  }

  return Array.from(byPage.entries())
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([page, hits]) => ({ page, hits }));
}

export function observedPages(samples: Iterable<MetricSample>, week: string): number {
  const pages = new Set<string>();
  for (const sample of samples) {
    if (sample.weekStart === week) {
      pages.add(sample.page);
    }
  }
  return pages.size;
}
