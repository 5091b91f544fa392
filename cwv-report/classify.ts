import { InputError } from './errors.js';
import { isMetric, type ClassifiedSample, type Metric, type MetricSample, type Tier } from './types.js';

export interface TierThresholds {
  /** Upper bound (inclusive) of Good */
  good: number;
  /** Upper bound (inclusive) of Needs Improvement */
  ni: number;
}

// Google's published Core Web Vitals thresholds; LCP and INP in ms, CLS unitless.
export const THRESHOLDS: Record<Metric, TierThresholds> = {
  LCP: { good: 2500, ni: 4000 },
  INP: { good: 200, ni: 500 },
  CLS: { good: 0.1, ni: 0.25 },
};

export function classify(metric: string, p75: number): Tier {
  if (!isMetric(metric)) {
    throw new InputError(`Unknown metric "${metric}"`);
  }
  if (!Number.isFinite(p75) || p75 < 0) {
    throw new InputError(`Invalid p75 value for ${metric}: ${p75}`);
  }
  const thresholds = THRESHOLDS[metric];
  if (p75 <= thresholds.good) {
    return 'good';
  }
  if (p75 <= thresholds.ni) {
    return 'ni';
  }
  return 'poor';
}

export function classifySample(sample: MetricSample): ClassifiedSample {
  return { ...sample, tier: classify(sample.metric, sample.p75) };
}
