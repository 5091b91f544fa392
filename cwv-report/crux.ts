import dayjs from 'dayjs';
import { z } from 'zod';
import { InputError, messageOf, TransientIOError } from './errors.js';
import { DEVICES, METRICS, type Device, type Metric, type MetricSample } from './types.js';

export const CRUX_ENDPOINT = 'https://chromeuxreport.googleapis.com/v1';

export const CRUX_METRIC_KEYS: Record<Metric, string> = {
  LCP: 'largest_contentful_paint',
  INP: 'interaction_to_next_paint',
  CLS: 'cumulative_layout_shift',
};

const FORM_FACTORS: Record<Device, 'PHONE' | 'DESKTOP'> = {
  mobile: 'PHONE',
  desktop: 'DESKTOP',
};

// The History API serves at most 40 collection periods.
const MAX_COLLECTION_PERIODS = 40;

export type CruxTarget = { kind: 'origin'; url: string } | { kind: 'page'; url: string };

export interface SampleSource {
  fetchSamples(targets: readonly CruxTarget[], lookbackWeeks: number): Promise<MetricSample[]>;
}

const CruxDateSchema = z.object({
  year: z.number().int(),
  month: z.number().int().min(1).max(12),
  day: z.number().int().min(1).max(31),
});

const HistoryRecordSchema = z.object({
  record: z.object({
    metrics: z
      .record(
        z
          .object({
            percentilesTimeseries: z
              .object({ p75s: z.array(z.union([z.number(), z.string(), z.null()])) })
              .optional(),
          })
          .passthrough()
      )
      .default({}),
    collectionPeriods: z.array(z.object({ firstDate: CruxDateSchema, lastDate: CruxDateSchema })),
  }),
});

export function weekStartOf(date: z.infer<typeof CruxDateSchema>): string {
  return dayjs(new Date(date.year, date.month - 1, date.day)).startOf('week').format('YYYY-MM-DD');
}

function toP75(value: number | string, metric: Metric, page: string): number {
  if (typeof value === 'string' && value.trim() === '') {
    throw new InputError(`Empty p75 for ${metric} on ${page}`);
  }
  const numeric = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(numeric)) {
    throw new InputError(`Non-numeric p75 "${value}" for ${metric} on ${page}`);
  }
  return numeric;
}

/** Maps a History API payload onto samples. Null p75 entries are periods without data. */
export function recordToSamples(payload: unknown, device: Device, page: string): MetricSample[] {
  const parsed = HistoryRecordSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InputError(
      `Malformed CrUX response for ${page}: ${issue?.path.join('.') ?? '?'} ${issue?.message ?? 'invalid'}`
    );
  }

  const { metrics, collectionPeriods } = parsed.data.record;
  const weeks = collectionPeriods.map((period) => weekStartOf(period.lastDate));
  const samples: MetricSample[] = [];

  for (const metric of METRICS) {
    const key = CRUX_METRIC_KEYS[metric];
    const p75s = metrics[key]?.percentilesTimeseries?.p75s;
    if (!p75s) {
      continue;
    }
    if (p75s.length !== weeks.length) {
      throw new InputError(
        `CrUX returned ${p75s.length} ${key} values for ${weeks.length} collection periods (${page})`
      );
    }
    p75s.forEach((value, index) => {
      if (value === null) {
        return;
      }
      samples.push({ metric, device, weekStart: weeks[index], p75: toP75(value, metric, page), page });
    });
  }

  return samples;
}

export interface CruxClientOptions {
  endpoint?: string;
}

export class CruxClient implements SampleSource {
  private apiKey: string;
  private endpoint: string;

  constructor(apiKey: string, options: CruxClientOptions = {}) {
    this.apiKey = apiKey;
    this.endpoint = options.endpoint ?? CRUX_ENDPOINT;
  }

  async queryHistory(target: CruxTarget, device: Device, periods: number): Promise<MetricSample[]> {
    const url = `${this.endpoint}/records:queryHistoryRecord?key=${encodeURIComponent(this.apiKey)}`;
    const body = {
      ...(target.kind === 'origin' ? { origin: target.url } : { url: target.url }),
      formFactor: FORM_FACTORS[device],
      metrics: Object.values(CRUX_METRIC_KEYS),
      collectionPeriodCount: Math.min(Math.max(periods, 1), MAX_COLLECTION_PERIODS),
    };

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
      });
    } catch (error) {
      throw new TransientIOError(`CrUX request failed for ${target.url}: ${messageOf(error)}`, null, {
        cause: error,
      });
    }

    // 404 means CrUX has too little traffic data for this key
    if (response.status === 404) {
      return [];
    }
    if (!response.ok) {
      const text = await response.text();
      throw new TransientIOError(`CrUX API error for ${target.url}: ${response.status} ${text}`, response.status);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new InputError(`CrUX response for ${target.url} is not JSON`, { cause: error });
    }
    return recordToSamples(payload, device, target.url);
  }

  async fetchSamples(targets: readonly CruxTarget[], lookbackWeeks: number): Promise<MetricSample[]> {
    const samples: MetricSample[] = [];
    for (const target of targets) {
      for (const device of DEVICES) {
        samples.push(...(await this.queryHistory(target, device, lookbackWeeks)));
      }
    }
    return samples;
  }
}
