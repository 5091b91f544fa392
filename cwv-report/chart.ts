import fs from 'node:fs/promises';
import path from 'node:path';
import dayjs from 'dayjs';
import { messageOf, PersistenceError } from './errors.js';
import type { TrendSeries } from './percentages.js';
import { DEVICES, DEVICE_LABELS, METRICS, TIERS, TIER_LABELS, type Device, type Tier } from './types.js';

const TIER_COLORS: Record<Tier, string> = {
  good: '#22c55e',
  ni: '#eab308',
  poor: '#ef4444',
};

const DEVICE_DASH: Record<Device, string> = {
  mobile: '0',
  desktop: '6 4',
};

const WIDTH = 720;
const HEADER = 40;
const LEGEND = 30;
const PANEL = 200;
const PAD = { t: 24, r: 20, b: 30, l: 50 };

export interface ChartArtifact {
  path: string;
  filename: string;
  contentType: string;
  contents: string;
}

export interface ChartRenderer {
  render(series: readonly TrendSeries[], title: string): Promise<ChartArtifact>;
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function round(value: number): string {
  return String(Math.round(value * 10) / 10);
}

/**
 * Renders one panel per metric with a line per device and tier on a 0-100%
 * axis. Every plotted point gets one marker circle per tier.
 */
export function renderTrendChart(series: readonly TrendSeries[], title: string): string {
  const weeks = Array.from(new Set(series.flatMap((item) => item.points.map((point) => point.weekStart)))).sort();
  const metrics = METRICS.filter((metric) => series.some((item) => item.metric === metric));
  const height = HEADER + LEGEND + Math.max(metrics.length, 1) * PANEL;
  const parts: string[] = [];

  parts.push(
    `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${WIDTH} ${height}" width="${WIDTH}" height="${height}" font-family="sans-serif">`
  );
  parts.push(`<rect width="${WIDTH}" height="${height}" fill="#ffffff"/>`);
  parts.push(`<text x="${WIDTH / 2}" y="26" text-anchor="middle" font-size="16" font-weight="600">${escapeXml(title)}</text>`);

  if (weeks.length === 0) {
    parts.push(`<text x="${WIDTH / 2}" y="${HEADER + LEGEND + PANEL / 2}" text-anchor="middle" fill="#64748b" font-size="13">No data</text>`);
    parts.push('</svg>');
    return parts.join('\n');
  }

  // legend
  let lx = PAD.l;
  const ly = HEADER + 12;
  for (const tier of TIERS) {
    parts.push(`<line x1="${lx}" y1="${ly}" x2="${lx + 18}" y2="${ly}" stroke="${TIER_COLORS[tier]}" stroke-width="3"/>`);
    parts.push(`<text x="${lx + 24}" y="${ly + 4}" font-size="11">${TIER_LABELS[tier]}</text>`);
    lx += 80;
  }
  for (const device of DEVICES) {
    parts.push(`<line x1="${lx}" y1="${ly}" x2="${lx + 18}" y2="${ly}" stroke="#334155" stroke-width="2" stroke-dasharray="${DEVICE_DASH[device]}"/>`);
    parts.push(`<text x="${lx + 24}" y="${ly + 4}" font-size="11">${DEVICE_LABELS[device]}</text>`);
    lx += 90;
  }

  const chartW = WIDTH - PAD.l - PAD.r;
  const chartH = PANEL - PAD.t - PAD.b;
  const px = (weekStart: string) => {
    const index = weeks.indexOf(weekStart);
    return weeks.length === 1 ? PAD.l + chartW / 2 : PAD.l + (index / (weeks.length - 1)) * chartW;
  };

  metrics.forEach((metric, panelIndex) => {
    const top = HEADER + LEGEND + panelIndex * PANEL;
    const py = (pct: number) => top + PAD.t + chartH - (pct / 100) * chartH;

    parts.push(`<text x="${PAD.l}" y="${top + 14}" font-size="13" font-weight="600">${metric}</text>`);
    for (let pct = 0; pct <= 100; pct += 25) {
      parts.push(
        `<line x1="${PAD.l}" y1="${round(py(pct))}" x2="${WIDTH - PAD.r}" y2="${round(py(pct))}" stroke="#e2e8f0" stroke-width="0.5"/>`
      );
      parts.push(`<text x="${PAD.l - 8}" y="${round(py(pct) + 4)}" text-anchor="end" fill="#64748b" font-size="10">${pct}%</text>`);
    }
    for (const weekStart of weeks) {
      parts.push(
        `<text x="${round(px(weekStart))}" y="${top + PANEL - 10}" text-anchor="middle" fill="#64748b" font-size="10">${dayjs(weekStart).format('MM-DD')}</text>`
      );
    }

    for (const item of series.filter((entry) => entry.metric === metric)) {
      for (const tier of TIERS) {
        const coords = item.points.map((point) => `${round(px(point.weekStart))},${round(py(point[tier]))}`);
        if (coords.length > 1) {
          parts.push(
            `<polyline points="${coords.join(' ')}" fill="none" stroke="${TIER_COLORS[tier]}" stroke-width="2" stroke-dasharray="${DEVICE_DASH[item.device]}"/>`
          );
        }
        for (const point of item.points) {
          parts.push(
            `<circle cx="${round(px(point.weekStart))}" cy="${round(py(point[tier]))}" r="3" fill="${TIER_COLORS[tier]}"><title>${item.device} ${metric} ${TIER_LABELS[tier]} ${round(point[tier])}%</title></circle>`
          );
        }
      }
    }
  });

  parts.push('</svg>');
  return parts.join('\n');
}

export class SvgChartRenderer implements ChartRenderer {
  private outPath: string;

  constructor(outPath: string) {
    this.outPath = path.resolve(outPath);
  }

  async render(series: readonly TrendSeries[], title: string): Promise<ChartArtifact> {
    const contents = renderTrendChart(series, title);
    try {
      await fs.mkdir(path.dirname(this.outPath), { recursive: true });
      await fs.writeFile(this.outPath, contents, 'utf-8');
    } catch (error) {
      throw new PersistenceError(`Unable to write chart ${this.outPath}: ${messageOf(error)}`, { cause: error });
    }
    return {
      path: this.outPath,
      filename: path.basename(this.outPath),
      contentType: 'image/svg+xml',
      contents,
    };
  }
}
