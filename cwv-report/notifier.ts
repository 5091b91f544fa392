import { z } from 'zod';
import { latestWeek } from './aggregate.js';
import type { ChartArtifact } from './chart.js';
import { messageOf, TransientIOError } from './errors.js';
import { formatPercent, tierPercentages } from './percentages.js';
import { DEVICES, DEVICE_LABELS, METRICS, type WeeklyAggregate } from './types.js';

export interface PoorPage {
  page: string;
  hits: string[];
  /** Page title used as the link text when known */
  title?: string;
}

export interface SummaryInput {
  originUrl: string;
  /** Aggregates computed by this run */
  aggregates: readonly WeeklyAggregate[];
  observedPages: number;
  targetedPages: number;
  poorPages: readonly PoorPage[];
  maxPoorPages: number;
  lookbackWeeks: number;
}

// `|` ends the link text in Slack markup
export function slackLinkText(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/\|/g, '｜');
}

export function formatMetricLine(row: WeeklyAggregate): string {
  const pct = tierPercentages(row);
  if (!pct) {
    return `${row.metric}: no data`;
  }
  return (
    `${row.metric}: Good ${formatPercent(pct.good)}% | NI ${formatPercent(pct.ni)}% | ` +
    `Poor ${formatPercent(pct.poor)}% (n=${row.total})`
  );
}

export function formatSummary(input: SummaryInput): string {
  const lines: string[] = [`*Core Web Vitals report* (\`${input.originUrl}\`)`];
  const week = latestWeek(input.aggregates);

  if (week === null) {
    lines.push(`No field data available for the last ${input.lookbackWeeks} weeks.`);
    return lines.join('\n');
  }

  lines.push(`Week of ${week}: ${input.observedPages} of ${input.targetedPages} pages with field data`);

  const current = input.aggregates.filter((row) => row.weekStart === week);
  for (const device of DEVICES) {
    const rows = current.filter((row) => row.device === device);
    if (rows.length === 0) {
      continue;
    }
    lines.push(`*${DEVICE_LABELS[device]}*`);
    for (const metric of METRICS) {
      const row = rows.find((item) => item.metric === metric);
      lines.push(row ? formatMetricLine(row) : `${metric}: no data`);
    }
  }

  if (input.poorPages.length > 0 && input.maxPoorPages > 0) {
    lines.push('*Poor pages*');
    for (const entry of input.poorPages.slice(0, input.maxPoorPages)) {
      lines.push(`• <${entry.page}|${slackLinkText(entry.title ?? entry.page)}>: ${entry.hits.join(', ')}`);
    }
    const hidden = input.poorPages.length - input.maxPoorPages;
    if (hidden > 0) {
      lines.push(`…and ${hidden} more`);
    }
  }

  return lines.join('\n');
}

export interface Notifier {
  send(message: string, chart?: ChartArtifact): Promise<void>;
}

export interface SlackConfig {
  webhookUrl?: string;
  botToken?: string;
  channelId?: string;
  apiBase?: string;
}

const SlackApiResponseSchema = z
  .object({
    ok: z.boolean(),
    error: z.string().optional(),
  })
  .passthrough();

const UploadUrlResponseSchema = z.object({
  ok: z.literal(true),
  upload_url: z.string().url(),
  file_id: z.string(),
});

export class SlackNotifier implements Notifier {
  private config: SlackConfig;
  private apiBase: string;

  constructor(config: SlackConfig) {
    this.config = config;
    this.apiBase = config.apiBase ?? 'https://slack.com/api';
  }

  async send(message: string, chart?: ChartArtifact): Promise<void> {
    const { botToken, channelId, webhookUrl } = this.config;
    if (botToken && channelId) {
      if (chart) {
        await this.uploadChart(botToken, channelId, message, chart);
      } else {
        await this.callApi(botToken, 'chat.postMessage', { channel: channelId, text: message, mrkdwn: true });
      }
      return;
    }
    if (webhookUrl) {
      await this.postWebhook(webhookUrl, message);
      return;
    }
    // no delivery configured: the workflow log gets the report
    console.log(message);
  }

  private async request(url: string, init: RequestInit, label: string): Promise<Response> {
    let response: Response;
    try {
      response = await fetch(url, init);
    } catch (error) {
      throw new TransientIOError(`Slack ${label} failed: ${messageOf(error)}`, null, { cause: error });
    }
    if (!response.ok) {
      const text = await response.text();
      throw new TransientIOError(`Slack ${label} returned ${response.status}: ${text}`, response.status);
    }
    return response;
  }

  private async postWebhook(webhookUrl: string, message: string): Promise<void> {
    await this.request(
      webhookUrl,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ text: message }),
      },
      'webhook'
    );
  }

  private async callApi(token: string, method: string, body: Record<string, unknown>): Promise<unknown> {
    const response = await this.request(
      `${this.apiBase}/${method}`,
      {
        method: 'POST',
        headers: { Authorization: `Bearer ${token}`, 'Content-Type': 'application/json; charset=utf-8' },
        body: JSON.stringify(body),
      },
      method
    );
    return this.checkApiResult(method, await response.json());
  }

  private checkApiResult(method: string, payload: unknown): unknown {
    const parsed = SlackApiResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new TransientIOError(`Slack ${method} returned an unexpected payload`);
    }
    if (!parsed.data.ok) {
      throw new TransientIOError(`Slack ${method} failed: ${parsed.data.error ?? 'unknown_error'}`);
    }
    return payload;
  }

  private async uploadChart(token: string, channelId: string, message: string, chart: ChartArtifact): Promise<void> {
    const form = new URLSearchParams({
      filename: chart.filename,
      length: String(Buffer.byteLength(chart.contents, 'utf-8')),
    });
    const ticketResponse = await this.request(
      `${this.apiBase}/files.getUploadURLExternal`,
      {
        method: 'POST',
        headers: { Authorization: `Bearer ${token}`, 'Content-Type': 'application/x-www-form-urlencoded' },
        body: form.toString(),
      },
      'files.getUploadURLExternal'
    );
    const ticketPayload = this.checkApiResult('files.getUploadURLExternal', await ticketResponse.json());
    const ticket = UploadUrlResponseSchema.safeParse(ticketPayload);
    if (!ticket.success) {
      throw new TransientIOError('Slack files.getUploadURLExternal returned no upload URL');
    }

    await this.request(
      ticket.data.upload_url,
      { method: 'POST', headers: { 'Content-Type': chart.contentType }, body: chart.contents },
      'file upload'
    );

    await this.callApi(token, 'files.completeUploadExternal', {
      files: [{ id: ticket.data.file_id, title: chart.filename }],
      channel_id: channelId,
      initial_comment: message,
    });
  }
}
