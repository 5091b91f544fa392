import fs from 'node:fs';
import yaml from 'yaml';
import { z } from 'zod';
import { InputError, messageOf } from './errors.js';

export const DEFAULT_CONFIG_PATH = 'cwv-report/config.yaml';

const FileConfigSchema = z.object({
  origin_url: z.string().url().optional(),
  lookback_weeks: z.number().int().min(1).max(40).default(4),
  target_pages: z.array(z.string().url()).default([]),
  sitemap_url: z.string().url().nullable().default(null),
  discover_sitemap: z.boolean().default(true),
  max_pages: z.number().int().positive().default(50),
  history: z
    .object({
      backend: z.enum(['file', 'github']).default('file'),
      path: z.string().min(1).default('data/cwv_history.csv'),
      branch: z.string().min(1).optional(),
    })
    .default({}),
  chart: z
    .object({
      out_path: z.string().min(1).default('reports/cwv-trend.svg'),
      weeks: z.number().int().positive().default(12),
    })
    .default({}),
  notify: z
    .object({
      on_change_only: z.boolean().default(false),
      max_poor_pages: z.number().int().nonnegative().default(10),
    })
    .default({}),
});

const EnvSchema = z.object({
  CRUX_API_KEY: z.string().min(1, 'CRUX_API_KEY is required'),
  ORIGIN_URL: z.string().url().optional(),
  LOOKBACK_WEEKS: z.coerce.number().int().min(1).max(40).optional(),
  CWV_HISTORY_BACKEND: z.enum(['file', 'github']).optional(),
  SLACK_WEBHOOK_URL: z.string().url().optional(),
  SLACK_BOT_TOKEN: z.string().min(1).optional(),
  SLACK_CHANNEL_ID: z.string().min(1).optional(),
  HISTORY_GITHUB_TOKEN: z.string().min(1).optional(),
  GITHUB_TOKEN: z.string().min(1).optional(),
  GITHUB_REPOSITORY: z.string().regex(/^[^/\s]+\/[^/\s]+$/, 'expected owner/repo').optional(),
});

export interface ReportConfig {
  originUrl: string;
  lookbackWeeks: number;
  targetPages: string[];
  sitemapUrl: string | null;
  discoverSitemap: boolean;
  maxPages: number;
  history:
    | { backend: 'file'; path: string }
    | { backend: 'github'; path: string; owner: string; repo: string; branch?: string; token: string };
  chart: { outPath: string; weeks: number };
  notify: { onChangeOnly: boolean; maxPoorPages: number };
  credentials: {
    cruxApiKey: string;
    slackWebhookUrl?: string;
    slackBotToken?: string;
    slackChannelId?: string;
  };
}

function describeIssues(error: z.ZodError, source: string): string {
  return error.issues.map((issue) => `${source}${issue.path.length ? `.${issue.path.join('.')}` : ''}: ${issue.message}`).join('; ');
}

// Empty strings are how unset secrets arrive from workflow env blocks.
function presentEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      present[key] = value.trim();
    }
  }
  return present;
}

export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv): ReportConfig {
  const file = FileConfigSchema.safeParse(raw ?? {});
  if (!file.success) {
    throw new InputError(`Invalid configuration: ${describeIssues(file.error, 'config')}`);
  }
  const vars = EnvSchema.safeParse(presentEnv(env));
  if (!vars.success) {
    throw new InputError(`Invalid environment: ${describeIssues(vars.error, 'env')}`);
  }

  const config = file.data;
  const envVars = vars.data;
  const originUrl = envVars.ORIGIN_URL ?? config.origin_url;
  if (!originUrl) {
    throw new InputError('origin_url (or ORIGIN_URL) is required');
  }

  let history: ReportConfig['history'];
  const backend = envVars.CWV_HISTORY_BACKEND ?? config.history.backend;
  if (backend === 'github') {
    const token = envVars.HISTORY_GITHUB_TOKEN ?? envVars.GITHUB_TOKEN;
    if (!token || !envVars.GITHUB_REPOSITORY) {
      throw new InputError('GitHub history backend needs GITHUB_TOKEN and GITHUB_REPOSITORY');
    }
    const [owner, repo] = envVars.GITHUB_REPOSITORY.split('/');
    history = { backend, path: config.history.path, owner, repo, branch: config.history.branch, token };
  } else {
    history = { backend, path: config.history.path };
  }

  return {
    originUrl,
    lookbackWeeks: envVars.LOOKBACK_WEEKS ?? config.lookback_weeks,
    targetPages: config.target_pages,
    sitemapUrl: config.sitemap_url,
    discoverSitemap: config.discover_sitemap,
    maxPages: config.max_pages,
    history,
    chart: { outPath: config.chart.out_path, weeks: config.chart.weeks },
    notify: { onChangeOnly: config.notify.on_change_only, maxPoorPages: config.notify.max_poor_pages },
    credentials: {
      cruxApiKey: envVars.CRUX_API_KEY,
      slackWebhookUrl: envVars.SLACK_WEBHOOK_URL,
      slackBotToken: envVars.SLACK_BOT_TOKEN,
      slackChannelId: envVars.SLACK_CHANNEL_ID,
    },
  };
}

export function loadConfig(configPath: string = DEFAULT_CONFIG_PATH, env: NodeJS.ProcessEnv = process.env): ReportConfig {
  let raw: unknown = {};
  try {
    raw = yaml.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (error: unknown) {
    if ((error as NodeJS.ErrnoException)?.code !== 'ENOENT') {
      throw new InputError(`Unable to read ${configPath}: ${messageOf(error)}`, { cause: error });
    }
  }
  return parseConfig(raw, env);
}
