#!/usr/bin/env node

import 'dotenv/config';
import { Octokit } from '@octokit/core';
import { SvgChartRenderer } from './chart.js';
import { loadConfig, DEFAULT_CONFIG_PATH, type ReportConfig } from './config.js';
import { CruxClient } from './crux.js';
import { describeError } from './errors.js';
import { GitHubHistoryFile } from './github-history.js';
import { HistoryStore, LocalHistoryFile, type HistoryFile } from './history.js';
import { createRunLogger } from './logger.js';
import { SlackNotifier } from './notifier.js';
import { CwvReportJob } from './report.js';
import { resolveTargets } from './sitemap.js';
import { fetchPageTitles } from './titles.js';

function historyFileFor(config: ReportConfig): HistoryFile {
  if (config.history.backend === 'github') {
    const { owner, repo, path, branch, token } = config.history;
    return new GitHubHistoryFile(new Octokit({ auth: token }), { owner, repo, path, branch });
  }
  return new LocalHistoryFile(config.history.path);
}

function optionValue(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  return index >= 0 ? args[index + 1] : undefined;
}

async function main() {
  const args = process.argv.slice(2);
  const dryRun = args.includes('--dry-run');
  const configPath = optionValue(args, '--config') ?? process.env.CWV_CONFIG ?? DEFAULT_CONFIG_PATH;

  const config = loadConfig(configPath);
  const logger = createRunLogger();

  const job = new CwvReportJob(
    {
      originUrl: config.originUrl,
      lookbackWeeks: config.lookbackWeeks,
      chartWeeks: config.chart.weeks,
      onChangeOnly: config.notify.onChangeOnly,
      maxPoorPages: config.notify.maxPoorPages,
      dryRun,
    },
    {
      resolveTargets: () =>
        resolveTargets({
          originUrl: config.originUrl,
          targetPages: config.targetPages,
          sitemapUrl: config.sitemapUrl,
          discoverSitemap: config.discoverSitemap,
          maxPages: config.maxPages,
          logger,
        }),
      source: new CruxClient(config.credentials.cruxApiKey),
      store: new HistoryStore(historyFileFor(config)),
      chart: new SvgChartRenderer(config.chart.outPath),
      notifier: new SlackNotifier({
        webhookUrl: config.credentials.slackWebhookUrl,
        botToken: config.credentials.slackBotToken,
        channelId: config.credentials.slackChannelId,
      }),
      titles: (urls) => fetchPageTitles(urls, logger),
      logger,
    }
  );

  const outcome = await job.run();
  logger.info(`Done: history ${outcome.changed ? 'changed' : 'unchanged'}, ${outcome.historySize} row(s)`);
}

main().catch((error) => {
  console.error('Fatal error:', describeError(error));
  process.exit(1);
});
