import { aggregate, latestWeek, observedPages, poorPages, recentWeeks } from './aggregate.js';
import type { ChartArtifact, ChartRenderer } from './chart.js';
import type { CruxTarget, SampleSource } from './crux.js';
import { describeError } from './errors.js';
import type { HistoryStore } from './history.js';
import type { RunLogger } from './logger.js';
import { formatSummary, type Notifier } from './notifier.js';
import { buildTrendSeries, restrictToRecentWeeks } from './percentages.js';
import type { WeeklyAggregate } from './types.js';

export interface ReportJobOptions {
  originUrl: string;
  lookbackWeeks: number;
  chartWeeks: number;
  onChangeOnly: boolean;
  maxPoorPages: number;
  dryRun: boolean;
}

export interface ReportJobDeps {
  resolveTargets: () => Promise<CruxTarget[]>;
  source: SampleSource;
  store: HistoryStore;
  chart: ChartRenderer;
  notifier: Notifier;
  /** Titles for the listed Poor pages, keyed by URL */
  titles: (urls: readonly string[]) => Promise<Map<string, string>>;
  logger: RunLogger;
}

export interface ReportOutcome {
  changed: boolean;
  aggregates: WeeklyAggregate[];
  historySize: number;
  message: string;
  chartPath: string | null;
  notified: boolean;
}

export class CwvReportJob {
  private options: ReportJobOptions;
  private deps: ReportJobDeps;

  constructor(options: ReportJobOptions, deps: ReportJobDeps) {
    this.options = options;
    this.deps = deps;
  }

  /**
   * Fetch, aggregate and persist are all-or-nothing: any failure before the
   * history write aborts the run. Chart and delivery failures after a
   * successful write are logged and the run still succeeds.
   */
  async run(): Promise<ReportOutcome> {
    const { logger, source, store } = this.deps;
    const { dryRun, lookbackWeeks } = this.options;
    logger.info(`Starting CWV report for ${this.options.originUrl} (${dryRun ? 'DRY-RUN' : 'LIVE'})`);

    const targets = await this.deps.resolveTargets();
    logger.info(`Querying ${targets.length} target(s) over ${lookbackWeeks} week(s)`);

    const samples = await source.fetchSamples(targets, lookbackWeeks);
    const weeks = recentWeeks(samples, lookbackWeeks);
    const aggregates = aggregate(samples, weeks);
    logger.info(`Aggregated ${samples.length} sample(s) into ${aggregates.length} weekly row(s)`);

    const merged = await store.upsert(aggregates, dryRun);
    if (merged.changed) {
      logger.info(`${dryRun ? 'Would update' : 'Updated'} history ${store.describe()} (${merged.rows.length} rows)`);
    } else {
      logger.info(`History ${store.describe()} already up to date`);
    }

    let chart: ChartArtifact | undefined;
    if (merged.changed && !dryRun) {
      const series = buildTrendSeries(restrictToRecentWeeks(merged.rows, this.options.chartWeeks));
      try {
        chart = await this.deps.chart.render(series, `Core Web Vitals trend: ${this.options.originUrl}`);
        logger.info(`Wrote chart ${chart.path}`);
      } catch (error) {
        logger.warn(`Chart rendering failed: ${describeError(error)}`);
      }
    }

    const week = latestWeek(aggregates);
    const flagged = week === null ? [] : poorPages(samples, week);
    let titles = new Map<string, string>();
    try {
      titles = await this.deps.titles(flagged.slice(0, this.options.maxPoorPages).map((entry) => entry.page));
    } catch (error) {
      logger.warn(`Page titles unavailable: ${describeError(error)}`);
    }

    const message = formatSummary({
      originUrl: this.options.originUrl,
      aggregates,
      observedPages: week === null ? 0 : observedPages(samples, week),
      targetedPages: targets.length,
      poorPages: flagged.map((entry) => {
        const title = titles.get(entry.page);
        return title ? { ...entry, title } : entry;
      }),
      maxPoorPages: this.options.maxPoorPages,
      lookbackWeeks,
    });

    let notified = false;
    if (dryRun) {
      logger.info(`[DRY-RUN] Would send:\n${message}`);
    } else if (this.options.onChangeOnly && !merged.changed) {
      logger.info('No history change; skipping notification');
    } else {
      try {
        await this.deps.notifier.send(message, chart);
        notified = true;
        logger.info('Summary delivered');
      } catch (error) {
        logger.warn(`Notification failed: ${describeError(error)}`);
      }
    }

    return {
      changed: merged.changed,
      aggregates,
      historySize: merged.rows.length,
      message,
      chartPath: chart?.path ?? null,
      notified,
    };
  }
}
