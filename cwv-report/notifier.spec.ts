import assert from 'node:assert/strict';
import { test } from 'node:test';
import { TransientIOError } from './errors.js';
import { SlackNotifier, formatMetricLine, formatSummary } from './notifier.js';
import type { WeeklyAggregate } from './types.js';

const WEEK = '2024-01-07';

const AGGREGATES: WeeklyAggregate[] = [
  { weekStart: '2023-12-31', metric: 'LCP', device: 'mobile', good: 1, ni: 0, poor: 0, total: 1 },
  { weekStart: WEEK, metric: 'LCP', device: 'mobile', good: 8, ni: 1, poor: 1, total: 10 },
  { weekStart: WEEK, metric: 'LCP', device: 'desktop', good: 2, ni: 1, poor: 0, total: 3 },
  { weekStart: WEEK, metric: 'INP', device: 'mobile', good: 10, ni: 0, poor: 0, total: 10 },
];

const CHART = {
  path: '/tmp/cwv-trend.svg',
  filename: 'cwv-trend.svg',
  contentType: 'image/svg+xml',
  contents: '<svg></svg>',
};

test('formatSummary renders one line per metric for each device of the latest week', () => {
  const message = formatSummary({
    originUrl: 'https://www.example.com',
    aggregates: AGGREGATES,
    observedPages: 10,
    targetedPages: 12,
    poorPages: [
      { page: 'https://www.example.com/a', hits: ['mobile LCP'] },
      { page: 'https://www.example.com/b', hits: ['mobile LCP'] },
    ],
    maxPoorPages: 1,
    lookbackWeeks: 4,
  });
  assert.equal(
    message,
    [
      '*Core Web Vitals report* (`https://www.example.com`)',
      'Week of 2024-01-07: 10 of 12 pages with field data',
      '*Mobile*',
      'LCP: Good 80.0% | NI 10.0% | Poor 10.0% (n=10)',
      'INP: Good 100.0% | NI 0.0% | Poor 0.0% (n=10)',
      'CLS: no data',
      '*Desktop*',
      'LCP: Good 66.7% | NI 33.3% | Poor 0.0% (n=3)',
      'INP: no data',
      'CLS: no data',
      '*Poor pages*',
      '• <https://www.example.com/a|https://www.example.com/a>: mobile LCP',
      '…and 1 more',
    ].join('\n')
  );
});

test('formatSummary links Poor pages by title and escapes Slack markup', () => {
  const message = formatSummary({
    originUrl: 'https://www.example.com',
    aggregates: AGGREGATES,
    observedPages: 1,
    targetedPages: 1,
    poorPages: [
      { page: 'https://www.example.com/a', hits: ['mobile LCP', 'desktop LCP'], title: 'Tips & <Tricks> | Blog' },
      { page: 'https://www.example.com/b', hits: ['mobile INP'] },
    ],
    maxPoorPages: 5,
    lookbackWeeks: 4,
  });
  assert.deepEqual(message.split('\n').slice(-2), [
    '• <https://www.example.com/a|Tips &amp; &lt;Tricks&gt; ｜ Blog>: mobile LCP, desktop LCP',
    '• <https://www.example.com/b|https://www.example.com/b>: mobile INP',
  ]);
});

test('formatSummary reports missing data', () => {
  const message = formatSummary({
    originUrl: 'https://www.example.com',
    aggregates: [],
    observedPages: 0,
    targetedPages: 1,
    poorPages: [],
    maxPoorPages: 10,
    lookbackWeeks: 4,
  });
  assert.equal(message, '*Core Web Vitals report* (`https://www.example.com`)\nNo field data available for the last 4 weeks.');
});

test('formatMetricLine never divides by zero', () => {
  assert.equal(
    formatMetricLine({ weekStart: WEEK, metric: 'CLS', device: 'mobile', good: 0, ni: 0, poor: 0, total: 0 }),
    'CLS: no data'
  );
});

test('SlackNotifier posts text to the webhook', async () => {
  const originalFetch = global.fetch;
  const calls: { url: string; init: RequestInit }[] = [];
  global.fetch = (async (input: RequestInfo | URL, init?: RequestInit) => {
    calls.push({ url: String(input), init: init ?? {} });
    return new Response('ok', { status: 200 });
  }) as typeof global.fetch;

  try {
    await new SlackNotifier({ webhookUrl: 'http://hooks.test/services/T0/B0/test' }).send('hello', CHART);
    assert.equal(calls.length, 1);
    assert.equal(calls[0].url, 'http://hooks.test/services/T0/B0/test');
    assert.deepEqual(JSON.parse(String(calls[0].init.body)), { text: 'hello' });
  } finally {
    global.fetch = originalFetch;
  }
});

test('SlackNotifier uploads the chart with the message when a bot token is set', async () => {
  const originalFetch = global.fetch;
  const calls: { url: string; init: RequestInit }[] = [];
  global.fetch = (async (input: RequestInfo | URL, init?: RequestInit) => {
    const url = String(input);
    calls.push({ url, init: init ?? {} });
    if (url.endsWith('/files.getUploadURLExternal')) {
      return new Response(JSON.stringify({ ok: true, upload_url: 'http://files.test/upload/F123', file_id: 'F123' }), { status: 200 });
    }
    if (url === 'http://files.test/upload/F123') {
      return new Response('OK - 11', { status: 200 });
    }
    return new Response(JSON.stringify({ ok: true }), { status: 200 });
  }) as typeof global.fetch;

  try {
    const notifier = new SlackNotifier({ botToken: 'test-token', channelId: 'C123', apiBase: 'http://slack.test/api' });
    await notifier.send('hello', CHART);
    assert.deepEqual(
      calls.map((call) => call.url),
      ['http://slack.test/api/files.getUploadURLExternal', 'http://files.test/upload/F123', 'http://slack.test/api/files.completeUploadExternal']
    );
    assert.equal(String(calls[0].init.body), 'filename=cwv-trend.svg&length=11');
    assert.equal(calls[1].init.body, '<svg></svg>');
    assert.deepEqual(JSON.parse(String(calls[2].init.body)), {
      files: [{ id: 'F123', title: 'cwv-trend.svg' }],
      channel_id: 'C123',
      initial_comment: 'hello',
    });
  } finally {
    global.fetch = originalFetch;
  }
});

test('SlackNotifier posts a plain message without a chart and surfaces API errors', async () => {
  const originalFetch = global.fetch;
  const calls: string[] = [];
  global.fetch = (async (input: RequestInfo | URL) => {
    calls.push(String(input));
    return new Response(JSON.stringify({ ok: false, error: 'channel_not_found' }), { status: 200 });
  }) as typeof global.fetch;

  try {
    const notifier = new SlackNotifier({ botToken: 'test-token', channelId: 'C404', apiBase: 'http://slack.test/api' });
    await assert.rejects(
      notifier.send('hello'),
      (error: unknown) => error instanceof TransientIOError && error.message === 'Slack chat.postMessage failed: channel_not_found'
    );
    assert.deepEqual(calls, ['http://slack.test/api/chat.postMessage']);
  } finally {
    global.fetch = originalFetch;
  }
});
