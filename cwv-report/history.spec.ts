import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test } from 'node:test';
import { aggregate } from './aggregate.js';
import { InputError, PersistenceError } from './errors.js';
import { HistoryStore, LocalHistoryFile, MemoryHistoryFile, decodeHistory, encodeHistory, mergeHistory } from './history.js';
import type { HistoryRow, MetricSample } from './types.js';

const ROW: HistoryRow = { weekStart: '2024-01-01', metric: 'LCP', device: 'mobile', good: 8, ni: 1, poor: 1, total: 10 };

test('merge into empty history inserts the row', () => {
  const result = mergeHistory([], [ROW]);
  assert.deepEqual(result.rows, [ROW]);
  assert.equal(result.changed, true);
});

test('merge of an identical row reports no change', () => {
  const result = mergeHistory([ROW], [{ ...ROW }]);
  assert.deepEqual(result.rows, [ROW]);
  assert.equal(result.changed, false);
});

test('merge replaces a row whose counts changed', () => {
  const updated = { ...ROW, good: 9, ni: 0 };
  const result = mergeHistory([ROW], [updated]);
  assert.deepEqual(result.rows, [updated]);
  assert.equal(result.changed, true);
});

test('merge keeps existing keys that are not incoming and sorts the output', () => {
  const older: HistoryRow = { weekStart: '2023-12-25', metric: 'CLS', device: 'desktop', good: 1, ni: 0, poor: 0, total: 1 };
  const incoming: HistoryRow = { weekStart: '2024-01-01', metric: 'LCP', device: 'desktop', good: 0, ni: 2, poor: 0, total: 2 };
  const result = mergeHistory([ROW, older], [incoming]);
  assert.deepEqual(result.rows, [older, ROW, incoming]);
  assert.equal(result.changed, true);
});

test('merge is idempotent for the same aggregates', () => {
  const samples: MetricSample[] = [
    { metric: 'LCP', device: 'mobile', weekStart: '2024-01-07', p75: 2400, page: 'https://www.example.com/a' },
    { metric: 'INP', device: 'desktop', weekStart: '2024-01-07', p75: 300, page: 'https://www.example.com/a' },
  ];
  const aggregates = aggregate(samples, ['2024-01-07']);
  const once = mergeHistory([ROW], aggregates);
  const twice = mergeHistory(once.rows, aggregates);
  assert.deepEqual(twice.rows, once.rows);
  assert.equal(twice.changed, false);
});

test('merge collapses duplicate stored keys and reports the change', () => {
  const result = mergeHistory([ROW, { ...ROW, good: 7, ni: 2 }], []);
  assert.deepEqual(result.rows, [{ ...ROW, good: 7, ni: 2 }]);
  assert.equal(result.changed, true);
});

test('merge rewrites stored rows that are out of order', () => {
  const later: HistoryRow = { ...ROW, weekStart: '2024-01-08' };
  const result = mergeHistory([later, ROW], []);
  assert.deepEqual(result.rows, [ROW, later]);
  assert.equal(result.changed, true);
  assert.equal(mergeHistory([ROW, later], []).changed, false);
});

test('merge rejects incoming rows whose counts do not add up', () => {
  assert.throws(() => mergeHistory([], [{ ...ROW, total: 11 }]), InputError);
});

test('encodeHistory writes the header and one sorted row per key', () => {
  const second: HistoryRow = { weekStart: '2024-01-08', metric: 'INP', device: 'desktop', good: 2, ni: 0, poor: 0, total: 2 };
  const lines = encodeHistory([second, ROW]).trimEnd().split('\n');
  assert.equal(lines.length, 3);
  assert.equal(lines[1], '"2024-01-01","LCP","mobile",8,1,1,10');
  assert.equal(lines[2], '"2024-01-08","INP","desktop",2,0,0,2');
  assert.deepEqual(decodeHistory(lines.join('\n')), [ROW, second]);
});

test('decodeHistory reads unquoted csv and rejects broken rows', () => {
  const header = 'week_start,metric,device,good_count,ni_count,poor_count,total_count';
  assert.deepEqual(decodeHistory(`${header}\n2024-01-01,LCP,mobile,8,1,1,10\n`), [ROW]);
  assert.deepEqual(decodeHistory(''), []);
  assert.throws(() => decodeHistory(`${header}\n2024-01-01,FID,mobile,8,1,1,10\n`), InputError);
  assert.throws(() => decodeHistory(`${header}\n2024-01-01,LCP,mobile,8,1,1,9\n`), InputError);
  assert.throws(() => decodeHistory(`${header}\n01/01/2024,LCP,mobile,8,1,1,10\n`), InputError);
  assert.throws(() => decodeHistory(`${header}\n2024-01-01,LCP,mobile,,,,\n`), InputError);
  assert.throws(() => decodeHistory(`${header}\n2024-01-01,LCP,mobile,8,1.5,0.5,10\n`), InputError);
  assert.throws(() => decodeHistory(`${header}\n2024-01-01,LCP,mobile,0,0,0,0\n`), InputError);
});

test('HistoryStore writes only when the merge changed something', async () => {
  const file = new MemoryHistoryFile();
  const store = new HistoryStore(file);

  const first = await store.upsert([ROW]);
  assert.equal(first.changed, true);
  assert.equal(file.writes, 1);
  assert.deepEqual(await store.load(), [ROW]);

  const second = await store.upsert([ROW]);
  assert.equal(second.changed, false);
  assert.equal(file.writes, 1);
});

test('HistoryStore dry run leaves the file alone', async () => {
  const file = new MemoryHistoryFile();
  const result = await new HistoryStore(file).upsert([ROW], true);
  assert.equal(result.changed, true);
  assert.equal(file.writes, 0);
  assert.equal(await file.read(), null);
});

test('LocalHistoryFile treats a missing file as empty and replaces it on write', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cwv-history-'));
  try {
    const target = path.join(dir, 'data', 'cwv_history.csv');
    const store = new HistoryStore(new LocalHistoryFile(target));
    assert.deepEqual(await store.load(), []);

    await store.upsert([ROW]);
    assert.deepEqual(decodeHistory(await fs.readFile(target, 'utf-8')), [ROW]);
    assert.deepEqual(await fs.readdir(path.dirname(target)), ['cwv_history.csv']);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

test('LocalHistoryFile raises PersistenceError and keeps the old file when the write fails', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cwv-history-'));
  try {
    // a directory where the file should be makes the rename fail
    const target = path.join(dir, 'cwv_history.csv');
    await fs.mkdir(target);
    await assert.rejects(new LocalHistoryFile(target).write('x'), PersistenceError);
    assert.deepEqual(await fs.readdir(dir), ['cwv_history.csv']);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

test('LocalHistoryFile still raises PersistenceError when the temporary file cannot be removed', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cwv-history-'));
  try {
    const target = path.join(dir, 'cwv_history.csv');
    // a non-empty directory at the temporary path fails both the write and its removal
    const tempPath = `${target}.${process.pid}.tmp`;
    await fs.mkdir(tempPath);
    await fs.writeFile(path.join(tempPath, 'keep'), 'x');

    await assert.rejects(
      new LocalHistoryFile(target).write('x'),
      (error: unknown) =>
        error instanceof PersistenceError &&
        error.message.startsWith(`Unable to write ${target}: `) &&
        error.message.includes(`(temporary file ${tempPath} left behind: `)
    );
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});
