import fs from 'node:fs/promises';
import path from 'node:path';
import { parse as csvToJson } from 'csv-parse/sync';
import { parse as jsonToCsv } from 'json2csv';
import { z } from 'zod';
import { InputError, messageOf, PersistenceError } from './errors.js';
import { DEVICES, METRICS, compareRows, rowKey, type HistoryRow, type WeeklyAggregate } from './types.js';

export const HISTORY_COLUMNS = [
  'week_start',
  'metric',
  'device',
  'good_count',
  'ni_count',
  'poor_count',
  'total_count',
] as const;

export interface MergeResult {
  rows: HistoryRow[];
  changed: boolean;
}

function sameCounts(a: WeeklyAggregate, b: WeeklyAggregate): boolean {
  return a.good === b.good && a.ni === b.ni && a.poor === b.poor && a.total === b.total;
}

export function assertConsistent(row: WeeklyAggregate): void {
  const counts = [row.good, row.ni, row.poor, row.total];
  if (counts.some((count) => !Number.isInteger(count) || count < 0)) {
    throw new InputError(`Counts for ${rowKey(row)} must be non-negative integers`);
  }
  if (row.good + row.ni + row.poor !== row.total) {
    throw new InputError(
      `Counts for ${rowKey(row)} do not add up: ${row.good}+${row.ni}+${row.poor} != ${row.total}`
    );
  }
}

/**
 * Upserts `incoming` into `existing` by (weekStart, metric, device).
 * The last computed aggregate for a key wins; keys only in `existing` are kept.
 */
export function mergeHistory(existing: readonly HistoryRow[], incoming: readonly WeeklyAggregate[]): MergeResult {
  const index = new Map<string, HistoryRow>();
  for (const row of existing) {
    index.set(rowKey(row), row);
  }
  // duplicate keys collapse to one row and out-of-order rows get rewritten sorted
  let changed =
    index.size !== existing.length || existing.some((row, i) => i > 0 && compareRows(existing[i - 1], row) > 0);

  for (const aggregate of incoming) {
    assertConsistent(aggregate);
    const key = rowKey(aggregate);
    const current = index.get(key);
    if (current && sameCounts(current, aggregate)) {
      continue;
    }
    index.set(key, { ...aggregate });
    changed = true;
  }

  return { rows: Array.from(index.values()).sort(compareRows), changed };
}

const CountSchema = z
  .string()
  .regex(/^\d+$/, 'expected a non-negative integer')
  .transform(Number);

const HistoryCsvRowSchema = z.object({
  week_start: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD'),
  metric: z.enum(METRICS),
  device: z.enum(DEVICES),
  good_count: CountSchema,
  ni_count: CountSchema,
  poor_count: CountSchema,
  total_count: CountSchema.refine((total) => total > 0, 'expected a positive total'),
});

export function decodeHistory(text: string): HistoryRow[] {
  if (!text.trim()) {
    return [];
  }
  let records: unknown;
  try {
    records = csvToJson(text, { columns: true, skip_empty_lines: true, trim: true });
  } catch (error) {
    throw new InputError(`History file is not valid CSV: ${messageOf(error)}`, { cause: error });
  }

  const parsed = z.array(HistoryCsvRowSchema).safeParse(records);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InputError(`Malformed history row at ${issue?.path.join('.') ?? '?'}: ${issue?.message ?? 'invalid'}`);
  }

  return parsed.data.map((record) => {
    const row: HistoryRow = {
      weekStart: record.week_start,
      metric: record.metric,
      device: record.device,
      good: record.good_count,
      ni: record.ni_count,
      poor: record.poor_count,
      total: record.total_count,
    };
    assertConsistent(row);
    return row;
  });
}

export function encodeHistory(rows: readonly HistoryRow[]): string {
  const records = [...rows].sort(compareRows).map((row) => ({
    week_start: row.weekStart,
    metric: row.metric,
    device: row.device,
    good_count: row.good,
    ni_count: row.ni,
    poor_count: row.poor,
    total_count: row.total,
  }));
  return jsonToCsv(records, { fields: [...HISTORY_COLUMNS], eol: '\n' }) + '\n';
}

export interface HistoryFile {
  /** Current contents, or null when nothing has been stored yet. */
  read(): Promise<string | null>;
  /** Replaces the whole contents in one step. */
  write(contents: string): Promise<void>;
  describe(): string;
}

export class LocalHistoryFile implements HistoryFile {
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  async read(): Promise<string | null> {
    try {
      return await fs.readFile(this.filePath, 'utf-8');
    } catch (error: unknown) {
      if ((error as NodeJS.ErrnoException)?.code === 'ENOENT') {
        return null;
      }
      throw new PersistenceError(`Unable to read ${this.filePath}: ${messageOf(error)}`, { cause: error });
    }
  }

  async write(contents: string): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, contents, 'utf-8');
      await fs.rename(tempPath, this.filePath);
    } catch (error: unknown) {
      let leftover = '';
      try {
        await fs.rm(tempPath, { force: true });
      } catch (cleanupError: unknown) {
        leftover = ` (temporary file ${tempPath} left behind: ${messageOf(cleanupError)})`;
      }
      throw new PersistenceError(`Unable to write ${this.filePath}: ${messageOf(error)}${leftover}`, { cause: error });
    }
  }

  describe(): string {
    return this.filePath;
  }
}

export class MemoryHistoryFile implements HistoryFile {
  private store: Map<string, string>;
  private key: string;
  writes = 0;

  constructor(initial: string | null = null, key = 'cwv_history.csv', store = new Map<string, string>()) {
    this.store = store;
    this.key = key;
    if (initial !== null) {
      this.store.set(key, initial);
    }
  }

  async read(): Promise<string | null> {
    return this.store.get(this.key) ?? null;
  }

  async write(contents: string): Promise<void> {
    this.store.set(this.key, contents);
    this.writes++;
  }

  describe(): string {
    return `memory:${this.key}`;
  }
}

export class HistoryStore {
  private file: HistoryFile;

  constructor(file: HistoryFile) {
    this.file = file;
  }

  async load(): Promise<HistoryRow[]> {
    const contents = await this.file.read();
    return contents === null ? [] : decodeHistory(contents);
  }

  /** Read, merge and (when something changed) rewrite the history as one unit. */
  async upsert(incoming: readonly WeeklyAggregate[], dryRun: boolean = false): Promise<MergeResult> {
    const existing = await this.load();
    const result = mergeHistory(existing, incoming);
    if (result.changed && !dryRun) {
      await this.file.write(encodeHistory(result.rows));
    }
    return result;
  }

  describe(): string {
    return this.file.describe();
  }
}
