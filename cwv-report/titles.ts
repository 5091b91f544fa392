import * as cheerio from 'cheerio';
import { messageOf, TransientIOError } from './errors.js';
import type { RunLogger } from './logger.js';

const TITLE_TIMEOUT_MS = 5000;

/** The page's `<title>`, or null when it is not an HTML page or has none. */
export async function fetchPageTitle(url: string): Promise<string | null> {
  let response: Response;
  try {
    response = await fetch(url, { signal: AbortSignal.timeout(TITLE_TIMEOUT_MS) });
  } catch (error) {
    throw new TransientIOError(`Page request failed for ${url}: ${messageOf(error)}`, null, { cause: error });
  }
  if (!response.ok) {
    throw new TransientIOError(`Page ${url} returned ${response.status}`, response.status);
  }
  if (!(response.headers.get('content-type') ?? '').includes('text/html')) {
    return null;
  }

  const $ = cheerio.load(await response.text());
  const title = $('title').first().text().replace(/\s+/g, ' ').trim();
  return title || null;
}

/** Titles keyed by URL; pages whose title cannot be read are left out. */
export async function fetchPageTitles(
  urls: readonly string[],
  logger: Pick<RunLogger, 'warn'>
): Promise<Map<string, string>> {
  const titles = new Map<string, string>();
  for (const url of urls) {
    try {
      const title = await fetchPageTitle(url);
      if (title) {
        titles.set(url, title);
      }
    } catch (error) {
      if (!(error instanceof TransientIOError)) {
        throw error;
      }
      logger.warn(`No title for ${url}: ${error.message}`);
    }
  }
  return titles;
}
