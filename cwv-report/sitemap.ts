import * as cheerio from 'cheerio';
import type { CruxTarget } from './crux.js';
import { messageOf, TransientIOError } from './errors.js';
import type { RunLogger } from './logger.js';

const ASSET_EXTENSIONS = [
  '.jpg', '.jpeg', '.png', '.gif', '.svg', '.webp',
  '.pdf', '.zip', '.gz', '.css', '.js', '.json', '.xml', '.mp4', '.mp3',
];

/** Tried on the origin, in order, when no sitemap is configured. */
export const WELL_KNOWN_SITEMAPS = ['/sitemap.xml', '/sitemap_index.xml', '/wp-sitemap.xml'];

export type SitemapKind = 'urlset' | 'sitemapindex';

// `sm:loc` and `loc` are the same element once the prefix is dropped
function localName(name: string): string {
  return name.slice(name.indexOf(':') + 1);
}

export function extractLocs(xml: string): string[] {
  const $ = cheerio.load(xml, { xml: true });
  return $('*')
    .filter((_, element) => localName(element.name) === 'loc')
    .map((_, element) => $(element).text().trim())
    .get()
    .filter((loc) => loc.length > 0);
}

export function sitemapKind(xml: string): SitemapKind | null {
  const root = cheerio.load(xml, { xml: true }).root().children().get(0);
  if (!root) {
    return null;
  }
  const name = localName(root.name);
  return name === 'urlset' || name === 'sitemapindex' ? name : null;
}

/**
 * Normalizes a URL to https without query or fragment, dropping the trailing
 * slash on anything but the root. URLs on another host yield null.
 */
export function normalizePageUrl(raw: string, originUrl: string): string | null {
  let url: URL;
  let origin: URL;
  try {
    url = new URL(raw, originUrl);
    origin = new URL(originUrl);
  } catch {
    return null;
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return null;
  }
  const host = (value: string) => value.replace(/^www\./, '');
  if (host(url.hostname) !== host(origin.hostname)) {
    return null;
  }

  url.protocol = 'https:';
  url.hostname = origin.hostname;
  url.hash = '';
  url.search = '';
  let normalized = url.toString();
  if (url.pathname !== '/' && normalized.endsWith('/')) {
    normalized = normalized.slice(0, -1);
  }
  if (ASSET_EXTENSIONS.some((extension) => url.pathname.toLowerCase().endsWith(extension))) {
    return null;
  }
  return normalized;
}

async function fetchText(url: string): Promise<string> {
  let response: Response;
  try {
    response = await fetch(url);
  } catch (error) {
    throw new TransientIOError(`Sitemap request failed for ${url}: ${messageOf(error)}`, null, { cause: error });
  }
  if (!response.ok) {
    throw new TransientIOError(`Sitemap ${url} returned ${response.status}`, response.status);
  }
  return response.text();
}

type SitemapLogger = Pick<RunLogger, 'info' | 'warn'>;

function collectPages(locs: readonly string[], originUrl: string, maxPages: number): string[] {
  const pages = new Set<string>();
  for (const loc of locs) {
    const normalized = normalizePageUrl(loc, originUrl);
    if (normalized) {
      pages.add(normalized);
    }
  }
  return Array.from(pages).sort().slice(0, maxPages);
}

async function pagesFromDocument(
  xml: string,
  originUrl: string,
  maxPages: number,
  logger: SitemapLogger
): Promise<string[]> {
  if (sitemapKind(xml) !== 'sitemapindex') {
    return collectPages(extractLocs(xml), originUrl, maxPages);
  }

  const locs: string[] = [];
  for (const child of extractLocs(xml)) {
    try {
      locs.push(...extractLocs(await fetchText(child)));
    } catch (error) {
      if (!(error instanceof TransientIOError)) {
        throw error;
      }
      logger.warn(`Skipping child sitemap: ${error.message}`);
    }
  }
  return collectPages(locs, originUrl, maxPages);
}

/**
 * Page URLs listed in a sitemap, following a sitemap index one level down.
 * A child sitemap that cannot be fetched is skipped; the index itself must load.
 */
export async function discoverPages(
  sitemapUrl: string,
  originUrl: string,
  maxPages: number,
  logger: SitemapLogger
): Promise<string[]> {
  return pagesFromDocument(await fetchText(sitemapUrl), originUrl, maxPages, logger);
}

/** First well-known sitemap on the origin that answers with a sitemap document. */
export async function findSitemap(
  originUrl: string,
  logger: SitemapLogger
): Promise<{ url: string; xml: string } | null> {
  for (const candidate of WELL_KNOWN_SITEMAPS) {
    const url = new URL(candidate, originUrl).toString();
    let xml: string;
    try {
      xml = await fetchText(url);
    } catch (error) {
      if (!(error instanceof TransientIOError)) {
        throw error;
      }
      logger.info(`No sitemap at ${url}: ${error.message}`);
      continue;
    }
    if (sitemapKind(xml) !== null) {
      return { url, xml };
    }
    logger.info(`${url} is not a sitemap`);
  }
  return null;
}

export interface TargetOptions {
  originUrl: string;
  targetPages: readonly string[];
  sitemapUrl: string | null;
  discoverSitemap: boolean;
  maxPages: number;
  logger: SitemapLogger;
}

function toTargets(pages: readonly string[]): CruxTarget[] {
  return pages.map((url): CruxTarget => ({ kind: 'page', url }));
}

/**
 * Explicit pages win, then the configured sitemap, then a well-known sitemap
 * on the origin, then the origin on its own.
 */
export async function resolveTargets(options: TargetOptions): Promise<CruxTarget[]> {
  const { originUrl, maxPages, logger } = options;
  if (options.targetPages.length > 0) {
    return toTargets(options.targetPages);
  }

  let pages: string[] = [];
  if (options.sitemapUrl) {
    pages = await discoverPages(options.sitemapUrl, originUrl, maxPages, logger);
  } else if (options.discoverSitemap) {
    const found = await findSitemap(originUrl, logger);
    if (found) {
      logger.info(`Using sitemap ${found.url}`);
      pages = await pagesFromDocument(found.xml, originUrl, maxPages, logger);
    }
  }

  if (pages.length > 0) {
    return toTargets(pages);
  }
  return [{ kind: 'origin', url: originUrl }];
}
