/**
 * RSS/Atom Discovery Source
 *
 * Reads the configured RSS 2.0 and Atom feeds and turns entries that mention
 * the requested topic into discoveries:
 * - Timeout and size limits per feed
 * - Markup stripped from titles and summaries
 * - External entities are never expanded (fast-xml-parser default)
 */

import { XMLParser } from 'fast-xml-parser';
import type { Logger } from '../../types/logger.js';
import type { Discovery } from '../../types/discovery.js';
import type { IDiscoverySource } from '../../ports/discovery-source.js';
import { queryCoverage, truncate } from '../../utils/text.js';

export interface FeedDefinition {
  id: string;
  name: string;
  url: string;
}

export interface RssSourceConfig {
  timeoutMs: number;
  maxBytes: number;
}

const DEFAULT_CONFIG: RssSourceConfig = {
  timeoutMs: 30_000,
  maxBytes: 5 * 1024 * 1024,
};

/**
 * One parsed feed entry, before topic matching.
 */
export interface FeedEntry {
  id: string;
  title: string;
  summary: string;
  link: string;
  publishedAt: Date | null;
}

type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asList(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

/**
 * Decode common entities, then drop tags and collapse whitespace.
 */
export function stripHtml(html: string): string {
  if (!html) return '';

  const text = html
    .replace(/&nbsp;/gi, ' ')
    .replace(/&amp;/gi, '&')
    .replace(/&lt;/gi, '<')
    .replace(/&gt;/gi, '>')
    .replace(/&quot;/gi, '"')
    .replace(/&#39;/gi, "'")
    .replace(/&#x27;/gi, "'")
    .replace(/&#(\d+);/gi, (_, code: string) => String.fromCharCode(parseInt(code, 10)));

  return text
    .replace(/<[^>]*>/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Stable id for entries that carry neither guid nor link.
 */
export function hashContent(content: string): string {
  let hash = 0;
  for (let i = 0; i < content.length; i++) {
    hash = ((hash << 5) - hash + content.charCodeAt(i)) | 0;
  }
  return `hash_${Math.abs(hash).toString(36)}`;
}

function parseDate(value: string): Date | null {
  if (!value) return null;
  const parsed = new Date(value);
  return isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * Text of an XML node: plain values, `#text` nodes and CDATA wrappers.
 */
function extractText(node: unknown): string {
  if (typeof node === 'string') return node;
  if (typeof node === 'number') return String(node);
  if (!isRecord(node)) return '';

  for (const key of ['#text', '_']) {
    const value = node[key];
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
  }

  for (const value of Object.values(node)) {
    if (typeof value === 'string') return value;
  }
  return '';
}

function atomLink(node: unknown): string {
  for (const link of asList(node)) {
    if (!isRecord(link)) {
      const text = extractText(link);
      if (text) return text;
      continue;
    }
    const rel = link['@_rel'];
    if (rel === undefined || rel === 'alternate') {
      return extractText(link['@_href'] ?? link['href']);
    }
  }
  return '';
}

function toEntry(
  title: string,
  summary: string,
  link: string,
  id: string,
  published: string
): FeedEntry | null {
  if (!title) return null;
  return {
    id: id || link || hashContent(title + summary),
    title: truncate(title, 200),
    summary: truncate(summary, 500),
    link,
    publishedAt: parseDate(published),
  };
}

function parseRss2(data: Record<string, unknown>): FeedEntry[] {
  const rss = data['rss'];
  const channel = isRecord(rss) ? rss['channel'] : data['channel'];
  if (!isRecord(channel)) return [];

  const entries: FeedEntry[] = [];
  for (const item of asList(channel['item'])) {
    if (!isRecord(item)) continue;
    const entry = toEntry(
      stripHtml(extractText(item['title'])),
      stripHtml(extractText(item['description'] ?? item['content:encoded'])),
      extractText(item['link']),
      extractText(item['guid']),
      extractText(item['pubDate'] ?? item['dc:date'])
    );
    if (entry) entries.push(entry);
  }
  return entries;
}

function parseAtom(data: Record<string, unknown>): FeedEntry[] {
  const feed = data['feed'];
  if (!isRecord(feed)) return [];

  const entries: FeedEntry[] = [];
  for (const item of asList(feed['entry'])) {
    if (!isRecord(item)) continue;
    const entry = toEntry(
      stripHtml(extractText(item['title'])),
      stripHtml(extractText(item['summary'] ?? item['content'])),
      atomLink(item['link']),
      extractText(item['id']),
      extractText(item['published'] ?? item['updated'])
    );
    if (entry) entries.push(entry);
  }
  return entries;
}

/**
 * Parse an RSS 2.0 or Atom document, newest entries first.
 * Throws on malformed XML or an unknown feed format.
 */
export function parseFeed(xml: string): FeedEntry[] {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    textNodeName: '#text',
  });

  const data: unknown = parser.parse(xml);
  if (!isRecord(data)) {
    throw new Error('Unknown feed format: not RSS 2.0 or Atom');
  }

  let entries: FeedEntry[];
  if ('rss' in data || ('channel' in data && !('feed' in data))) {
    entries = parseRss2(data);
  } else if ('feed' in data) {
    entries = parseAtom(data);
  } else {
    throw new Error('Unknown feed format: not RSS 2.0 or Atom');
  }

  return entries.sort((a, b) => {
    if (!a.publishedAt && !b.publishedAt) return 0;
    if (!a.publishedAt) return 1;
    if (!b.publishedAt) return -1;
    return b.publishedAt.getTime() - a.publishedAt.getTime();
  });
}

/**
 * Importance of an entry for a topic: how much of the topic it covers,
 * lifted so any match counts for something.
 */
export function topicImportance(topic: string, entry: FeedEntry): number {
  const coverage = queryCoverage(topic, `${entry.title} ${entry.summary}`);
  if (coverage === 0) return 0;
  return Math.min(1, 0.3 + 0.7 * coverage);
}

/**
 * Discovery source backed by a fixed list of feeds.
 */
export class RssDiscoverySource implements IDiscoverySource {
  readonly name = 'rss';

  private readonly feeds: readonly FeedDefinition[];
  private readonly logger: Logger;
  private readonly fetchFn: FetchFn;
  private readonly config: RssSourceConfig;

  constructor(
    feeds: readonly FeedDefinition[],
    logger: Logger,
    fetchFn: FetchFn = fetch,
    config: Partial<RssSourceConfig> = {}
  ) {
    this.feeds = feeds;
    this.logger = logger.child({ component: 'rss-source' });
    this.fetchFn = fetchFn;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Entries from every feed that mention the topic, most relevant first.
   * A feed that fails is logged and skipped.
   */
  async search(topic: string, limit: number): Promise<Discovery[]> {
    if (this.feeds.length === 0 || limit <= 0) return [];

    const results = await Promise.all(
      this.feeds.map(async (feed) => {
        try {
          const entries = parseFeed(await this.fetchFeed(feed.url));
          return entries.map((entry) => ({ feed, entry }));
        } catch (error) {
          this.logger.warn(
            { feed: feed.id, error: error instanceof Error ? error.message : String(error) },
            'Feed fetch failed'
          );
          return [];
        }
      })
    );

    const now = new Date();
    const discoveries: Discovery[] = [];
    for (const { feed, entry } of results.flat()) {
      const importance = topicImportance(topic, entry);
      if (importance === 0) continue;
      discoveries.push({
        id: `${feed.id}:${entry.id}`,
        topic,
        content: entry.summary ? `${entry.title}. ${entry.summary}` : entry.title,
        source: entry.link || feed.name,
        importance,
        discoveredAt: now,
      });
    }

    discoveries.sort((a, b) => b.importance - a.importance);
    this.logger.debug({ topic, matched: discoveries.length }, 'Feeds searched');
    return discoveries.slice(0, limit);
  }

  private async fetchFeed(url: string): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.config.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        signal: controller.signal,
        headers: {
          Accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*',
        },
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error(`Request timeout after ${String(this.config.timeoutMs)}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      throw new Error(`HTTP ${String(response.status)}: ${response.statusText}`);
    }

    const contentLength = response.headers.get('content-length');
    if (contentLength && parseInt(contentLength, 10) > this.config.maxBytes) {
      throw new Error(`Feed too large: ${contentLength} bytes`);
    }

    const body = await response.text();
    if (Buffer.byteLength(body) > this.config.maxBytes) {
      throw new Error(`Feed too large: exceeded ${String(this.config.maxBytes)} bytes`);
    }
    return body;
  }
}
