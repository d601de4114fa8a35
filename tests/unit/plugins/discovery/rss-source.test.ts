/**
 * RSS discovery source tests: feed parsing, topic matching, fetch failures.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  RssDiscoverySource,
  parseFeed,
  stripHtml,
  hashContent,
  topicImportance,
  type FeedEntry,
} from '../../../../src/plugins/discovery/rss-source.js';
import { createMockLogger } from '../../../helpers/factories.js';

const SCIENCE_RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Science Weekly</title>
    <item>
      <title>Rivers &amp; lakes</title>
      <description>&lt;p&gt;How rivers shape valleys&lt;/p&gt;</description>
      <link>https://example.com/rivers</link>
      <guid>r-1</guid>
      <pubDate>Tue, 05 Mar 2024 10:00:00 GMT</pubDate>
    </item>
    <item>
      <title>Cooking pasta</title>
      <description>Boil water first.</description>
      <link>https://example.com/pasta</link>
      <pubDate>Wed, 06 Mar 2024 10:00:00 GMT</pubDate>
    </item>
  </channel>
</rss>`;

const LAKES_ATOM = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Lake Notes</title>
  <entry>
    <title>Lakes in winter</title>
    <link rel="alternate" href="https://example.com/lakes"/>
    <id>tag:example.com,2024:lakes</id>
    <updated>2024-03-01T00:00:00Z</updated>
    <summary>Still water freezes from the top.</summary>
  </entry>
</feed>`;

function entry(title: string, summary: string): FeedEntry {
  return { id: 'e', title, summary, link: '', publishedAt: null };
}

describe('parseFeed', () => {
  it('reads RSS 2.0 items, newest first', () => {
    const entries = parseFeed(SCIENCE_RSS);

    expect(entries.map((e) => e.id)).toEqual(['https://example.com/pasta', 'r-1']);
    expect(entries[1]).toEqual({
      id: 'r-1',
      title: 'Rivers & lakes',
      summary: 'How rivers shape valleys',
      link: 'https://example.com/rivers',
      publishedAt: new Date('2024-03-05T10:00:00Z'),
    });
  });

  it('reads Atom entries with their alternate link', () => {
    expect(parseFeed(LAKES_ATOM)).toEqual([
      {
        id: 'tag:example.com,2024:lakes',
        title: 'Lakes in winter',
        summary: 'Still water freezes from the top.',
        link: 'https://example.com/lakes',
        publishedAt: new Date('2024-03-01T00:00:00Z'),
      },
    ]);
  });

  it('rejects documents that are not feeds', () => {
    expect(() => parseFeed('<html><body>hi</body></html>')).toThrow(
      'Unknown feed format: not RSS 2.0 or Atom'
    );
  });
});

describe('stripHtml', () => {
  it('decodes entities and drops tags', () => {
    expect(stripHtml('<b>Fish&nbsp;&amp;&#32;chips</b>\n<i>today</i>')).toBe(
      'Fish & chips today'
    );
  });
});

describe('hashContent', () => {
  it('is stable for the same content', () => {
    expect(hashContent('same')).toBe(hashContent('same'));
    expect(hashContent('same')).not.toBe(hashContent('other'));
    expect(hashContent('same')).toMatch(/^hash_[0-9a-z]+$/);
  });
});

describe('topicImportance', () => {
  it('is zero when the entry does not mention the topic', () => {
    expect(topicImportance('rivers', entry('Cooking pasta', 'Boil water.'))).toBe(0);
  });

  it('grows with topic coverage', () => {
    const rivers = entry('Rivers', 'How rivers shape valleys');

    expect(topicImportance('rivers', rivers)).toBe(1);
    expect(topicImportance('rivers deserts', rivers)).toBeCloseTo(0.65);
  });
});

describe('RssDiscoverySource', () => {
  const feeds = [
    { id: 'sci', name: 'Science Weekly', url: 'https://feeds.example/sci' },
    { id: 'down', name: 'Down Feed', url: 'https://feeds.example/down' },
  ];

  function fakeFetch() {
    return vi.fn((url: string) =>
      Promise.resolve(
        url.endsWith('/down')
          ? new Response('unavailable', { status: 503, statusText: 'Service Unavailable' })
          : new Response(SCIENCE_RSS, { status: 200 })
      )
    );
  }

  it('turns matching entries into discoveries and skips failing feeds', async () => {
    const logger = createMockLogger();
    const source = new RssDiscoverySource(feeds, logger, fakeFetch());

    const discoveries = await source.search('rivers', 5);

    expect(discoveries).toHaveLength(1);
    expect(discoveries[0]).toMatchObject({
      id: 'sci:r-1',
      topic: 'rivers',
      content: 'Rivers & lakes. How rivers shape valleys',
      source: 'https://example.com/rivers',
      importance: 1,
    });
    expect(logger.messages('warn')).toEqual(['Feed fetch failed']);
  });

  it('does not fetch when the limit is zero', async () => {
    const fetchFn = fakeFetch();
    const source = new RssDiscoverySource(feeds, createMockLogger(), fetchFn);

    expect(await source.search('rivers', 0)).toEqual([]);
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it('skips feeds larger than the size limit', async () => {
    const logger = createMockLogger();
    const source = new RssDiscoverySource(feeds, logger, fakeFetch(), { maxBytes: 10 });

    expect(await source.search('rivers', 5)).toEqual([]);
    expect(logger.messages('warn')).toEqual(['Feed fetch failed', 'Feed fetch failed']);
  });
});
