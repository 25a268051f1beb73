import { FeedParseError, TransportError, type FeedParseErrorKind } from '../../shared/errors.js';
import type { FeedTransport } from '../transport.js';

/**
 * Kind of the FeedParseError `fn` throws, or undefined when it returns.
 */
export function parseErrorKind(fn: () => unknown): FeedParseErrorKind | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof FeedParseError) return err.kind;
    throw err;
  }
  return undefined;
}

export function rss(channelBody: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
${channelBody}
  </channel>
</rss>`;
}

export function atom(feedBody: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
${feedBody}
</feed>`;
}

export interface ItemFixture {
  title: string;
  link?: string;
  pubDate?: string;
}

/**
 * Minimal RSS document titled "Feed" with one item per fixture.
 */
export function rssDocument(items: readonly ItemFixture[], lastBuildDate?: string): string {
  const body = items
    .map((item) => {
      const link = item.link ? `<link>${item.link}</link>` : '';
      const pubDate = item.pubDate ? `<pubDate>${item.pubDate}</pubDate>` : '';
      return `    <item><title>${item.title}</title>${link}${pubDate}</item>`;
    })
    .join('\n');
  const buildDate = lastBuildDate ? `<lastBuildDate>${lastBuildDate}</lastBuildDate>` : '';
  return rss(`<title>Feed</title><link>https://feed.example</link>${buildDate}\n${body}`);
}

/**
 * In-process transport serving fixed documents by URL. Unknown URLs fail the
 * way an unreachable host does.
 */
export class FakeTransport implements FeedTransport {
  readonly requests: string[] = [];
  private readonly documents = new Map<string, string>();

  serve(url: string, body: string): this {
    this.documents.set(url, body);
    return this;
  }

  drop(url: string): this {
    this.documents.delete(url);
    return this;
  }

  async fetch(url: string): Promise<string> {
    this.requests.push(url);
    const body = this.documents.get(url);
    if (body === undefined) {
      throw new TransportError(`Feed fetch failed: connection refused for ${url}`, { url });
    }
    return body;
  }
}
