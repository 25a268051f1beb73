import { TransportError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

/**
 * Fetches raw feed documents.
 */
export interface FeedTransport {
  fetch(url: string): Promise<string>;
}

export interface ResolvedFeed {
  /** The candidate URL that answered; becomes the channel's stored link. */
  url: string;
  body: string;
}

export class HttpTransport implements FeedTransport {
  constructor(
    private readonly timeoutMs: number = 15000,
    private readonly userAgent: string = 'feedmark/0.1',
  ) {}

  async fetch(url: string): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(url, {
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*',
        },
        signal: controller.signal,
        redirect: 'follow',
      });

      if (!response.ok) {
        throw new TransportError(`Feed fetch failed: ${response.status} from ${url}`, {
          url,
          status: response.status,
        });
      }

      const body = await response.text();
      logger.debug({ url, bytes: body.length }, 'Feed fetched');
      return body;
    } catch (err) {
      if (err instanceof TransportError) throw err;
      if (err instanceof Error && err.name === 'AbortError') {
        throw new TransportError(`Feed fetch timed out after ${this.timeoutMs}ms: ${url}`, {
          url,
          timeout: this.timeoutMs,
        });
      }
      throw new TransportError(`Feed fetch failed: ${errorMessage(err)}`, { url });
    } finally {
      clearTimeout(timer);
    }
  }
}

const EXPLICIT_SCHEME = /^https?:\/\//i;

function isHttpUrl(candidate: string): boolean {
  try {
    const { protocol } = new URL(candidate);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * URLs to try for user input, in order. Input with an http(s) scheme is taken
 * as given; a bare host or path is tried over https, then http.
 */
export function candidateUrls(input: string): string[] {
  const trimmed = input.trim();
  if (EXPLICIT_SCHEME.test(trimmed)) {
    return [trimmed];
  }
  return [`https://${trimmed}`, `http://${trimmed}`].filter(isHttpUrl);
}

/**
 * Fetch the first candidate URL for `input` that answers.
 */
export async function resolveFeed(transport: FeedTransport, input: string): Promise<ResolvedFeed> {
  const candidates = candidateUrls(input);
  const attempts: Array<{ url: string; error: string }> = [];

  for (const url of candidates) {
    try {
      const body = await transport.fetch(url);
      return { url, body };
    } catch (err) {
      attempts.push({ url, error: errorMessage(err) });
      logger.debug({ url, error: errorMessage(err) }, 'Candidate URL failed');
    }
  }

  throw new TransportError(
    candidates.length === 0 ? `Not a usable feed URL: ${input}` : `Could not fetch a feed from ${input}`,
    { input, attempts },
  );
}
