import type { Channel, Entry } from './model.js';
import type { IdentityScheme } from './identity.js';
import { deriveIdentity } from './identity.js';
import { parseRfc2822 } from './dates.js';
import { type XmlElement, childNamed, childText, childrenNamed } from './xml.js';
import { FeedParseError } from '../shared/errors.js';

// RSS elements carry no namespace; anything prefixed belongs to an extension.
const RSS_NS = null;

function rssItemToEntry(item: XmlElement, scheme: IdentityScheme): Entry | null {
  const primaryText = childText(item, 'title', RSS_NS) ?? childText(item, 'description', RSS_NS);
  if (primaryText === null) return null;

  const link = childText(item, 'link', RSS_NS);
  return {
    primaryText,
    identity: deriveIdentity(primaryText, link, scheme),
    link,
    publishedAt: parseRfc2822(childText(item, 'pubDate', RSS_NS)),
    read: false,
  };
}

/**
 * Convert an `<rss>` document into a channel. Items with neither a title nor a
 * description are skipped.
 */
export function rssToChannel(root: XmlElement, scheme: IdentityScheme): Channel {
  const channel = childNamed(root, 'channel', RSS_NS);
  if (!channel) {
    throw new FeedParseError('MissingTitle', 'RSS document has no <channel> element');
  }

  const title = childText(channel, 'title', RSS_NS);
  if (title === null) {
    throw new FeedParseError('MissingTitle', 'RSS channel has no <title>');
  }
  const link = childText(channel, 'link', RSS_NS);
  if (link === null) {
    throw new FeedParseError('MissingLink', 'RSS channel has no <link>', { title });
  }

  const entries: Entry[] = [];
  for (const item of childrenNamed(channel, 'item', RSS_NS)) {
    const entry = rssItemToEntry(item, scheme);
    if (entry) entries.push(entry);
  }

  return {
    title,
    link,
    description: childText(channel, 'description', RSS_NS) ?? '',
    lastBuildDate: parseRfc2822(childText(channel, 'lastBuildDate', RSS_NS)),
    entries,
  };
}
