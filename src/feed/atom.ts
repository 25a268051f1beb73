import type { Channel, Entry } from './model.js';
import type { IdentityScheme } from './identity.js';
import { deriveIdentity } from './identity.js';
import { parseRfc3339 } from './dates.js';
import { type XmlElement, childText, childrenNamed } from './xml.js';
import { FeedParseError } from '../shared/errors.js';

export const ATOM_NS = 'http://www.w3.org/2005/Atom';

function selfLink(feed: XmlElement): string | null {
  const link = childrenNamed(feed, 'link', ATOM_NS).find((l) => l.attributes.get('rel') === 'self');
  return link?.attributes.get('href') || null;
}

function entryLink(entry: XmlElement): string | null {
  for (const link of childrenNamed(entry, 'link', ATOM_NS)) {
    const href = link.attributes.get('href');
    if (href) return href;
  }
  return null;
}

function atomEntryToEntry(entry: XmlElement, scheme: IdentityScheme): Entry | null {
  // Unlike RSS there is no fallback to the summary.
  const title = childText(entry, 'title', ATOM_NS);
  if (title === null) return null;

  const link = entryLink(entry);
  return {
    primaryText: title,
    identity: deriveIdentity(title, link, scheme),
    link,
    publishedAt: parseRfc3339(childText(entry, 'updated', ATOM_NS)),
    read: false,
  };
}

/**
 * Convert an Atom `<feed>` into a channel. The feed must declare a
 * `rel="self"` link, which Atom itself does not require.
 */
export function atomToChannel(root: XmlElement, scheme: IdentityScheme): Channel {
  const title = childText(root, 'title', ATOM_NS);
  if (title === null) {
    throw new FeedParseError('MissingTitle', 'Atom feed has no <title>');
  }
  const link = selfLink(root);
  if (link === null) {
    throw new FeedParseError('MissingLink', 'Atom feed has no <link rel="self">', { title });
  }

  const entries: Entry[] = [];
  for (const element of childrenNamed(root, 'entry', ATOM_NS)) {
    const entry = atomEntryToEntry(element, scheme);
    if (entry) entries.push(entry);
  }

  return {
    title,
    link,
    description: '',
    lastBuildDate: parseRfc3339(childText(root, 'updated', ATOM_NS)),
    entries,
  };
}
