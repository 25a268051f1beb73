import type { Channel } from './model.js';
import { type IdentityScheme, DEFAULT_IDENTITY_SCHEME } from './identity.js';
import { type XmlElement, parseXml } from './xml.js';
import { rssToChannel } from './rss.js';
import { ATOM_NS, atomToChannel } from './atom.js';
import { FeedParseError } from '../shared/errors.js';

export type FeedDocument =
  | { dialect: 'rss'; root: XmlElement }
  | { dialect: 'atom'; root: XmlElement };

export type Dialect = FeedDocument['dialect'];

/**
 * Decide the dialect from the root element alone.
 */
export function detectDialect(root: XmlElement): FeedDocument {
  if (root.name === 'rss' && root.namespace === null) {
    return { dialect: 'rss', root };
  }
  if (root.namespace === ATOM_NS) {
    return { dialect: 'atom', root };
  }
  throw new FeedParseError('UnknownFormat', `Unrecognized feed root <${root.name}>`, {
    root: root.name,
    namespace: root.namespace,
  });
}

export function readFeedDocument(xml: string): FeedDocument {
  return detectDialect(parseXml(xml));
}

/**
 * Parse an RSS or Atom document into the canonical channel model.
 */
export function parseFeed(xml: string, scheme: IdentityScheme = DEFAULT_IDENTITY_SCHEME): Channel {
  const doc = readFeedDocument(xml);
  switch (doc.dialect) {
    case 'rss':
      return rssToChannel(doc.root, scheme);
    case 'atom':
      return atomToChannel(doc.root, scheme);
  }
}
