import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { ConfigError } from './errors';
import type { FeedSource } from './types';

export type OpmlOutline = {
  text: string;
  title?: string;
  type?: string;
  xmlUrl?: string;
  htmlUrl?: string;
  children: OpmlOutline[];
};

export type OpmlDocument = {
  title: string;
  outlines: OpmlOutline[];
};

export type RepublishedFeed = {
  fileName: string;
};

export type RebuildOptions = {
  collectionName: string;
  publicBaseUrl: string;
  targetLang: string;
};

type XmlNode = Record<string, unknown>;

const isXmlNode = (value: unknown): value is XmlNode =>
  Boolean(value) && typeof value === 'object' && !Array.isArray(value);

const asArray = (value: unknown): unknown[] => (Array.isArray(value) ? value : value === undefined ? [] : [value]);

const attr = (node: XmlNode, ...names: string[]) => {
  for (const name of names) {
    const value = node[`@_${name}`];
    if (typeof value === 'string' && value.trim()) return value.trim();
  }
  return undefined;
};

/**
 * Makes hand-edited OPML parseable: drops C0 control characters (except tab,
 * CR and LF) and escapes bare ampersands that do not start an XML entity.
 */
export const sanitizeOpml = (text: string) =>
  text
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '')
    .replace(/&(?!(?:amp|lt|gt|quot|apos);|#[0-9]+;|#x[0-9A-Fa-f]+;)/g, '&amp;');

const toOutline = (raw: unknown): OpmlOutline | null => {
  if (!isXmlNode(raw)) return null;
  const xmlUrl = attr(raw, 'xmlUrl', 'xmlurl');
  const title = attr(raw, 'title');
  return {
    text: attr(raw, 'text') ?? title ?? (xmlUrl ? 'Feed' : ''),
    title,
    type: attr(raw, 'type'),
    xmlUrl,
    htmlUrl: attr(raw, 'htmlUrl', 'htmlurl'),
    children: asArray(raw.outline)
      .map(toOutline)
      .filter((outline): outline is OpmlOutline => outline !== null),
  };
};

export const parseOpml = (text: string): OpmlDocument => {
  const sanitized = sanitizeOpml(text);
  const validation = XMLValidator.validate(sanitized);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new ConfigError(`OPML does not parse (line ${line}, column ${col}): ${msg}`);
  }

  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    parseTagValue: false,
    parseAttributeValue: false,
    isArray: (name) => name === 'outline',
  });
  const parsed: unknown = parser.parse(sanitized);
  const opml = isXmlNode(parsed) ? parsed.opml : undefined;
  if (!isXmlNode(opml)) throw new ConfigError('OPML has no <opml> root element.');

  const head = isXmlNode(opml.head) ? opml.head : {};
  const body = isXmlNode(opml.body) ? opml.body : {};
  return {
    title: typeof head.title === 'string' ? head.title.trim() : '',
    outlines: asArray(body.outline)
      .map(toOutline)
      .filter((outline): outline is OpmlOutline => outline !== null),
  };
};

/** Feed outlines in document order, first title wins for a repeated URL. */
export const collectFeedSources = (doc: OpmlDocument, urlFilter?: string): FeedSource[] => {
  const sources: FeedSource[] = [];
  const seen = new Set<string>();
  const visit = (outline: OpmlOutline) => {
    if (outline.xmlUrl && !seen.has(outline.xmlUrl)) {
      seen.add(outline.xmlUrl);
      if (!urlFilter || outline.xmlUrl.includes(urlFilter)) {
        sources.push({ title: outline.text, xmlUrl: outline.xmlUrl, htmlUrl: outline.htmlUrl });
      }
    }
    outline.children.forEach(visit);
  };
  doc.outlines.forEach(visit);
  return sources;
};

export const feedListDocument = (urls: string[]): OpmlDocument => ({
  title: 'Feeds',
  outlines: urls.map((url) => ({ text: url, xmlUrl: url, children: [] })),
});

export const publicFeedUrl = (publicBaseUrl: string, fileName: string) =>
  `${publicBaseUrl.replace(/\/+$/, '')}/${encodeURIComponent(fileName)}`;

/**
 * Writes the subscription list for the translated editions: same folders as
 * the source, every feed pointing at its republished file. Feeds that produced
 * no output are left out (and counted); so are folders left empty.
 */
export const rebuildOpml = (
  doc: OpmlDocument,
  republished: ReadonlyMap<string, RepublishedFeed>,
  options: RebuildOptions,
): { xml: string; missing: number } => {
  const label = options.targetLang.toUpperCase();
  let missing = 0;

  const rebuild = (outline: OpmlOutline): XmlNode | null => {
    if (outline.xmlUrl) {
      const feed = republished.get(outline.xmlUrl);
      if (!feed) {
        missing += 1;
        return null;
      }
      const text = `${outline.text} (${label} translated)`;
      return {
        '@_text': text,
        '@_title': text,
        '@_type': 'rss',
        '@_xmlUrl': publicFeedUrl(options.publicBaseUrl, feed.fileName),
        ...(outline.htmlUrl ? { '@_htmlUrl': outline.htmlUrl } : {}),
      };
    }
    const children = outline.children.map(rebuild).filter((node): node is XmlNode => node !== null);
    if (children.length === 0) return null;
    return { '@_text': outline.text, '@_title': outline.title ?? outline.text, outline: children };
  };

  const outlines = doc.outlines.map(rebuild).filter((node): node is XmlNode => node !== null);
  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    format: true,
    indentBy: '  ',
    suppressEmptyNode: true,
  });
  const body = builder.build({
    opml: {
      '@_version': '2.0',
      head: { title: options.collectionName },
      body: {
        outline: [{ '@_text': options.collectionName, '@_title': options.collectionName, outline: outlines }],
      },
    },
  });
  return { xml: `<?xml version="1.0" encoding="UTF-8"?>\n${body}`, missing };
};
