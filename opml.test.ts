import { describe, expect, it } from 'vitest';
import { ConfigError } from './errors';
import {
  collectFeedSources,
  feedListDocument,
  parseOpml,
  publicFeedUrl,
  rebuildOpml,
  sanitizeOpml,
  type RepublishedFeed,
} from './opml';

const SOURCE_OPML = `<?xml version="1.0" encoding="UTF-8"?>
<opml version="2.0">
  <head><title>My feeds</title></head>
  <body>
    <outline text="News" title="News">
      <outline text="El País" type="rss" xmlUrl="https://elpais.example/rss" htmlUrl="https://elpais.example/"/>
      <outline text="Le Monde" type="rss" xmlurl="https://lemonde.example/rss?a=1&b=2"/>
    </outline>
    <outline title="Tech" xmlUrl="https://tech.example/atom"/>
    <outline text="Dupe" xmlUrl="https://elpais.example/rss"/>
  </body>
</opml>`;

describe('sanitizeOpml', () => {
  it('drops control characters and escapes bare ampersands', () => {
    expect(sanitizeOpml('a\u0001b & c &amp; d &#38; e\tf')).toBe('ab &amp; c &amp; d &#38; e\tf');
  });
});

describe('parseOpml', () => {
  it('keeps the folder hierarchy', () => {
    const doc = parseOpml(SOURCE_OPML);

    expect(doc.title).toBe('My feeds');
    expect(doc.outlines.map((outline) => outline.text)).toEqual(['News', 'Tech', 'Dupe']);
    expect(doc.outlines[0]?.children.map((outline) => outline.xmlUrl)).toEqual([
      'https://elpais.example/rss',
      'https://lemonde.example/rss?a=1&b=2',
    ]);
  });

  it('rejects XML that does not parse', () => {
    expect(() => parseOpml('<opml><body><outline></body></opml>')).toThrow(ConfigError);
  });

  it('rejects a document without an opml root', () => {
    expect(() => parseOpml('<rss version="2.0"></rss>')).toThrow('OPML has no <opml> root element.');
  });
});

describe('collectFeedSources', () => {
  it('lists feeds in document order without repeats', () => {
    expect(collectFeedSources(parseOpml(SOURCE_OPML))).toEqual([
      { title: 'El País', xmlUrl: 'https://elpais.example/rss', htmlUrl: 'https://elpais.example/' },
      { title: 'Le Monde', xmlUrl: 'https://lemonde.example/rss?a=1&b=2', htmlUrl: undefined },
      { title: 'Tech', xmlUrl: 'https://tech.example/atom', htmlUrl: undefined },
    ]);
  });

  it('filters on the feed URL', () => {
    expect(collectFeedSources(parseOpml(SOURCE_OPML), 'tech.example').map((source) => source.title)).toEqual([
      'Tech',
    ]);
  });

  it('accepts a flat URL list', () => {
    expect(collectFeedSources(feedListDocument(['https://a.example/rss']))).toEqual([
      { title: 'https://a.example/rss', xmlUrl: 'https://a.example/rss', htmlUrl: undefined },
    ]);
  });
});

describe('publicFeedUrl', () => {
  it('joins the base and the encoded file name', () => {
    expect(publicFeedUrl('https://feeds.example/out//', 'a b.en.xml')).toBe('https://feeds.example/out/a%20b.en.xml');
  });
});

describe('rebuildOpml', () => {
  const republished = new Map<string, RepublishedFeed>([['https://elpais.example/rss', { fileName: 'el-pais.es.xml' }]]);

  it('points translated feeds at their public files and drops the rest', () => {
    const { xml, missing } = rebuildOpml(parseOpml(SOURCE_OPML), republished, {
      collectionName: 'Translated Feeds',
      publicBaseUrl: 'https://feeds.example/out/',
      targetLang: 'es',
    });

    expect(missing).toBe(2);
    expect(xml.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n<opml version="2.0">')).toBe(true);

    const rebuilt = parseOpml(xml);
    expect(rebuilt.title).toBe('Translated Feeds');
    expect(rebuilt.outlines).toHaveLength(1);

    const root = rebuilt.outlines[0];
    expect(root?.text).toBe('Translated Feeds');
    expect(root?.children.map((outline) => outline.text)).toEqual(['News', 'Dupe (ES translated)']);
    expect(root?.children[0]?.children).toEqual([
      {
        text: 'El País (ES translated)',
        title: 'El País (ES translated)',
        type: 'rss',
        xmlUrl: 'https://feeds.example/out/el-pais.es.xml',
        htmlUrl: 'https://elpais.example/',
        children: [],
      },
    ]);
  });
});
