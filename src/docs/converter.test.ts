/**
 * Unit tests for HTML to Markdown conversion
 */

import { describe, it, expect } from '@jest/globals';
import { DocumentConverter, narrowDocument } from './converter.js';
import { UrlResolver } from './resolver.js';
import { ParseError } from '../errors/index.js';
import { QSTRING_BODY, QSTRING_CONTENT, TEST_BASE_URL, canonicalUrl, qtPage } from '../__tests__/utils.js';

describe('DocumentConverter', () => {
  const converter = new DocumentConverter(new UrlResolver(TEST_BASE_URL));
  const qstring = qtPage('QString Class Reference', QSTRING_CONTENT);
  const convertPage = (content: string, page = 'page.html', fragment?: string) =>
    converter.convert(qtPage('Page', content), {
      url: canonicalUrl(page),
      ...(fragment ? { fragment } : {}),
    });

  describe('whole pages', () => {
    it('should convert the content region without layout chrome', () => {
      const doc = converter.convert(qstring, { url: canonicalUrl('qstring.html') });

      expect(doc.title).toBe('QString Class Reference');
      expect(doc.body).toBe(QSTRING_BODY);
      expect(doc.fragment).toBeUndefined();
    });

    it('should list outbound links in first-appearance order', () => {
      const doc = converter.convert(qstring, { url: canonicalUrl('qstring.html') });

      expect(doc.links).toEqual([
        { text: 'QStringList', url: canonicalUrl('qstringlist.html') },
        { text: 'External', url: 'http://example.com/external' },
        { text: 'QByteArray append', url: `${canonicalUrl('qbytearray.html')}#append` },
      ]);
      expect(doc.outline.occurrences).toEqual([
        { link: 0, heading: 0 },
        { link: 1, heading: 0 },
        { link: 2, heading: 2 },
      ]);
    });

    it('should build the heading outline with anchors and offsets', () => {
      const doc = converter.convert(qstring, { url: canonicalUrl('qstring.html') });
      const headings = doc.outline.headings;

      expect(headings.map((heading) => [heading.level, heading.text, heading.anchors])).toEqual([
        [1, 'QString Class Reference', []],
        [2, 'Detailed Description', ['details']],
        [3, 'QString append ( const QString str )', ['append']],
        [2, 'Member Function Documentation', ['members']],
      ]);
      expect(headings[0]?.offset).toBe(0);
      for (const heading of headings) {
        expect(doc.body.slice(heading.offset)).toMatch(new RegExp(`^#{${heading.level}} `));
        expect(doc.body.slice(heading.offset).split('\n')[0]).toBe(`${'#'.repeat(heading.level)} ${heading.text}`);
      }
    });

    it('should dedupe links by text and target but count every occurrence', () => {
      const doc = convertPage(
        '<h1>Links</h1><p><a href="qstring.html">QString</a> and <a href="qstring.html">QString</a> or <a href="qstring.html">the string class</a>.</p>'
      );

      expect(doc.links).toEqual([
        { text: 'QString', url: canonicalUrl('qstring.html') },
        { text: 'the string class', url: canonicalUrl('qstring.html') },
      ]);
      expect(doc.outline.occurrences).toEqual([
        { link: 0, heading: 0 },
        { link: 0, heading: 0 },
        { link: 1, heading: 0 },
      ]);
    });

    it('should resolve links relative to pages in subdirectories', () => {
      const doc = convertPage(
        '<p><a href="part2.html">Next</a> <a href="../qstring.html">QString</a> <a href="../../outside.html">Outside</a></p>',
        'tutorials/addressbook.html'
      );

      expect(doc.links.map((link) => link.url)).toEqual([
        canonicalUrl('tutorials/part2.html'),
        canonicalUrl('qstring.html'),
        '../../outside.html',
      ]);
    });

    it('should rewrite image sources', () => {
      const doc = convertPage('<p><img src="images/logo.png" alt="Logo"></p>');

      expect(doc.body).toBe(`![Logo](${canonicalUrl('images/logo.png')})`);
    });

    it('should render tables as pipe tables', () => {
      const doc = convertPage(
        '<h1>Enums</h1><table><thead><tr><th>Constant</th><th>Value</th></tr></thead><tbody><tr><td>Qt.AlignLeft</td><td>1</td></tr></tbody></table>'
      );

      expect(doc.body).toBe(['# Enums', '', '| Constant | Value |', '| --- | --- |', '| Qt.AlignLeft | 1 |'].join('\n'));
    });

    it('should fence preformatted code with its language', () => {
      const doc = convertPage('<h1>Example</h1><pre class="cpp">QString s = "hi";\nint n = s.size();</pre>');

      expect(doc.body).toBe(['# Example', '', '```cpp', 'QString s = "hi";', 'int n = s.size();', '```'].join('\n'));
    });

    it('should fall back to the document body without a content region', () => {
      const doc = converter.convert('<html><head><title>Bare</title></head><body><p>Hello <b>world</b></p></body></html>', {
        url: canonicalUrl('bare.html'),
      });

      expect(doc.title).toBe('Bare');
      expect(doc.body).toBe('Hello **world**');
    });

    it('should take the title from the title element when there is no h1', () => {
      const doc = convertPage('<p>Just text.</p>');

      expect(doc.title).toBe('Page | Reference Documentation');
    });

    it('should be deterministic', () => {
      const first = converter.convert(qstring, { url: canonicalUrl('qstring.html') });
      const second = converter.convert(qstring, { url: canonicalUrl('qstring.html') });

      expect(second).toEqual(first);
      expect(first.fingerprint).toMatch(/^[0-9a-f]{64}$/);
    });

    it('should return frozen documents', () => {
      const doc = converter.convert(qstring, { url: canonicalUrl('qstring.html') });

      expect(Object.isFrozen(doc)).toBe(true);
      expect(Object.isFrozen(doc.links)).toBe(true);
      expect(Object.isFrozen(doc.outline.headings[0])).toBe(true);
    });

    it.each([
      ['empty', ''],
      ['whitespace only', '   \n  '],
      ['binary', 'PK\0\u0003binary'],
      ['markup free', 'just some text'],
    ])('should reject %s input', (_label, html) => {
      expect(() => converter.convert(html, { url: canonicalUrl('broken.html') })).toThrow(ParseError);
    });
  });

  describe('fragments', () => {
    const convertFragment = (fragment: string) =>
      converter.convert(qstring, { url: canonicalUrl('qstring.html'), fragment });

    it('should narrow to the section under an anchor placed before a heading', () => {
      const doc = convertFragment('details');

      expect(doc.fragment).toBe('details');
      expect(doc.title).toBe('QString Class Reference');
      expect(doc.body).toBe(
        [
          '## Detailed Description',
          '',
          'QString stores a string of 16-bit QChars.',
          '',
          '### QString append ( const QString str )',
          '',
          `Appends the string str onto the end of this string. See [QByteArray append](${canonicalUrl('qbytearray.html')}#append).`,
        ].join('\n')
      );
      expect(doc.links).toEqual([{ text: 'QByteArray append', url: `${canonicalUrl('qbytearray.html')}#append` }]);
      expect(doc.outline.occurrences).toEqual([{ link: 0, heading: 1 }]);
      expect(doc.outline.headings.map((heading) => heading.offset)).toEqual([0, doc.body.indexOf('### QString append')]);
    });

    it('should narrow to the section of a heading containing the anchor', () => {
      const doc = convertFragment('append');

      expect(doc.body).toBe(
        [
          '### QString append ( const QString str )',
          '',
          `Appends the string str onto the end of this string. See [QByteArray append](${canonicalUrl('qbytearray.html')}#append).`,
        ].join('\n')
      );
    });

    it('should run the last section to the end of the page', () => {
      const doc = convertFragment('members');

      expect(doc.body).toBe('## Member Function Documentation\n\nMembers follow.');
      expect(doc.links).toEqual([]);
    });

    it('should render the subtree of a non-heading target', () => {
      const doc = convertPage(
        '<h1>Notes Page</h1><p>Intro.</p><div id="notes"><p>Note one.</p><p>Note two mentions <a href="qstring.html">QString</a>.</p></div><p>Outro.</p>',
        'notes.html',
        'notes'
      );

      expect(doc.title).toBe('Notes Page');
      expect(doc.fragment).toBe('notes');
      expect(doc.body).toBe(`Note one.\n\nNote two mentions [QString](${canonicalUrl('qstring.html')}).`);
      expect(doc.links).toEqual([{ text: 'QString', url: canonicalUrl('qstring.html') }]);
      expect(doc.outline).toEqual({ headings: [], occurrences: [{ link: 0, heading: -1 }] });
    });

    it('should keep list and blockquote prefixes with nested headings', () => {
      const content = [
        '<h1>Quotes</h1>',
        '<ul><li><h3 id="item">List head</h3><p>item body</p></li></ul>',
        '<blockquote><h3 id="quote">Quote head</h3><p>quote body</p></blockquote>',
      ].join('');

      expect(convertPage(content, 'quotes.html', 'item').body).toBe('-   ### List head\n    \n    item body');
      expect(convertPage(content, 'quotes.html', 'quote').body).toBe('> ### Quote head\n> \n> quote body');
    });

    it('should return the whole page for an unknown fragment', () => {
      const whole = converter.convert(qstring, { url: canonicalUrl('qstring.html') });
      const doc = convertFragment('nowhere');

      expect(doc).toEqual(whole);
      expect(doc.fragment).toBeUndefined();
    });

    it('should return the whole page for an empty anchor that starts no section', () => {
      const doc = convertPage('<h1>Lonely</h1><a name="lonely"></a><p>Body text.</p>', 'lonely.html', 'lonely');

      expect(doc.body).toBe('# Lonely\n\nBody text.');
      expect(doc.fragment).toBeUndefined();
    });
  });
});

describe('narrowDocument', () => {
  const converter = new DocumentConverter(new UrlResolver(TEST_BASE_URL));

  it('should match converting with the fragment directly', () => {
    const html = qtPage('QString Class Reference', QSTRING_CONTENT);
    const whole = converter.convert(html, { url: canonicalUrl('qstring.html') });

    expect(narrowDocument(whole, 'details')).toEqual(
      converter.convert(html, { url: canonicalUrl('qstring.html'), fragment: 'details' })
    );
  });

  it('should return undefined when no heading carries the fragment', () => {
    const whole = converter.convert(qtPage('QString Class Reference', QSTRING_CONTENT), {
      url: canonicalUrl('qstring.html'),
    });

    expect(narrowDocument(whole, 'nowhere')).toBeUndefined();
  });
});
