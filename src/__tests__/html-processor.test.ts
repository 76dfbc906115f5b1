/**
 * Tests for HtmlProcessor
 */

import { HtmlProcessor } from '../core/html-processor';
import { appendBang, counting, failing, identity, marker, uppercase } from '../__mocks__/translators';

describe('HtmlProcessor', () => {
  describe('text nodes', () => {
    it('should translate around template tags and keep them in position', async () => {
      const processor = new HtmlProcessor(appendBang);
      const result = await processor.translateDocument('<p>Hello {{ site.name }} world</p>');

      expect(result).toBe('<p>Hello! {{ site.name }} world!</p>');
    });

    it('should keep entities intact', async () => {
      const processor = new HtmlProcessor(uppercase);
      expect(await processor.translateDocument('<p>Fish &amp; Chips</p>')).toBe('<p>FISH &amp; CHIPS</p>');
    });

    it('should skip script, style, code and pre content', async () => {
      const processor = new HtmlProcessor(uppercase);
      const html =
        '<script>var a = "Hello there";</script><style>p { color: red; }</style>' +
        '<pre>keep me</pre><code>keep</code><p>Translate me</p>';

      const result = await processor.translateDocument(html);

      expect(result).toBe(
        '<script>var a = "Hello there";</script><style>p { color: red; }</style>' +
        '<pre>keep me</pre><code>keep</code><p>TRANSLATE ME</p>'
      );
    });

    it('should not translate comments', async () => {
      const processor = new HtmlProcessor(uppercase);
      expect(await processor.translateDocument('<!-- a comment --><p>Hi</p>')).toBe('<!-- a comment --><p>HI</p>');
    });

    it('should write duplicate texts back at their own positions', async () => {
      const processor = new HtmlProcessor(counting());
      const result = await processor.translateDocument('<p>Same</p><p>Same</p><span title="Same">Same</span>');

      expect(result).toBe('<p>Same#1</p><p>Same#2</p><span title="Same#4">Same#3</span>');
    });

    it('should keep whitespace and line breaks around text', async () => {
      const processor = new HtmlProcessor(uppercase);
      const html = '<ul>\n  <li>  First item </li>\n  <li>Second</li>\n</ul>\n';

      expect(await processor.translateDocument(html)).toBe(
        '<ul>\n  <li>  FIRST ITEM </li>\n  <li>SECOND</li>\n</ul>\n'
      );
    });
  });

  describe('attributes', () => {
    it('should translate whitelisted attributes and keep their quoting', async () => {
      const processor = new HtmlProcessor(uppercase);
      const html =
        '<img src="cat.png" alt="A cute cat"><input placeholder=\'Your name\'>' +
        '<meta name="viewport" content="width=device-width, initial-scale=1">' +
        '<meta name="description" content="About us">';

      const result = await processor.translateDocument(html);

      expect(result).toBe(
        '<img src="cat.png" alt="A CUTE CAT"><input placeholder=\'YOUR NAME\'>' +
        '<meta name="viewport" content="width=device-width, initial-scale=1">' +
        '<meta name="description" content="ABOUT US">'
      );
    });

    it('should leave machine-read social meta keys alone', async () => {
      const processor = new HtmlProcessor(uppercase);
      const html =
        '<meta property="og:type" content="website">' +
        '<meta name="twitter:card" content="summary_large_image">' +
        '<meta property="og:locale" content="en_US">' +
        '<meta property="og:title" content="Our blog">' +
        '<meta name="twitter:description" content="News and notes">';

      expect(await processor.translateDocument(html)).toBe(
        '<meta property="og:type" content="website">' +
        '<meta name="twitter:card" content="summary_large_image">' +
        '<meta property="og:locale" content="en_US">' +
        '<meta property="og:title" content="OUR BLOG">' +
        '<meta name="twitter:description" content="NEWS AND NOTES">'
      );
    });

    it('should read attributes from elements among top-level text and comments', async () => {
      const processor = new HtmlProcessor(uppercase);
      const html = '<!-- logo -->Intro <img alt="Logo"> outro';

      expect(await processor.translateDocument(html)).toBe('<!-- logo -->INTRO <img alt="LOGO"> OUTRO');
    });

    it('should keep template tags inside attribute values', async () => {
      const processor = new HtmlProcessor(uppercase);
      const result = await processor.translateDocument('<a title="Go {{ page.title }} now" href="/x">Link</a>');

      expect(result).toBe('<a title="GO {{ page.title }} NOW" href="/x">LINK</a>');
    });

    it('should escape quotes introduced by the translation', async () => {
      const processor = new HtmlProcessor(async text => `"${text}"`);
      expect(await processor.translateDocument('<img alt="Logo">')).toBe('<img alt="&quot;Logo&quot;">');
    });

    it('should quote unquoted values', async () => {
      const processor = new HtmlProcessor(async () => 'Bonjour le monde');
      expect(await processor.translateDocument('<img alt=Hello>')).toBe('<img alt="Bonjour le monde">');
    });
  });

  describe('documents', () => {
    it('should keep front matter untouched', async () => {
      const processor = new HtmlProcessor(uppercase);
      const html = '---\nlayout: default\ntitle: Home\n---\n<h1>Welcome</h1>\n';

      expect(await processor.translateDocument(html)).toBe('---\nlayout: default\ntitle: Home\n---\n<h1>WELCOME</h1>\n');
    });

    it('should leave a document unchanged with an identity translator', async () => {
      const processor = new HtmlProcessor(identity);
      const html =
        '<!DOCTYPE html>\n<html lang="en">\n<head><title>{{ page.title }} | Site</title></head>\n' +
        '<body>\n  {% include nav.html %}\n  <p class="lead">Fish &amp; chips &#8212; <b>fresh</b></p>\n' +
        '  <img alt="Logo" src="{{ \'/logo.png\' | relative_url }}">\n</body>\n</html>\n';

      expect(await processor.translateDocument(html)).toBe(html);
    });

    it('should send no markup or template syntax to the backend', async () => {
      const processor = new HtmlProcessor(marker);
      const html = '<div>{% if user %}<p>Welcome back, {{ user.name }}!</p>{% endif %}</div>';

      expect(await processor.translateDocument(html)).toBe(
        '<div>{% if user %}<p><<Welcome back,>> {{ user.name }}!</p>{% endif %}</div>'
      );
    });

    it('should return the document unchanged when every translation fails', async () => {
      const processor = new HtmlProcessor(failing);
      const html = '<p title="Tip">Hello {{ name }}</p>';

      expect(await processor.translateDocument(html)).toBe(html);
    });
  });
});
