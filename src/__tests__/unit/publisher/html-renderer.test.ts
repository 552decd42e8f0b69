import { describe, it, expect } from '@jest/globals';
import { escapeHtml, renderFolder, renderSiteHtml } from '../../../core/publisher/html-renderer.js';

describe('HTML renderer', () => {
  it('should escape markup characters', () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;'
    );
  });

  it('should render files as links and folders as nested lists', () => {
    const html = renderFolder({
      a: {
        'b.txt': 'https://archive.org/download/item1/a/b.txt',
      },
      'c.txt': 'https://archive.org/download/item1/c.txt',
    });

    expect(html).toBe(
      '<li class="folder">📁 a\n<ul>' +
        '<li class="file">📄 <a href="https://archive.org/download/item1/a/b.txt">b.txt</a></li>' +
        '</ul></li>' +
        '<li class="file">📄 <a href="https://archive.org/download/item1/c.txt">c.txt</a></li>'
    );
  });

  it('should render one section per uploader', () => {
    const html = renderSiteHtml({
      alice: { 'x.txt': 'https://archive.org/download/item1/x.txt' },
      'bob <admin>': { 'y.txt': 'https://archive.org/download/item2/y.txt' },
    });

    expect(html.startsWith('<!DOCTYPE html>\n<html>\n<head>\n    <meta charset="utf-8">')).toBe(true);
    expect(html).toContain('<title>Archive Uploads</title>');
    expect(html).toContain(
      '    <h1>📁 Archived Files</h1>\n<h2>👤 Uploader: alice</h2>\n<ul>' +
        '<li class="file">📄 <a href="https://archive.org/download/item1/x.txt">x.txt</a></li></ul>' +
        '\n<h2>👤 Uploader: bob &lt;admin&gt;</h2>\n<ul>'
    );
    expect(html.endsWith('</ul>\n</body>\n</html>\n')).toBe(true);
  });

  it('should render an empty page without uploader sections', () => {
    const html = renderSiteHtml({});
    expect(html.endsWith('<h1>📁 Archived Files</h1>\n</body>\n</html>\n')).toBe(true);
  });
});
