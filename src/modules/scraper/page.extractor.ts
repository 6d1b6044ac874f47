/**
 * Page Extractor
 * Markup to page record: title, h1-h3 texts, plain-text body, absolute links
 */

import * as cheerio from 'cheerio';
import { hasChildren, isText, type AnyNode } from 'domhandler';
import { HEADER_LEVELS, LinkDiscoverer } from '../../lib/crawling';
import type { PageHeaders, PageRecord } from '../../lib/crawling';
import { collapseWhitespace } from '../../lib/validation';

const NON_CONTENT_TAGS = 'script, style';

const linkDiscoverer = new LinkDiscoverer();

function collectText(nodes: AnyNode[], parts: string[]): void {
  for (const node of nodes) {
    if (isText(node)) {
      const text = collapseWhitespace(node.data);
      if (text) parts.push(text);
    } else if (hasChildren(node)) {
      collectText(node.children, parts);
    }
  }
}

/**
 * Every text node, trimmed, joined by single spaces
 */
export function extractBodyText($: cheerio.CheerioAPI): string {
  const parts: string[] = [];
  collectText($.root().toArray(), parts);
  return parts.join(' ');
}

export function extractHeaders($: cheerio.CheerioAPI): PageHeaders {
  const headers: PageHeaders = {};

  for (const level of HEADER_LEVELS) {
    const texts = $(level)
      .map((_, el) => collapseWhitespace($(el).text()))
      .get();
    if (texts.length > 0) {
      headers[level] = texts;
    }
  }

  return headers;
}

export function extractTitle($: cheerio.CheerioAPI): string | undefined {
  const titleEl = $('title').first();
  if (titleEl.length === 0) {
    return undefined;
  }
  return titleEl.text().trim();
}

export function extractPage(
  html: string,
  sourceUrl: string,
  now: () => Date = () => new Date()
): Omit<PageRecord, 'id'> {
  const $ = cheerio.load(html);

  const title = extractTitle($);
  const headers = extractHeaders($);
  const links = linkDiscoverer.discoverLinks($, sourceUrl);

  $(NON_CONTENT_TAGS).remove();
  const data = extractBodyText($);

  return {
    url: sourceUrl,
    title,
    headers,
    data,
    links,
    scrapedAt: now().toISOString(),
  };
}
