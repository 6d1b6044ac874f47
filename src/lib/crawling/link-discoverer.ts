/**
 * Link Discoverer
 * Anchor extraction and frontier scoping
 */

import type { CheerioAPI } from 'cheerio';
import { resolveHttpUrl, isWithinScope } from './url-normalizer';
import { DuplicateDetector } from './duplicate-detector';

export class LinkDiscoverer {
  /**
   * Absolute http(s) URLs of every anchor, in document order, duplicates kept
   */
  discoverLinks($: CheerioAPI, baseUrl: string): string[] {
    const links: string[] = [];

    $('a[href]').each((_, el) => {
      const href = $(el).attr('href');
      if (href === undefined) return;

      const absoluteUrl = resolveHttpUrl(href.trim(), baseUrl);
      if (absoluteUrl) {
        links.push(absoluteUrl);
      }
    });

    return links;
  }

  /**
   * Links that may join the frontier: prefixed by the seed URL and not yet visited
   */
  filterLinks(links: string[], seedUrl: string, visited: DuplicateDetector): string[] {
    return links.filter((link) => isWithinScope(link, seedUrl) && !visited.hasUrl(link));
  }
}
