/**
 * Request Headers
 * Directory sites answer 403 to default client identifiers, so every
 * request carries a browser user-agent.
 */

import { env } from '../../config/env';

export interface BrowserHeaderOptions {
  userAgent?: string;
  acceptLanguage?: string;
}

export function getBrowserHeaders(options: BrowserHeaderOptions = {}): Record<string, string> {
  return {
    'User-Agent': options.userAgent ?? env.USER_AGENT,
    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
    'Accept-Language': options.acceptLanguage ?? env.ACCEPT_LANGUAGE,
    'Connection': 'keep-alive',
  };
}
