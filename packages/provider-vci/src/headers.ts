import type { HeaderOptions } from './types.js';

const VCI_ORIGIN = 'https://trading.vietcap.com.vn';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

export const USER_AGENTS: readonly string[] = [
  DEFAULT_USER_AGENT,
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Safari/605.1.15',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:125.0) Gecko/20100101 Firefox/125.0',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36 Edg/124.0.0.0',
];

/**
 * Request headers the VCI API expects from a browser session.
 */
export function buildHeaders(options: HeaderOptions = {}): Readonly<Record<string, string>> {
  const { randomAgent = false, random = Math.random } = options;
  const userAgent = randomAgent
    ? USER_AGENTS[Math.floor(random() * USER_AGENTS.length)] ?? DEFAULT_USER_AGENT
    : DEFAULT_USER_AGENT;

  return Object.freeze({
    Accept: 'application/json, text/plain, */*',
    'Accept-Language': 'en-US,en;q=0.9,vi-VN;q=0.8,vi;q=0.7',
    'Content-Type': 'application/json',
    Referer: `${VCI_ORIGIN}/`,
    Origin: VCI_ORIGIN,
    'User-Agent': userAgent,
  });
}
