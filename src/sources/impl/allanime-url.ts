/**
 * AllAnime obfuscates most source URLs as "--" followed by hex bytes, each
 * XOR-ed with this key.
 */
const XOR_KEY = 56;

export const ALLANIME_SITE = 'https://allanime.day';

/**
 * Decode an obfuscated source URL (without its "--" prefix)
 *
 * @throws Error if the payload is not an even-length hex string
 */
export function decodeSourceUrl(hex: string): string {
  if (hex.length % 2 !== 0 || !/^[0-9a-f]*$/i.test(hex)) {
    throw new Error(`Malformed obfuscated source URL: "${hex}"`);
  }

  let decoded = '';
  for (let i = 0; i < hex.length; i += 2) {
    decoded += String.fromCharCode(Number.parseInt(hex.slice(i, i + 2), 16) ^ XOR_KEY);
  }
  return decoded;
}

/**
 * Turn a raw `sourceUrl` into an absolute URL:
 * - "--<hex>" is decoded
 * - protocol-relative "//host/..." gets https
 * - "/clock" endpoints are switched to their JSON variant
 * - "/apivtwo/..." paths are rooted at the site
 */
export function normalizeSourceUrl(raw: string): string {
  let url = raw.startsWith('--') ? decodeSourceUrl(raw.slice(2)) : raw;

  if (url.startsWith('//')) {
    url = `https:${url}`;
  }

  if (url.includes('/clock') && !url.includes('/clock.json')) {
    url = url.replace('/clock', '/clock.json');
  }

  if (url.startsWith('/apivtwo/')) {
    url = `${ALLANIME_SITE}${url}`;
  }

  return url;
}

/**
 * Whether the URL is a clock endpoint that must be resolved to a media link
 */
export function isClockUrl(url: string): boolean {
  return url.includes('clock.json');
}
