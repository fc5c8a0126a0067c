import { ChatCoreError } from '../errors.js';

export const IMAGE_EXTENSIONS = ['jpg', 'jpeg', 'png', 'webp', 'gif'] as const;

// Path and query are split so the extension check anchors on the end of the path.
// Brackets and parentheses end a URL, so `[url](url)` yields the same URL twice.
const URL_PATTERN = /https?:\/\/[^\s<>"'`?()[\]]+(?:\?[^\s<>"'`()[\]]*)?/gi;
const IMAGE_PATH = new RegExp(`\\.(?:${IMAGE_EXTENSIONS.join('|')})$`, 'i');
const TRAILING_PUNCTUATION = /[.,;:!)\]}]+$/;

function toImageUrl(match: string): string | undefined {
  const queryStart = match.indexOf('?');

  if (queryStart === -1) {
    const path = match.replace(TRAILING_PUNCTUATION, '');
    return IMAGE_PATH.test(path) ? path : undefined;
  }

  const path = match.slice(0, queryStart);
  if (!IMAGE_PATH.test(path)) {
    return undefined;
  }

  const query = match.slice(queryStart).replace(TRAILING_PUNCTUATION, '');
  return query === '?' ? path : `${path}${query}`;
}

export function extractImageUrls(reply: string, maxResults = 0): string[] {
  if (!Number.isInteger(maxResults) || maxResults < 0) {
    throw new ChatCoreError('INVALID_ARGUMENT', `maxResults must be a non-negative integer, got ${maxResults}`);
  }

  const seen = new Set<string>();
  const urls: string[] = [];

  for (const match of (reply ?? '').matchAll(URL_PATTERN)) {
    const url = toImageUrl(match[0]);

    if (!url || seen.has(url)) {
      continue;
    }

    seen.add(url);
    urls.push(url);

    if (maxResults > 0 && urls.length >= maxResults) {
      break;
    }
  }

  return urls;
}

export function isImageUrl(candidate: string): boolean {
  const trimmed = candidate.trim();
  return extractImageUrls(trimmed, 1)[0] === trimmed;
}
