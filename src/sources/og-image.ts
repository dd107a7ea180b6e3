import * as cheerio from 'cheerio';
import { fetchText, type FetchTextOptions } from '../utils/http.js';

const META_SELECTORS = [
  'meta[property="og:image"]',
  'meta[property="og:image:url"]',
  'meta[name="twitter:image"]',
];

const SKIPPED_IMAGE_MARKERS = ['data:', 'sprite', 'pixel', 'base64'];

function resolveUrl(value: string, base: string): string | undefined {
  try {
    return new URL(value.trim(), base).toString();
  } catch {
    return undefined;
  }
}

/**
 * ページHTMLから代表画像を取り出す。
 * og:image 系メタタグを優先し、無ければ最初の妥当な <img src> を使う
 */
export function extractOgImage(html: string, pageUrl: string): string | undefined {
  const $ = cheerio.load(html);

  for (const selector of META_SELECTORS) {
    const content = $(selector).first().attr('content');
    if (content?.trim()) {
      const resolved = resolveUrl(content, pageUrl);
      if (resolved) return resolved;
    }
  }

  for (const element of $('img[src]').toArray()) {
    const src = $(element).attr('src');
    if (!src) continue;
    const resolved = resolveUrl(src, pageUrl);
    if (!resolved) continue;
    if (SKIPPED_IMAGE_MARKERS.some(marker => resolved.includes(marker))) continue;
    return resolved;
  }
  return undefined;
}

// ページを取得して代表画像URLを返す。取得失敗は例外
export async function fetchOgImage(pageUrl: string, options: FetchTextOptions): Promise<string | undefined> {
  const html = await fetchText(pageUrl, options);
  return extractOgImage(html, pageUrl);
}
