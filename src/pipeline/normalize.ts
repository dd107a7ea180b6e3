import type { RawResult } from '../sources/types.js';
import type { Item } from './types.js';
import { formatItemDate, parsePublishedAt } from './dates.js';

export interface NormalizeOptions {
  summaryLength: number;
  trackingParams: string[];      // utm_* は常に除去される
  httpsHosts: string[];          // http でも https にリダイレクトされることが分かっているホスト
}

export const DEFAULT_NORMALIZE_OPTIONS: NormalizeOptions = {
  summaryLength: 180,
  trackingParams: ['fbclid', 'gclid', 'mc_cid', 'mc_eid', 'igshid', 'ref_src'],
  httpsHosts: [],
};

export type LinkOptions = Pick<NormalizeOptions, 'trackingParams' | 'httpsHosts'>;

export type DateFallback = 'missing' | 'unparsable';

export type NormalizeResult =
  | { ok: true; item: Item; dateFallback?: DateFallback }
  | { ok: false; reason: 'missing-title' | 'missing-link' | 'invalid-link' };

// HTMLタグを除去し、空白を1つにまとめる
export function cleanText(value: string | undefined): string {
  if (!value) return '';
  return value.replace(/<[^>]*>/g, ' ').replace(/\s+/g, ' ').trim();
}

/**
 * サマリーを表示用の長さに切り詰める。
 * 可能なら単語の途中では切らず、末尾に … を付ける。空なら undefined
 */
export function truncateSummary(value: string | undefined, maxLength: number): string | undefined {
  const text = cleanText(value);
  if (!text) return undefined;
  if (text.length <= maxLength) return text;

  const head = text.slice(0, maxLength);
  const lastSpace = head.lastIndexOf(' ');
  const cut = lastSpace > 0 ? head.slice(0, lastSpace) : head;
  return cut.replace(/[\s,;:.-]+$/, '') + '…';
}

/**
 * リンクを正規化して同一性キーにする。
 * ホスト小文字化・フラグメント除去・トラッキングパラメータ除去・末尾スラッシュ除去を行う。
 * http(s) として解釈できなければ undefined
 */
export function normalizeLink(
  link: string,
  options: LinkOptions = DEFAULT_NORMALIZE_OPTIONS,
): string | undefined {
  let url: URL;
  try {
    url = new URL(link.trim());
  } catch {
    return undefined;
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') return undefined;

  const host = url.host.toLowerCase();
  const hostname = url.hostname.replace(/^www\./, '');
  const upgrade = url.protocol === 'http:'
    && options.httpsHosts.some(h => h.toLowerCase().replace(/^www\./, '') === hostname);
  const protocol = upgrade ? 'https:' : url.protocol;

  const tracking = new Set(options.trackingParams.map(p => p.toLowerCase()));
  const params = Array.from(url.searchParams.entries()).filter(([key]) => {
    const lower = key.toLowerCase();
    return !lower.startsWith('utm_') && !tracking.has(lower);
  });
  const search = params.length > 0 ? '?' + new URLSearchParams(params).toString() : '';

  const path = url.pathname.replace(/\/+$/, '');
  return `${protocol}//${host}${path}${search}`;
}

/**
 * 生の検索結果を正規化済み Item に変換する。
 * now は日付欠損・解釈不能時のフォールバックに使う
 */
export function normalizeResult(
  raw: RawResult,
  now: Date,
  options: NormalizeOptions = DEFAULT_NORMALIZE_OPTIONS,
): NormalizeResult {
  const title = cleanText(raw.title);
  if (!title) return { ok: false, reason: 'missing-title' };

  const rawLink = raw.link?.trim();
  if (!rawLink) return { ok: false, reason: 'missing-link' };
  const link = normalizeLink(rawLink, options);
  if (!link) return { ok: false, reason: 'invalid-link' };

  let date: Date = now;
  let dateFallback: DateFallback | undefined;
  if (raw.publishedAt === undefined || raw.publishedAt === '') {
    dateFallback = 'missing';
  } else {
    const parsed = parsePublishedAt(raw.publishedAt);
    if (parsed) {
      date = parsed;
    } else {
      dateFallback = 'unparsable';
    }
  }

  const item: Item = {
    title,
    link,
    source: cleanText(raw.sourceName) || 'Unknown',
    date: formatItemDate(date),
  };
  const summary = truncateSummary(raw.summary, options.summaryLength);
  if (summary) item.summary = summary;
  const image = raw.image?.trim();
  if (image) item.image = image;

  return dateFallback ? { ok: true, item, dateFallback } : { ok: true, item };
}
