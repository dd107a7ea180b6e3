import * as cheerio from 'cheerio';
import type { CatalogSiteConfig } from '../config/schema.js';
import type { FetchResult, SourceAdapter } from '../sources/types.js';
import type { CatalogEntry } from './types.js';
import { fetchText } from '../utils/http.js';
import { toErrorMessage } from '../utils/error.js';

const MAX_NAME_LENGTH = 120;

export const DEFAULT_CATEGORY = 'General';
export const DEFAULT_SPECIALTY = 'General';
export const DEFAULT_FOCUS = 'Longevity / Clinic / Biotech';

export interface CatalogFetchOptions {
  timeoutMs: number;
  userAgent: string;
  blockedDomains: string[];
}

export function domainOf(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return '';
  }
}

// アンカーテキストを名前に使う。URLそのものや空ならドメイン名で代用
export function guessName(anchorText: string, href: string): string {
  const text = anchorText.replace(/\s+/g, ' ').trim().slice(0, MAX_NAME_LENGTH);
  if (text && !/^https?:\/\//i.test(text)) return text;
  const domain = domainOf(href).replace(/^www\./, '');
  return domain || href;
}

/**
 * サイト設定の種別に応じたカタログ項目を作る。
 * 種別固有の属性は設定値、無ければ既定値
 */
export function makeEntry(site: CatalogSiteConfig, name: string, url: string): CatalogEntry {
  const base = {
    name,
    url,
    tags: [...new Set(site.tags)],
    ...(site.description ? { description: site.description } : {}),
    ...(site.location ? { location: site.location } : {}),
  };
  switch (site.kind) {
    case 'program':
      return { ...base, kind: 'program', category: site.category ?? DEFAULT_CATEGORY };
    case 'expert':
      return { ...base, kind: 'expert', specialty: site.specialty ?? DEFAULT_SPECIALTY };
    case 'institution':
      return { ...base, kind: 'institution', focus: site.focus ?? DEFAULT_FOCUS };
  }
}

/**
 * 一覧ページから外部サイトへのリンクを項目として抜き出す。
 * container のセレクタを先頭から試し、最初に見つかった要素の中だけを対象にする
 */
export function extractOutlinks(site: CatalogSiteConfig, html: string, blockedDomains: string[]): CatalogEntry[] {
  const $ = cheerio.load(html);
  const pageDomain = domainOf(site.url);

  const selectors = (site.container ?? '').split(',').map(s => s.trim()).filter(Boolean);
  const container = selectors.find(selector => $(selector).length > 0);
  const anchors = container ? $(container).first().find('a[href]') : $('a[href]');

  const entries: CatalogEntry[] = [];
  const seen = new Set<string>();
  for (const element of anchors.toArray()) {
    const anchor = $(element);
    const rawHref = anchor.attr('href');
    if (!rawHref) continue;

    let href: string;
    try {
      href = new URL(rawHref, site.url).toString();
    } catch {
      continue;
    }
    const domain = domainOf(href);
    if (!domain || domain === pageDomain) continue;
    if (blockedDomains.some(blocked => domain.includes(blocked))) continue;

    const key = href.split('#')[0];
    if (seen.has(key)) continue;
    seen.add(key);

    entries.push(makeEntry(site, guessName(anchor.text(), href), key));
  }
  return entries;
}

export function singleEntry(site: CatalogSiteConfig): CatalogEntry {
  const name = site.name ?? (domainOf(site.url).replace(/^www\./, '') || site.url);
  return makeEntry(site, name, site.url);
}

// カタログ用サイト1件分のアダプタ
export class CatalogSiteAdapter implements SourceAdapter<CatalogEntry> {
  constructor(
    private readonly site: CatalogSiteConfig,
    private readonly options: CatalogFetchOptions,
  ) {}

  get name(): string {
    return this.site.id;
  }

  async fetch(): Promise<FetchResult<CatalogEntry>> {
    if (this.site.mode === 'single') {
      return { source: this.site.id, results: [singleEntry(this.site)], errors: [] };
    }

    try {
      const html = await fetchText(this.site.url, this.options);
      const results = extractOutlinks(this.site, html, this.options.blockedDomains);
      return { source: this.site.id, results, errors: [] };
    } catch (error) {
      return { source: this.site.id, results: [], errors: [`${this.site.id}: ${toErrorMessage(error)}`] };
    }
  }
}
