import type { GoogleNewsSourceConfig } from '../config/schema.js';

// Google News のRSS検索URL
export function googleNewsFeedUrl(query: string, config: Pick<GoogleNewsSourceConfig, 'language' | 'region'>): string {
  const lang = config.language.split('-')[0];
  return `https://news.google.com/rss/search?q=${encodeURIComponent(query)}&hl=${config.language}&gl=${config.region}&ceid=${config.region}:${lang}`;
}

// PubMed の検索結果RSS（新しい順）
export function pubmedFeedUrl(query: string): string {
  return `https://eutils.ncbi.nlm.nih.gov/entrez/eutils/erss.cgi?db=pubmed&term=${encodeURIComponent(query)}&sort=date`;
}
