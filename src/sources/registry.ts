import type { Config } from '../config/schema.js';
import type { SourceAdapter } from './types.js';
import { RssAdapter, type FeedOptions } from './rss.js';
import { googleNewsFeedUrl, pubmedFeedUrl } from './feeds.js';
import { logger } from '../utils/logger.js';

/**
 * ソース設定からアダプタを生成する。順序は設定の記述順を保つ。
 * クエリが空の場合、検索型ソース (googlenews / pubmed) はスキップする
 */
export function createAdapters(config: Config, query: string): SourceAdapter[] {
  const options: FeedOptions = {
    perFeedLimit: config.fetch.perFeedLimit,
    timeoutMs: config.fetch.timeoutMs,
    userAgent: config.fetch.userAgent,
  };
  const trimmed = query.trim();

  const adapters: SourceAdapter[] = [];
  for (const source of config.sources) {
    if (source.type === 'rss') {
      adapters.push(new RssAdapter({ name: source.name, url: source.url }, options));
    } else if (!trimmed) {
      logger.info(`${source.name}: クエリが空のためスキップします`);
    } else if (source.type === 'googlenews') {
      adapters.push(new RssAdapter({ name: source.name, url: googleNewsFeedUrl(trimmed, source) }, options));
    } else if (source.type === 'pubmed') {
      adapters.push(new RssAdapter({ name: source.name, url: pubmedFeedUrl(trimmed) }, options));
    }
  }
  return adapters;
}
