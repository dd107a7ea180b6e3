import { join } from 'path';
import type { Config } from '../config/schema.js';
import type { FetchResult, SourceAdapter } from '../sources/types.js';
import type { Item } from './types.js';
import { createAdapters } from '../sources/registry.js';
import { fetchOgImage } from '../sources/og-image.js';
import { ArchiveStore, type PublishResult } from '../store/archive.js';
import { CatalogStore } from '../store/catalog.js';
import { collectResults } from './collect.js';
import { normalizeResult } from './normalize.js';
import { dedupeItems, type MergeStats } from './dedupe.js';
import { enrichThumbnails, type ImageLookup } from './thumbnails.js';
import { loadFacetDictionaries, type FacetDictionaries } from './facets.js';
import { logger } from '../utils/logger.js';

export interface BuildOptions {
  query: string;
  now: Date;
  adapters?: SourceAdapter[];
  lookup?: ImageLookup;
  dictionaries?: FacetDictionaries;
}

export interface BuildSummary {
  fetchResults: FetchResult[];
  fetched: number;
  accepted: number;
  rejected: number;
  dateFallbacks: number;
  thumbnails: number;
  merge: MergeStats;
  publish: PublishResult;
}

interface NormalizedBatch {
  items: Item[];
  rejected: number;
  dateFallbacks: number;
}

// 取得結果を設定順に正規化する
function normalizeAll(fetchResults: FetchResult[], config: Config, now: Date): NormalizedBatch {
  const items: Item[] = [];
  let rejected = 0;
  let dateFallbacks = 0;

  for (const { results } of fetchResults) {
    for (const raw of results) {
      const result = normalizeResult(raw, now, config.normalize);
      if (!result.ok) {
        rejected++;
        continue;
      }
      if (result.dateFallback) {
        dateFallbacks++;
        logger.warn(`日付${result.dateFallback === 'missing' ? 'なし' : 'の解釈失敗'}のため実行時刻で補完: ${result.item.link}`);
      }
      items.push(result.item);
    }
  }
  return { items, rejected, dateFallbacks };
}

/**
 * ニュース収集パイプライン。
 * 取得 → 正規化 → 重複排除 → サムネイル補完 → アーカイブ更新 → 公開データ書き出し
 */
export async function buildNews(config: Config, options: BuildOptions): Promise<BuildSummary> {
  const { now, query } = options;
  const store = new ArchiveStore(config.output.dir);
  const archived = store.load();
  logger.info(`アーカイブ読み込み: ${archived}件`);

  const adapters = options.adapters ?? createAdapters(config, query);
  const fetchResults = await collectResults(adapters, {
    concurrency: config.fetch.concurrency,
    timeoutMs: config.fetch.timeoutMs,
  });
  const fetched = fetchResults.reduce((sum, r) => sum + r.results.length, 0);

  const normalized = normalizeAll(fetchResults, config, now);
  // 上限は重複排除後のユニーク件数に対して適用する
  const unique = dedupeItems(normalized.items, config.enrichment.policy);
  const batch = unique.slice(0, config.fetch.maxTotal);
  logger.info(`重複排除後: ${unique.length}件${unique.length > batch.length ? ` (上限 ${batch.length}件に切り詰め)` : ''}`);

  // アーカイブ側に既に画像がある記事は問い合わせない
  const lookup: ImageLookup = options.lookup ?? (url => fetchOgImage(url, {
    timeoutMs: config.thumbnails.timeoutMs,
    userAgent: config.fetch.userAgent,
  }));
  const needsImage = batch.filter(item => !item.image && !store.get(item.link)?.image);
  const thumbnails = await enrichThumbnails(needsImage, item => item.link, {
    budget: config.thumbnails.budget,
    concurrency: config.thumbnails.concurrency,
    lookup,
  });
  const withImages = new Map(thumbnails.items.map((item): [string, Item] => [item.link, item]));
  const enrichedBatch = batch.map(item => withImages.get(item.link) ?? item);

  const merge = store.upsert(enrichedBatch, config.enrichment.policy);
  const dictionaries = options.dictionaries ?? loadFacetDictionaries(config.facetsFile);
  const publish = store.publish(now, dictionaries, config.output.latestLimit);
  new CatalogStore(config.output.dir).ensureExists();

  store.appendHistory({
    timestamp: now.toISOString(),
    query,
    fetched,
    accepted: normalized.items.length,
    rejected: normalized.rejected,
    dateFallbacks: normalized.dateFallbacks,
    added: merge.added,
    enriched: merge.enriched,
    total: publish.total,
    failedSources: fetchResults.filter(r => r.errors.length > 0).map(r => r.source),
  });
  logger.info(`${publish.total}件を書き出しました → ${join(store.dataPath, 'items.json')}`);

  return {
    fetchResults,
    fetched,
    accepted: normalized.items.length,
    rejected: normalized.rejected,
    dateFallbacks: normalized.dateFallbacks,
    thumbnails: thumbnails.found,
    merge,
    publish,
  };
}
