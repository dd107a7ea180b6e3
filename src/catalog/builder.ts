import type { Config } from '../config/schema.js';
import type { FetchResult, SourceAdapter } from '../sources/types.js';
import type { CatalogDataset, CatalogEntry } from './types.js';
import { CatalogSiteAdapter } from './scraper.js';
import { CatalogStore } from '../store/catalog.js';
import { collectResults } from '../pipeline/collect.js';
import { normalizeLink, type LinkOptions } from '../pipeline/normalize.js';
import { enrichThumbnails, type ImageLookup } from '../pipeline/thumbnails.js';
import { fetchOgImage } from '../sources/og-image.js';
import { logger } from '../utils/logger.js';

export interface CatalogBuildOptions {
  adapters?: SourceAdapter<CatalogEntry>[];
  lookup?: ImageLookup;
}

export interface CatalogBuildSummary {
  fetchResults: FetchResult<CatalogEntry>[];
  collected: number;
  dataset: CatalogDataset;
}

// 種別ごとに独立した名前空間。同じURLでも種別が違えば別項目
export function catalogKey(entry: CatalogEntry, options?: LinkOptions): string | undefined {
  const url = normalizeLink(entry.url, options);
  return url ? `${entry.kind}|${url}` : undefined;
}

// 重複時はタグを統合し、欠けている説明・所在地・画像だけを補う
function mergeEntry(existing: CatalogEntry, incoming: CatalogEntry): CatalogEntry {
  const merged: CatalogEntry = { ...existing, tags: [...new Set([...existing.tags, ...incoming.tags])] };
  if (!merged.description && incoming.description) merged.description = incoming.description;
  if (!merged.location && incoming.location) merged.location = incoming.location;
  if (!merged.image && incoming.image) merged.image = incoming.image;
  return merged;
}

/**
 * (種別, 正規化URL) をキーに重複排除する。初出順を保つ。
 * URLとして解釈できない項目は捨てる
 */
export function dedupeCatalog(entries: CatalogEntry[], options?: LinkOptions): CatalogEntry[] {
  const byKey = new Map<string, CatalogEntry>();
  for (const entry of entries) {
    const key = catalogKey(entry, options);
    if (!key) continue;
    const existing = byKey.get(key);
    byKey.set(key, existing ? mergeEntry(existing, entry) : entry);
  }
  return Array.from(byKey.values());
}

// 種別ごとに振り分け、kind を落とした出力形にする
export function bucketCatalog(entries: CatalogEntry[]): CatalogDataset {
  const dataset: CatalogDataset = { programs: [], experts: [], institutions: [] };
  for (const entry of entries) {
    switch (entry.kind) {
      case 'program': {
        const { kind: _kind, ...rest } = entry;
        dataset.programs.push(rest);
        break;
      }
      case 'expert': {
        const { kind: _kind, ...rest } = entry;
        dataset.experts.push(rest);
        break;
      }
      case 'institution': {
        const { kind: _kind, ...rest } = entry;
        dataset.institutions.push(rest);
        break;
      }
    }
  }
  return dataset;
}

/**
 * カタログ構築パイプライン。
 * 許可されたサイトのみを取得し、重複排除・画像補完のうえ catalog.json を上書きする
 */
export async function buildCatalog(config: Config, options: CatalogBuildOptions = {}): Promise<CatalogBuildSummary> {
  const adapters = options.adapters ?? config.catalog.sites.map(site => new CatalogSiteAdapter(site, {
    timeoutMs: config.fetch.timeoutMs,
    userAgent: config.fetch.userAgent,
    blockedDomains: config.catalog.blockedDomains,
  }));

  const fetchResults = await collectResults(adapters, {
    concurrency: config.fetch.concurrency,
    timeoutMs: config.fetch.timeoutMs,
  });
  const collected = fetchResults.flatMap(r => r.results);
  const deduped = dedupeCatalog(collected, config.normalize);
  logger.info(`[catalog] 重複排除後: ${deduped.length}件 (収集 ${collected.length}件)`);

  const lookup: ImageLookup = options.lookup ?? (url => fetchOgImage(url, {
    timeoutMs: config.thumbnails.timeoutMs,
    userAgent: config.fetch.userAgent,
  }));
  const { items: withImages } = await enrichThumbnails(deduped, entry => entry.url, {
    budget: config.catalog.imageBudget,
    concurrency: config.thumbnails.concurrency,
    lookup,
  });

  const dataset = bucketCatalog(withImages);
  new CatalogStore(config.output.dir).save(dataset);
  logger.info(`[catalog] programs ${dataset.programs.length}件, experts ${dataset.experts.length}件, institutions ${dataset.institutions.length}件を書き出しました`);

  return { fetchResults, collected: collected.length, dataset };
}
