import type { EnrichmentPolicy } from '../config/schema.js';
import type { Item } from './types.js';

export interface MergeStats {
  added: number;
  enriched: number;
  unchanged: number;
}

function pickImage(existing: Item, incoming: Item, policy: EnrichmentPolicy): string | undefined {
  if (!incoming.image) return existing.image;
  if (policy === 'prefer-incoming') return incoming.image;
  return existing.image ?? incoming.image;
}

function pickSummary(existing: Item, incoming: Item, policy: EnrichmentPolicy): string | undefined {
  if (!incoming.summary) return existing.summary;
  if (!existing.summary) return incoming.summary;
  switch (policy) {
    case 'prefer-incoming':
      return incoming.summary;
    case 'prefer-longer-summary':
      return incoming.summary.length > existing.summary.length ? incoming.summary : existing.summary;
    case 'fill-missing':
      return existing.summary;
  }
}

/**
 * 同一リンクの2件をマージする。
 * 日付・タイトル・ソースは先に見つかった existing を維持し、
 * image / summary のみポリシーに従って補完する。既存の値が消えることはない
 */
export function mergeItem(existing: Item, incoming: Item, policy: EnrichmentPolicy = 'fill-missing'): Item {
  const merged: Item = { ...existing };
  const image = pickImage(existing, incoming, policy);
  const summary = pickSummary(existing, incoming, policy);
  if (image) merged.image = image;
  if (summary) merged.summary = summary;
  return merged;
}

function sameEnrichment(a: Item, b: Item): boolean {
  return a.image === b.image && a.summary === b.summary;
}

/**
 * バッチを link をキーとするマップへ順番に upsert する。
 * バッチ内の重複も同じ規則で左から順に解決される
 */
export function upsertItems(
  store: Map<string, Item>,
  batch: Item[],
  policy: EnrichmentPolicy = 'fill-missing',
): MergeStats {
  const stats: MergeStats = { added: 0, enriched: 0, unchanged: 0 };
  for (const incoming of batch) {
    const existing = store.get(incoming.link);
    if (!existing) {
      store.set(incoming.link, { ...incoming });
      stats.added++;
      continue;
    }
    const merged = mergeItem(existing, incoming, policy);
    if (sameEnrichment(existing, merged)) {
      stats.unchanged++;
    } else {
      store.set(incoming.link, merged);
      stats.enriched++;
    }
  }
  return stats;
}

// 単一バッチの重複排除。初出順を保つ
export function dedupeItems(batch: Item[], policy: EnrichmentPolicy = 'fill-missing'): Item[] {
  const store = new Map<string, Item>();
  upsertItems(store, batch, policy);
  return Array.from(store.values());
}
