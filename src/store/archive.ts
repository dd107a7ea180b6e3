import { readFileSync, readdirSync, mkdirSync, existsSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import type { EnrichmentPolicy } from '../config/schema.js';
import type { Item, PublishedItem } from '../pipeline/types.js';
import { upsertItems, type MergeStats } from '../pipeline/dedupe.js';
import { classifyItem, type FacetDictionaries } from '../pipeline/facets.js';
import { isItemNew } from '../pipeline/recency.js';
import { dayOf } from '../pipeline/dates.js';
import { writeJsonAtomic } from '../utils/atomic.js';
import { logger } from '../utils/logger.js';
import { toErrorMessage } from '../utils/error.js';

const ItemRecordSchema = z.object({
  title: z.string().min(1),
  link: z.string().min(1),
  summary: z.string().optional(),
  image: z.string().optional(),
  source: z.string(),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}/),
});

const HistoryRecordSchema = z.object({
  timestamp: z.string(),
  query: z.string(),
  fetched: z.number(),
  accepted: z.number(),
  rejected: z.number(),
  dateFallbacks: z.number(),
  added: z.number(),
  enriched: z.number(),
  total: z.number(),
  failedSources: z.array(z.string()),
});

export type HistoryRecord = z.infer<typeof HistoryRecordSchema>;

export interface ArchiveIndexEntry {
  day: string;
  count: number;
}

// 検索語・期間 (YYYY-MM-DD, 両端含む) による絞り込み条件
export interface ViewFilter {
  query?: string;
  from?: string;
  to?: string;
}

export interface PublishResult {
  total: number;
  latest: number;
  days: number;
}

// 日付の新しい順、同時刻ならリンク昇順
export function compareByRecency(a: Item, b: Item): number {
  if (a.date !== b.date) return a.date < b.date ? 1 : -1;
  if (a.link === b.link) return 0;
  return a.link < b.link ? -1 : 1;
}

function isFilterActive(filter: ViewFilter | undefined): filter is ViewFilter {
  return Boolean(filter && (filter.query?.trim() || filter.from || filter.to));
}

function matchesFilter(item: Item, filter: ViewFilter): boolean {
  const term = filter.query?.trim().toLowerCase();
  if (term) {
    const text = `${item.title} ${item.summary ?? ''}`.toLowerCase();
    if (!text.includes(term)) return false;
  }
  const day = dayOf(item.date);
  if (filter.from && day < filter.from) return false;
  if (filter.to && day > filter.to) return false;
  return true;
}

/**
 * 記事アーカイブ。link をキーとするマップを唯一の所有者として更新し、
 * 日別パーティションと公開用データセットを書き出す
 */
export class ArchiveStore {
  private readonly dataDir: string;
  private readonly archiveDir: string;
  private readonly items = new Map<string, Item>();
  private readonly invalidRecords = new Map<string, unknown[]>();
  private readonly unreadableDays = new Set<string>();

  constructor(outputDir: string = 'output') {
    this.dataDir = join(outputDir, 'data');
    this.archiveDir = join(this.dataDir, 'archive');
    this.ensureDirs();
  }

  private ensureDirs(): void {
    if (!existsSync(this.archiveDir)) {
      mkdirSync(this.archiveDir, { recursive: true });
    }
  }

  get dataPath(): string {
    return this.dataDir;
  }

  /**
   * 日別パーティションを全て読み込む。
   * 不正なレコードはその1件だけを読み飛ばし、書き戻し時にそのまま残す。
   * JSONとして読めないファイルは以後書き換えない
   */
  load(): number {
    const files = readdirSync(this.archiveDir)
      .filter(name => /^\d{4}-\d{2}-\d{2}\.json$/.test(name))
      .sort();

    for (const file of files) {
      const day = file.slice(0, 10);
      let records: unknown;
      try {
        records = JSON.parse(readFileSync(join(this.archiveDir, file), 'utf-8'));
      } catch (error) {
        this.unreadableDays.add(day);
        logger.error(`archive/${file} のJSONパースに失敗しました: ${toErrorMessage(error)}`);
        continue;
      }
      if (!Array.isArray(records)) {
        this.unreadableDays.add(day);
        logger.error(`archive/${file} が配列ではありません`);
        continue;
      }

      const invalid: unknown[] = [];
      records.forEach((record: unknown, index) => {
        const parsed = ItemRecordSchema.safeParse(record);
        if (!parsed.success) {
          invalid.push(record);
          logger.error(`archive/${file} の${index}件目の形式が不正です: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
          return;
        }
        // 既に読み込んだ同一リンクは上書きしない（最初の日付を維持）
        if (!this.items.has(parsed.data.link)) {
          this.items.set(parsed.data.link, parsed.data);
        }
      });
      if (invalid.length > 0) {
        this.invalidRecords.set(day, invalid);
      }
    }
    return this.items.size;
  }

  upsert(batch: Item[], policy: EnrichmentPolicy = 'fill-missing'): MergeStats {
    return upsertItems(this.items, batch, policy);
  }

  get(link: string): Item | undefined {
    return this.items.get(link);
  }

  // 全件を新しい順で返す
  all(): Item[] {
    return Array.from(this.items.values()).sort(compareByRecency);
  }

  /**
   * トップページ用の最新 limit 件。
   * 検索語・期間のいずれかが指定されていれば、一致する全件を件数制限なしでアーカイブ順に返す
   */
  latestView(limit: number, filter?: ViewFilter): Item[] {
    if (isFilterActive(filter)) {
      const active: ViewFilter = filter;
      return Array.from(this.items.values()).filter(item => matchesFilter(item, active));
    }
    return this.all().slice(0, limit);
  }

  // 日別に分割する。各日の中は新しい順
  partitions(): Map<string, Item[]> {
    const byDay = new Map<string, Item[]>();
    for (const item of this.all()) {
      const day = dayOf(item.date);
      const bucket = byDay.get(day);
      if (bucket) {
        bucket.push(item);
      } else {
        byDay.set(day, [item]);
      }
    }
    return byDay;
  }

  // 公開用にファセットと新着フラグを付与する
  decorate(item: Item, now: Date, dictionaries: FacetDictionaries): PublishedItem {
    return {
      ...item,
      ...classifyItem(item, dictionaries),
      is_new: isItemNew(item, now),
    };
  }

  /**
   * アーカイブのパーティション・索引と items.json / latest.json を書き出す。
   * いずれもアトミックに置き換える。読み込み時に不正だったレコードはパーティションに残す
   */
  publish(now: Date, dictionaries: FacetDictionaries, latestLimit: number): PublishResult {
    const byDay = this.partitions();
    const index: ArchiveIndexEntry[] = [];
    for (const [day, items] of byDay) {
      index.push({ day, count: items.length });
      if (this.unreadableDays.has(day)) {
        logger.warn(`archive/${day}.json は読み込めなかったため書き換えません`);
        continue;
      }
      writeJsonAtomic(join(this.archiveDir, `${day}.json`), [...items, ...(this.invalidRecords.get(day) ?? [])]);
    }
    writeJsonAtomic(join(this.archiveDir, 'index.json'), index);

    const published = this.all().map(item => this.decorate(item, now, dictionaries));
    writeJsonAtomic(join(this.dataDir, 'items.json'), published);

    const latest = this.latestView(latestLimit).map(item => this.decorate(item, now, dictionaries));
    writeJsonAtomic(join(this.dataDir, 'latest.json'), latest);

    return { total: published.length, latest: latest.length, days: index.length };
  }

  loadHistory(): HistoryRecord[] {
    const filePath = join(this.dataDir, 'history.json');
    if (!existsSync(filePath)) {
      return [];
    }
    try {
      return z.array(HistoryRecordSchema).parse(JSON.parse(readFileSync(filePath, 'utf-8')));
    } catch (error) {
      logger.error(`history.json の読み込みに失敗しました: ${toErrorMessage(error)}`);
      return [];
    }
  }

  // 実行履歴をJSONファイルに追記保存
  appendHistory(record: HistoryRecord): void {
    const existing = this.loadHistory();
    existing.push(record);
    writeJsonAtomic(join(this.dataDir, 'history.json'), existing);
  }
}
