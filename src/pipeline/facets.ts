import { readFileSync } from 'fs';
import { z } from 'zod';
import type { FacetLabels, Item } from './types.js';

// ラベル → キーワード一覧。宣言順がそのまま出力順になる
export type FacetDictionary = ReadonlyArray<{ label: string; keywords: string[] }>;

export interface FacetDictionaries {
  topics: FacetDictionary;
  disciplines: FacetDictionary;
  areas: FacetDictionary;
}

const DictionarySchema = z.record(z.string(), z.array(z.string().min(1)));

const DictionariesFileSchema = z.object({
  topics: DictionarySchema,
  disciplines: DictionarySchema,
  areas: DictionarySchema,
});

// キーワードは小文字化して保持する（照合対象も小文字化されるため）
export function toDictionary(record: Record<string, string[]>): FacetDictionary {
  return Object.entries(record).map(([label, keywords]) => ({
    label,
    keywords: keywords.map(keyword => keyword.toLowerCase()),
  }));
}

export function parseFacetDictionaries(raw: unknown): FacetDictionaries {
  const parsed = DictionariesFileSchema.parse(raw);
  return {
    topics: toDictionary(parsed.topics),
    disciplines: toDictionary(parsed.disciplines),
    areas: toDictionary(parsed.areas),
  };
}

// facets.json を読み込む
export function loadFacetDictionaries(filePath: string): FacetDictionaries {
  const raw: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
  return parseFacetDictionaries(raw);
}

export function searchableText(item: Pick<Item, 'title' | 'summary' | 'source'>): string {
  return `${item.title} ${item.summary ?? ''} ${item.source}`.toLowerCase();
}

/**
 * いずれかのキーワードを部分文字列として含むラベルを辞書順で返す。
 * 単語境界は見ないため、"ai" が "said" に一致するような誤検出は許容している
 */
export function classify(text: string, dictionary: FacetDictionary): string[] {
  const haystack = text.toLowerCase();
  return dictionary
    .filter(({ keywords }) => keywords.some(keyword => haystack.includes(keyword)))
    .map(({ label }) => label);
}

// 3つのファセットをそれぞれ独立に判定する
export function classifyItem(
  item: Pick<Item, 'title' | 'summary' | 'source'>,
  dictionaries: FacetDictionaries,
): FacetLabels {
  const text = searchableText(item);
  return {
    topics: classify(text, dictionaries.topics),
    disciplines: classify(text, dictionaries.disciplines),
    areas: classify(text, dictionaries.areas),
  };
}
