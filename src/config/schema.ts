import { z } from 'zod';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { parse } from 'yaml';

// RSSソース設定
const RssSourceSchema = z.object({
  type: z.literal('rss'),
  name: z.string(),
  url: z.string().url(),
});

// Google Newsソース設定（クエリからRSS検索URLを組み立てる）
const GoogleNewsSourceSchema = z.object({
  type: z.literal('googlenews'),
  name: z.string().default('Google News'),
  language: z.string().default('en-IN'),
  region: z.string().default('IN'),
});

// PubMedソース設定
const PubMedSourceSchema = z.object({
  type: z.literal('pubmed'),
  name: z.string().default('PubMed'),
});

// ソース設定の判別共用体
const SourceSchema = z.discriminatedUnion('type', [
  RssSourceSchema,
  GoogleNewsSourceSchema,
  PubMedSourceSchema,
]);

// 収集設定
const FetchSchema = z.object({
  perFeedLimit: z.number().int().positive().default(80),
  maxTotal: z.number().int().positive().default(700),
  timeoutMs: z.number().int().positive().default(25_000),
  concurrency: z.number().int().positive().default(4),
  userAgent: z.string().default('Mozilla/5.0 (compatible; evidence-beat/0.1)'),
});

// 正規化設定
const NormalizeSchema = z.object({
  summaryLength: z.number().int().positive().default(180),
  trackingParams: z.array(z.string()).default(['fbclid', 'gclid', 'mc_cid', 'mc_eid', 'igshid', 'ref_src']),
  httpsHosts: z.array(z.string()).default([]),
});

export const EnrichmentPolicySchema = z.enum(['fill-missing', 'prefer-incoming', 'prefer-longer-summary']);

// サムネイル補完設定
const ThumbnailSchema = z.object({
  budget: z.number().int().nonnegative().default(40),
  timeoutMs: z.number().int().positive().default(8_000),
  concurrency: z.number().int().positive().default(4),
});

// 出力設定
const OutputSchema = z.object({
  dir: z.string().default('output'),
  latestLimit: z.number().int().positive().default(25),
});

const CatalogKindSchema = z.enum(['program', 'expert', 'institution']);

// カタログ用サイト設定
const CatalogSiteSchema = z.object({
  id: z.string(),
  mode: z.enum(['outlinks', 'single']),
  kind: CatalogKindSchema,
  url: z.string().url(),
  container: z.string().optional(),
  name: z.string().optional(),
  location: z.string().optional(),
  description: z.string().optional(),
  category: z.string().optional(),
  specialty: z.string().optional(),
  focus: z.string().optional(),
  tags: z.array(z.string()).default([]),
});

const CatalogSchema = z.object({
  sites: z.array(CatalogSiteSchema).default([]),
  blockedDomains: z.array(z.string()).default([
    'facebook.', 'twitter.', 'x.com', 'instagram.', 'linkedin.', 'pinterest.', 'reddit.',
  ]),
  imageBudget: z.number().int().nonnegative().default(60),
});

// 全体設定スキーマ
export const ConfigSchema = z.object({
  query: z.string().default(''),
  facetsFile: z.string().default('facets.json'),
  sources: z.array(SourceSchema),
  fetch: FetchSchema.default({}),
  normalize: NormalizeSchema.default({}),
  enrichment: z.object({ policy: EnrichmentPolicySchema.default('fill-missing') }).default({}),
  thumbnails: ThumbnailSchema.default({}),
  output: OutputSchema.default({}),
  catalog: CatalogSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type SourceConfig = z.infer<typeof SourceSchema>;
export type RssSourceConfig = z.infer<typeof RssSourceSchema>;
export type GoogleNewsSourceConfig = z.infer<typeof GoogleNewsSourceSchema>;
export type PubMedSourceConfig = z.infer<typeof PubMedSourceSchema>;
export type NormalizeConfig = z.infer<typeof NormalizeSchema>;
export type EnrichmentPolicy = z.infer<typeof EnrichmentPolicySchema>;
export type CatalogKind = z.infer<typeof CatalogKindSchema>;
export type CatalogSiteConfig = z.infer<typeof CatalogSiteSchema>;

// config.yamlを読み込み、zodでバリデーションしてパース済みConfigオブジェクトを返す
// facetsFile は設定ファイルのディレクトリ基準の絶対パスに解決する
export function loadConfig(configPath: string = 'config.yaml'): Config {
  const raw = readFileSync(configPath, 'utf-8');
  const parsed = ConfigSchema.parse(parse(raw));
  return { ...parsed, facetsFile: resolve(dirname(configPath), parsed.facetsFile) };
}
