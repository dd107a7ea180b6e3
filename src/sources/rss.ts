import Parser from 'rss-parser';
import type { SourceAdapter, FetchResult, RawResult } from './types.js';
import { fetchText } from '../utils/http.js';
import { toErrorMessage } from '../utils/error.js';

export interface FeedTarget {
  name: string;
  url: string;
}

export interface FeedOptions {
  perFeedLimit: number;
  timeoutMs: number;
  userAgent: string;
}

interface MediaFields {
  mediaThumbnail?: unknown;
  mediaContent?: unknown;
}

const parser = new Parser<Record<string, unknown>, MediaFields>({
  customFields: {
    item: [
      ['media:thumbnail', 'mediaThumbnail'],
      ['media:content', 'mediaContent'],
    ],
  },
});

// <media:thumbnail url="..."/> は { $: { url } } として渡ってくる
function mediaUrl(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null || !('$' in value)) return undefined;
  const attrs = value.$;
  if (typeof attrs !== 'object' || attrs === null || !('url' in attrs)) return undefined;
  return typeof attrs.url === 'string' ? attrs.url : undefined;
}

type FeedItem = Parser.Item & MediaFields;

function imageOf(item: FeedItem): string | undefined {
  const enclosure = item.enclosure;
  if (enclosure?.url && (enclosure.type ?? '').startsWith('image/')) {
    return enclosure.url;
  }
  return mediaUrl(item.mediaThumbnail) ?? mediaUrl(item.mediaContent);
}

/**
 * RSS / Atom フィードのアダプタ。
 * Google News・PubMed もURLを組み立ててこのアダプタで取得する
 */
export class RssAdapter implements SourceAdapter {
  constructor(
    private readonly target: FeedTarget,
    private readonly options: FeedOptions,
  ) {}

  get name(): string {
    return this.target.name;
  }

  async fetch(): Promise<FetchResult> {
    const errors: string[] = [];
    const results: RawResult[] = [];

    try {
      const xml = await fetchText(this.target.url, this.options);
      const feed = await parser.parseString(xml);

      for (const item of feed.items.slice(0, this.options.perFeedLimit)) {
        results.push({
          title: item.title,
          link: item.link ?? item.guid,
          summary: item.contentSnippet ?? item.summary ?? item.content,
          image: imageOf(item),
          // isoDate はローカル時刻で解釈済みのため、元の文字列を優先する
          publishedAt: item.pubDate ?? item.isoDate,
          sourceName: this.target.name,
        });
      }
    } catch (error) {
      errors.push(`${this.target.name}: ${toErrorMessage(error)}`);
    }

    return {
      source: this.target.name,
      results,
      errors,
    };
  }
}
