import { toErrorMessage } from '../utils/error.js';
import { logger } from '../utils/logger.js';

export type ImageLookup = (pageUrl: string) => Promise<string | undefined>;

export interface ThumbnailOptions {
  budget: number;                // 画像が見つかった件数の上限
  concurrency: number;
  lookup: ImageLookup;
}

/**
 * 画像の無い要素について、ページの og:image を補完する。
 * 先頭から順に concurrency 件ずつ問い合わせ、budget 件見つかった時点で打ち切る。
 * 失敗した要素は画像なしのまま残す
 */
export async function enrichThumbnails<T extends { image?: string }>(
  items: T[],
  urlOf: (item: T) => string,
  options: ThumbnailOptions,
): Promise<{ items: T[]; found: number }> {
  const candidates = items.flatMap((item, index) => (item.image ? [] : [index]));
  const images = new Map<number, string>();
  let remaining = options.budget;
  let cursor = 0;

  while (remaining > 0 && cursor < candidates.length) {
    const window = candidates.slice(cursor, cursor + Math.min(options.concurrency, remaining));
    cursor += window.length;

    const found = await Promise.all(window.map(async index => {
      const url = urlOf(items[index]);
      try {
        return await options.lookup(url);
      } catch (error) {
        logger.debug(`OG画像の取得に失敗 ${url}: ${toErrorMessage(error)}`);
        return undefined;
      }
    }));

    found.forEach((image, i) => {
      if (image && remaining > 0) {
        images.set(window[i], image);
        remaining--;
      }
    });
  }

  return {
    items: items.map((item, index) => {
      const image = images.get(index);
      return image ? { ...item, image } : item;
    }),
    found: images.size,
  };
}
