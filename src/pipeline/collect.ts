import pLimit from 'p-limit';
import type { FetchResult, SourceAdapter } from '../sources/types.js';
import { withTimeout } from '../utils/timeout.js';
import { toErrorMessage } from '../utils/error.js';
import { logger } from '../utils/logger.js';

export interface CollectOptions {
  concurrency: number;
  timeoutMs: number;
}

/**
 * 全アダプタを並行実行する。
 * 失敗・タイムアウトしたソースは結果0件として扱い、他のソースには影響させない。
 * 戻り値はアダプタの並び順（= 設定順）を保つ
 */
export async function collectResults<T>(adapters: SourceAdapter<T>[], options: CollectOptions): Promise<FetchResult<T>[]> {
  const limit = pLimit(options.concurrency);

  const settled = await Promise.allSettled(
    adapters.map(adapter =>
      limit(() => withTimeout(adapter.fetch(), options.timeoutMs, adapter.name)),
    ),
  );

  return settled.map((result, index): FetchResult<T> => {
    const adapter = adapters[index];
    if (result.status === 'fulfilled') {
      const { source, results, errors } = result.value;
      for (const error of errors) {
        logger.warn(`取得エラー ${error}`);
      }
      logger.info(`${source}: ${results.length}件取得`);
      return result.value;
    }
    const message = toErrorMessage(result.reason);
    logger.error(`アダプタ実行エラー ${adapter.name}: ${message}`);
    return { source: adapter.name, results: [], errors: [message] };
  });
}
