import { Command } from 'commander';
import { join } from 'path';
import { loadConfig, type Config } from '../config/schema.js';
import { buildNews, type BuildSummary } from '../pipeline/build.js';
import { logger } from '../utils/logger.js';

export function printBuildSummary(summary: BuildSummary): void {
  console.log('\n--- 収集結果 ---');
  for (const result of summary.fetchResults) {
    const errorSuffix = result.errors.length > 0
      ? ` (エラー ${result.errors.length}件)`
      : '';
    console.log(`  ${result.source}: ${result.results.length}件${errorSuffix}`);
  }
  console.log(`\n合計: ${summary.fetched}件取得 → 正規化 ${summary.accepted}件 (除外 ${summary.rejected}件)`);
  if (summary.dateFallbacks > 0) {
    console.log(`  (日付を実行時刻で補完 ${summary.dateFallbacks}件)`);
  }
  if (summary.thumbnails > 0) {
    console.log(`  (サムネイル補完 ${summary.thumbnails}件)`);
  }
  console.log(`アーカイブ: 新規 ${summary.merge.added}件 / 更新 ${summary.merge.enriched}件 / 累計 ${summary.publish.total}件 (${summary.publish.days}日分)`);
}

// ニュース収集を実行して結果を表示する。run コマンドからも使う
export async function runBuild(config: Config, query: string | undefined, now: Date): Promise<BuildSummary> {
  const effectiveQuery = query ?? config.query;
  logger.info(`ビルド開始 (クエリ: ${effectiveQuery || '—'})`);
  const summary = await buildNews(config, { query: effectiveQuery, now });
  printBuildSummary(summary);
  return summary;
}

export function registerBuildCommand(program: Command): void {
  program
    .command('build')
    .description('ソースから記事を収集し items.json とアーカイブを書き出す')
    .option('-c, --config <path>', '設定ファイルパス', 'config.yaml')
    .option('-q, --query <query>', '検索型ソースに渡すクエリ（省略時は設定の query）')
    .addHelpText('after', `
Examples:
  $ beat build                                  設定のクエリで収集
  $ beat build -q "longevity OR aging"          クエリを指定して収集
`)
    .action(async (options: { config: string; query?: string }) => {
      try {
        const config = loadConfig(options.config);
        logger.attachFile(join(config.output.dir, 'data', 'logs.txt'));
        await runBuild(config, options.query, new Date());
      } catch (error) {
        console.error('buildコマンドでエラーが発生しました:', error);
        process.exit(1);
      }
    });
}
