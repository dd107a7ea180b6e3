import { Command } from 'commander';
import { join } from 'path';
import { loadConfig, type Config } from '../config/schema.js';
import { buildCatalog, type CatalogBuildSummary } from '../catalog/builder.js';
import { logger } from '../utils/logger.js';

export async function runCatalog(config: Config): Promise<CatalogBuildSummary> {
  const summary = await buildCatalog(config);

  console.log('\n--- カタログ収集結果 ---');
  for (const result of summary.fetchResults) {
    const errorSuffix = result.errors.length > 0
      ? ` (エラー ${result.errors.length}件)`
      : '';
    console.log(`  ${result.source}: ${result.results.length}件${errorSuffix}`);
  }
  const { programs, experts, institutions } = summary.dataset;
  console.log(`\n合計: ${summary.collected}件 → programs ${programs.length} / experts ${experts.length} / institutions ${institutions.length}`);
  return summary;
}

export function registerCatalogCommand(program: Command): void {
  program
    .command('catalog')
    .description('許可されたサイトからプログラム・専門家・機関のカタログを作成する')
    .option('-c, --config <path>', '設定ファイルパス', 'config.yaml')
    .addHelpText('after', `
Examples:
  $ beat catalog                デフォルト設定でカタログを作成
`)
    .action(async (options: { config: string }) => {
      try {
        const config = loadConfig(options.config);
        logger.attachFile(join(config.output.dir, 'data', 'logs.txt'));
        await runCatalog(config);
      } catch (error) {
        console.error('catalogコマンドでエラーが発生しました:', error);
        process.exit(1);
      }
    });
}
