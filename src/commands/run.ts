import { Command } from 'commander';
import { join } from 'path';
import { loadConfig } from '../config/schema.js';
import { runBuild } from './build.js';
import { runCatalog } from './catalog.js';
import { logger } from '../utils/logger.js';

/**
 * カタログを作るかどうか。
 * weeklyOnly のときは UTC の日曜日だけ作る
 */
export function shouldBuildCatalog(buildCatalog: boolean, weeklyOnly: boolean, now: Date): boolean {
  if (!buildCatalog) return false;
  if (!weeklyOnly) return true;
  return now.getUTCDay() === 0;
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('build→catalogのパイプラインを一括実行（定期実行用）')
    .option('-c, --config <path>', '設定ファイルパス', 'config.yaml')
    .option('-q, --query <query>', '検索型ソースに渡すクエリ（省略時は設定の query）')
    .option('--build-catalog', 'カタログも作成する', false)
    .option('--weekly-only', 'カタログ作成を日曜日 (UTC) のみに限定する', false)
    .addHelpText('after', `
Examples:
  $ beat run                                    ニュースのみ収集
  $ beat run --build-catalog                    ニュース収集後にカタログも作成
  $ beat run --build-catalog --weekly-only      カタログは日曜日 (UTC) のみ作成
`)
    .action(async (options: { config: string; query?: string; buildCatalog: boolean; weeklyOnly: boolean }) => {
      try {
        const config = loadConfig(options.config);
        logger.attachFile(join(config.output.dir, 'data', 'logs.txt'));
        const now = new Date();

        // === Step 1: News ===
        console.log('\n[1/2] ニュースを収集中...');
        await runBuild(config, options.query, now);

        // === Step 2: Catalog ===
        if (!options.buildCatalog) {
          console.log('\n[2/2] カタログ作成は指定されていないためスキップします。');
          return;
        }
        if (!shouldBuildCatalog(options.buildCatalog, options.weeklyOnly, now)) {
          logger.info('[catalog] weekly-only 指定のためスキップ（UTCで日曜日ではありません）');
          return;
        }
        console.log('\n[2/2] カタログを作成中...');
        await runCatalog(config);
      } catch (error) {
        console.error('runコマンドでエラーが発生しました:', error);
        process.exit(1);
      }
    });
}
