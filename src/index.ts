#!/usr/bin/env -S node --import tsx/esm
import { config } from 'dotenv';
config({ path: '.env.local' });
config({ path: '.env' });

import { Command } from 'commander';
import { loadConfig } from './config/schema.js';
import { registerBuildCommand } from './commands/build.js';
import { registerCatalogCommand } from './commands/catalog.js';
import { registerRunCommand } from './commands/run.js';

const program = new Command();

program
  .name('beat')
  .description('科学・健康ニュースとエビデンスを収集し、静的JSONデータセットを生成するCLIツール')
  .version('0.1.0');

// sourcesコマンド: 登録ソース一覧表示
program
  .command('sources')
  .description('登録されているソース一覧を表示')
  .option('-c, --config <path>', '設定ファイルパス', 'config.yaml')
  .addHelpText('after', `
Examples:
  $ beat sources                デフォルト設定のソース一覧
  $ beat sources -c custom.yaml カスタム設定ファイル
`)
  .action((options: { config: string }) => {
    try {
      const config = loadConfig(options.config);
      console.log('登録ソース一覧:');
      config.sources.forEach((source, index) => {
        if (source.type === 'rss') {
          console.log(`  ${index + 1}. [RSS] ${source.name} - ${source.url}`);
        } else if (source.type === 'googlenews') {
          console.log(`  ${index + 1}. [GoogleNews] ${source.name} (言語: ${source.language}, 地域: ${source.region})`);
        } else if (source.type === 'pubmed') {
          console.log(`  ${index + 1}. [PubMed] ${source.name}`);
        }
      });
      console.log(`\nデフォルトクエリ: ${config.query || '—'}`);
      console.log(`\nカタログ対象サイト:`);
      config.catalog.sites.forEach((site, index) => {
        console.log(`  ${index + 1}. [${site.kind}/${site.mode}] ${site.id} - ${site.url}`);
      });
    } catch (error) {
      console.error('設定ファイルの読み込みに失敗しました:', error);
      process.exit(1);
    }
  });

registerBuildCommand(program);
registerCatalogCommand(program);
registerRunCommand(program);

program.addHelpText('after', `
Examples:
  $ beat build                  ニュースを収集して items.json を生成
  $ beat catalog                catalog.json を生成
  $ beat run --build-catalog    全パイプラインを一括実行
  $ beat sources                ソース一覧を表示
`);

await program.parseAsync();
