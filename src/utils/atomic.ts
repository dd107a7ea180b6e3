import { mkdirSync, renameSync, writeFileSync } from 'fs';
import { dirname } from 'path';

/**
 * 一時ファイルに書き出してから rename で置き換える。
 * 書き込み途中のJSONが配信されることはない
 */
export function writeJsonAtomic(filePath: string, data: unknown): void {
  mkdirSync(dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  writeFileSync(tmpPath, JSON.stringify(data, null, 2), 'utf-8');
  renameSync(tmpPath, filePath);
}
