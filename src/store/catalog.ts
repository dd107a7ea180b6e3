import { existsSync } from 'fs';
import { join } from 'path';
import type { CatalogDataset } from '../catalog/types.js';
import { writeJsonAtomic } from '../utils/atomic.js';

export const EMPTY_CATALOG: CatalogDataset = { programs: [], experts: [], institutions: [] };

// catalog.json の書き出し。保存は毎回全体を置き換える
export class CatalogStore {
  private readonly filePath: string;

  constructor(outputDir: string = 'output') {
    this.filePath = join(outputDir, 'data', 'catalog.json');
  }

  save(dataset: CatalogDataset): void {
    writeJsonAtomic(this.filePath, dataset);
  }

  // 無ければ空のカタログを置く
  ensureExists(): void {
    if (!existsSync(this.filePath)) {
      this.save(EMPTY_CATALOG);
    }
  }
}
