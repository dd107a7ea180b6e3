import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigSchema, type Config } from '../../config/schema.js';
import { bucketCatalog, buildCatalog, catalogKey, dedupeCatalog } from '../builder.js';
import { logger } from '../../utils/logger.js';
import type { FetchResult, SourceAdapter } from '../../sources/types.js';
import type { CatalogEntry } from '../types.js';

function institution(url: string, overrides: Partial<Omit<CatalogEntry, 'kind'>> = {}): CatalogEntry {
  return { kind: 'institution', name: 'Alpha', url, focus: 'Clinic', tags: ['Institution'], ...overrides };
}

class FakeCatalogAdapter implements SourceAdapter<CatalogEntry> {
  constructor(readonly name: string, private readonly results: CatalogEntry[]) {}

  async fetch(): Promise<FetchResult<CatalogEntry>> {
    return { source: this.name, results: this.results, errors: [] };
  }
}

describe('catalogKey', () => {
  it('namespaces the normalized url by kind', () => {
    expect(catalogKey(institution('https://Alpha.com/about/?utm_source=x'))).toBe('institution|https://alpha.com/about');
    expect(catalogKey(institution('not a url'))).toBeUndefined();
  });
});

describe('dedupeCatalog', () => {
  it('merges entries of the same kind and url', () => {
    const entries = dedupeCatalog([
      institution('https://alpha.com/'),
      institution('https://alpha.com', { tags: ['Clinic'], description: 'Longevity clinic', image: 'https://img/a.png' }),
      { kind: 'program', name: 'Alpha', url: 'https://alpha.com', category: 'General', tags: [] },
      institution('mailto:x@alpha.com'),
    ]);

    expect(entries).toEqual([
      institution('https://alpha.com/', {
        tags: ['Institution', 'Clinic'],
        description: 'Longevity clinic',
        image: 'https://img/a.png',
      }),
      { kind: 'program', name: 'Alpha', url: 'https://alpha.com', category: 'General', tags: [] },
    ]);
  });
});

describe('bucketCatalog', () => {
  it('groups entries by kind and drops the kind field', () => {
    const dataset = bucketCatalog([
      institution('https://alpha.com'),
      { kind: 'expert', name: 'Dr B', url: 'https://b.com', specialty: 'Geriatrics', tags: [] },
    ]);
    expect(dataset).toEqual({
      programs: [],
      experts: [{ name: 'Dr B', url: 'https://b.com', specialty: 'Geriatrics', tags: [] }],
      institutions: [{ name: 'Alpha', url: 'https://alpha.com', focus: 'Clinic', tags: ['Institution'] }],
    });
  });
});

describe('buildCatalog', () => {
  let dir: string;
  let config: Config;

  beforeEach(() => {
    logger.setLevel('error');
    dir = mkdtempSync(join(tmpdir(), 'beat-catalog-'));
    config = ConfigSchema.parse({ sources: [], output: { dir }, catalog: { imageBudget: 1 } });
  });

  afterEach(() => {
    logger.setLevel('info');
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes the deduplicated catalog with images within budget', async () => {
    const lookup = vi.fn(async (url: string) => `${url}/og.png`);
    const summary = await buildCatalog(config, {
      adapters: [
        new FakeCatalogAdapter('a', [institution('https://alpha.com'), institution('https://beta.com', { name: 'Beta' })]),
        new FakeCatalogAdapter('b', [institution('https://alpha.com/')]),
      ],
      lookup,
    });

    expect(summary.collected).toBe(3);
    expect(lookup).toHaveBeenCalledTimes(1);
    const written: unknown = JSON.parse(readFileSync(join(dir, 'data', 'catalog.json'), 'utf-8'));
    expect(written).toEqual({
      programs: [],
      experts: [],
      institutions: [
        { name: 'Alpha', url: 'https://alpha.com', focus: 'Clinic', tags: ['Institution'], image: 'https://alpha.com/og.png' },
        { name: 'Beta', url: 'https://beta.com', focus: 'Clinic', tags: ['Institution'] },
      ],
    });
  });
});
