import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { ConfigSchema, loadConfig } from '../schema.js';

describe('ConfigSchema', () => {
  it('fills defaults for omitted sections', () => {
    const config = ConfigSchema.parse({ sources: [] });
    expect(config.query).toBe('');
    expect(config.fetch).toMatchObject({ perFeedLimit: 80, maxTotal: 700, concurrency: 4 });
    expect(config.normalize.summaryLength).toBe(180);
    expect(config.enrichment.policy).toBe('fill-missing');
    expect(config.output).toEqual({ dir: 'output', latestLimit: 25 });
    expect(config.catalog.imageBudget).toBe(60);
  });

  it('applies source defaults', () => {
    const config = ConfigSchema.parse({ sources: [{ type: 'googlenews' }, { type: 'pubmed' }] });
    expect(config.sources).toEqual([
      { type: 'googlenews', name: 'Google News', language: 'en-IN', region: 'IN' },
      { type: 'pubmed', name: 'PubMed' },
    ]);
  });

  it('rejects unknown enrichment policies and source types', () => {
    expect(ConfigSchema.safeParse({ sources: [], enrichment: { policy: 'overwrite' } }).success).toBe(false);
    expect(ConfigSchema.safeParse({ sources: [{ type: 'atom', url: 'https://ex.com' }] }).success).toBe(false);
  });
});

describe('loadConfig', () => {
  it('loads the bundled config.yaml', () => {
    const configPath = fileURLToPath(new URL('../../../config.yaml', import.meta.url));
    const config = loadConfig(configPath);

    expect(config.sources).toHaveLength(14);
    expect(config.catalog.sites).toHaveLength(5);
    expect(config.catalog.sites.filter(site => site.mode === 'single')).toEqual([{
      id: 'dr_kalidas_center',
      mode: 'single',
      kind: 'institution',
      url: 'https://drkalidas.com/',
      name: 'The Center for Natural & Integrative Medicine (Dr. Kalidas)',
      location: 'Orlando, Florida, USA',
      tags: ['integrative', 'naturopathic', 'clinic'],
    }]);
    expect(config.facetsFile).toBe(join(dirname(configPath), 'facets.json'));
  });
});
