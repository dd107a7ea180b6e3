import { describe, it, expect, vi } from 'vitest';
import { cleanText, normalizeLink, normalizeResult, truncateSummary } from '../normalize.js';

const now = new Date('2024-01-10T12:00:00Z');

describe('normalizeLink', () => {
  it('strips utm parameters', () => {
    expect(normalizeLink('https://ex.com/a?utm_source=x')).toBe('https://ex.com/a');
  });

  it('keeps other parameters in their original order', () => {
    expect(normalizeLink('https://ex.com/a?b=1&utm_medium=email&c=2')).toBe('https://ex.com/a?b=1&c=2');
  });

  it('lower-cases the host, drops the fragment and the trailing slash', () => {
    expect(normalizeLink('HTTPS://Example.COM/Path/?fbclid=abc&id=7#frag')).toBe('https://example.com/Path?id=7');
  });

  it('drops the bare root slash', () => {
    expect(normalizeLink('https://ex.com/')).toBe('https://ex.com');
  });

  it('upgrades http for hosts known to redirect to https', () => {
    const options = { trackingParams: [], httpsHosts: ['nih.gov'] };
    expect(normalizeLink('http://www.nih.gov/news', options)).toBe('https://www.nih.gov/news');
    expect(normalizeLink('http://other.org/x', options)).toBe('http://other.org/x');
  });

  it('rejects values that are not http(s) URLs', () => {
    expect(normalizeLink('not a url')).toBeUndefined();
    expect(normalizeLink('ftp://ex.com/file')).toBeUndefined();
  });
});

describe('truncateSummary', () => {
  it('returns undefined for missing or blank text', () => {
    expect(truncateSummary(undefined, 180)).toBeUndefined();
    expect(truncateSummary('   ', 180)).toBeUndefined();
  });

  it('strips markup and collapses whitespace', () => {
    expect(cleanText('<p>Hello <b>world</b></p>')).toBe('Hello world');
    expect(truncateSummary('<p>Hello <b>world</b></p>', 180)).toBe('Hello world');
  });

  it('cuts at the last word boundary', () => {
    expect(truncateSummary('alpha beta gamma delta', 12)).toBe('alpha beta…');
  });

  it('cuts mid-word when there is no space', () => {
    expect(truncateSummary('abcdefghij', 4)).toBe('abcd…');
  });
});

describe('normalizeResult', () => {
  it('drops records without a title or link', () => {
    expect(normalizeResult({ link: 'https://ex.com/a', sourceName: 'S' }, now)).toEqual({ ok: false, reason: 'missing-title' });
    expect(normalizeResult({ title: 'T', sourceName: 'S' }, now)).toEqual({ ok: false, reason: 'missing-link' });
    expect(normalizeResult({ title: 'T', link: 'javascript:alert(1)', sourceName: 'S' }, now)).toEqual({ ok: false, reason: 'invalid-link' });
  });

  it('falls back to now when the date is missing and reports it', () => {
    const result = normalizeResult({ title: 'T', link: 'https://ex.com/a', sourceName: ' Nature ' }, now);
    expect(result).toEqual({
      ok: true,
      item: { title: 'T', link: 'https://ex.com/a', source: 'Nature', date: '2024-01-10 12:00:00' },
      dateFallback: 'missing',
    });
  });

  it('falls back to now when the date cannot be parsed', () => {
    const result = normalizeResult({ title: 'T', link: 'https://ex.com/a', publishedAt: 'not a date', sourceName: 'S' }, now);
    expect(result.ok && result.dateFallback).toBe('unparsable');
    expect(result.ok && result.item.date).toBe('2024-01-10 12:00:00');
  });

  it('parses RSS dates as UTC', () => {
    const result = normalizeResult({
      title: 'T',
      link: 'https://ex.com/a',
      publishedAt: 'Tue, 09 Jan 2024 13:00:00 GMT',
      sourceName: 'S',
    }, now);
    expect(result.ok && result.item.date).toBe('2024-01-09 13:00:00');
    expect(result.ok && result.dateFallback).toBeUndefined();
  });

  it.each([
    ['2024-02-30 10:00:00'],
    ['0000-00-00 00:00:00'],
  ])('falls back to now for the impossible date %s', publishedAt => {
    const result = normalizeResult({ title: 'T', link: 'https://ex.com/a', publishedAt, sourceName: 'S' }, now);
    expect(result.ok && result.item.date).toBe('2024-01-10 12:00:00');
    expect(result.ok && result.dateFallback).toBe('unparsable');
  });

  it('stores an RSS date without a zone as UTC', () => {
    vi.stubEnv('TZ', 'Asia/Tokyo');
    const result = normalizeResult({
      title: 'T',
      link: 'https://ex.com/a',
      publishedAt: 'Tue, 09 Jan 2024 13:00:00',
      sourceName: 'S',
    }, now);
    vi.unstubAllEnvs();
    expect(result.ok && result.item.date).toBe('2024-01-09 13:00:00');
    expect(result.ok && result.dateFallback).toBeUndefined();
  });

  it('omits the summary instead of storing an empty string', () => {
    const result = normalizeResult({ title: 'T', link: 'https://ex.com/a', summary: '<p> </p>', sourceName: 'S' }, now);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect('summary' in result.item).toBe(false);
    }
  });
});
