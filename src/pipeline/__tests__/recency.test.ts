import { describe, it, expect } from 'vitest';
import { isItemNew, isNew } from '../recency.js';

const now = new Date('2024-01-10T12:00:00Z');

describe('isNew', () => {
  it('treats an item 23 hours old as new', () => {
    expect(isNew(new Date('2024-01-09T13:00:00Z'), now)).toBe(true);
  });

  it('treats an item 25 hours old as not new', () => {
    expect(isNew(new Date('2024-01-09T11:00:00Z'), now)).toBe(false);
  });

  it('includes the 24 hour boundary', () => {
    expect(isNew(new Date('2024-01-09T12:00:00Z'), now)).toBe(true);
  });

  it('includes an item published exactly now', () => {
    expect(isNew(now, now)).toBe(true);
  });

  it('does not treat future dates as new', () => {
    expect(isNew(new Date('2024-01-10T12:00:01Z'), now)).toBe(false);
  });
});

describe('isItemNew', () => {
  it('reads stored dates as UTC', () => {
    expect(isItemNew({ date: '2024-01-09 13:00:00' }, now)).toBe(true);
    expect(isItemNew({ date: '2024-01-09 11:00:00' }, now)).toBe(false);
  });

  it('is false for an unreadable date', () => {
    expect(isItemNew({ date: 'garbage' }, now)).toBe(false);
  });
});
