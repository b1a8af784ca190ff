import { describe, it, expect } from 'vitest';
import { unixToDate, unixToIso } from '../timezone';

describe('timezone', () => {
  it('converts unix seconds to ISO strings', () => {
    expect(unixToIso(0)).toBe('1970-01-01T00:00:00.000Z');
    expect(unixToIso(1_790_000_000)).toBe(new Date(1_790_000_000_000).toISOString());
    expect(unixToIso(null)).toBeNull();
  });

  it('rejects non-finite timestamps', () => {
    expect(() => unixToDate(Number.NaN)).toThrow('Invalid unix timestamp: NaN');
  });
});
