import { describe, it, expect } from 'vitest';
import { parseRouting, resolveRecipients, splitList } from './routing.js';

describe('parseRouting()', () => {
  it('parses pattern-to-recipient mappings in order', () => {
    const routing = parseRouting('passage-plan: a@example.com, b@example.com ; vessel-cert:c@example.com');
    expect([...routing]).toEqual([
      ['passage-plan', ['a@example.com', 'b@example.com']],
      ['vessel-cert', ['c@example.com']],
    ]);
  });

  it('skips malformed entries and handles empty input', () => {
    expect(parseRouting(undefined).size).toBe(0);
    expect(parseRouting('').size).toBe(0);
    expect([...parseRouting('nocolon;:x@example.com;empty: , ;ok:y@example.com')]).toEqual([
      ['ok', ['y@example.com']],
    ]);
  });
});

describe('resolveRecipients()', () => {
  const routing = parseRouting('billing:billing@example.com;api:api@example.com');
  const defaults = ['ops@example.com'];

  it('matches a pattern inside the container name', () => {
    expect(resolveRecipients('shop-api-1', 'shop', routing, defaults)).toEqual(['api@example.com']);
  });

  it('matches a pattern inside the project name', () => {
    expect(resolveRecipients('worker-1', 'billing', routing, defaults)).toEqual(['billing@example.com']);
  });

  it('takes the first matching pattern', () => {
    expect(resolveRecipients('billing-api-1', 'billing', routing, defaults)).toEqual(['billing@example.com']);
  });

  it('falls back to the defaults', () => {
    expect(resolveRecipients('shop-web-1', 'shop', routing, defaults)).toEqual(defaults);
  });
});

describe('splitList()', () => {
  it('trims and drops empty items', () => {
    expect(splitList(' a@example.com,, b@example.com ,')).toEqual(['a@example.com', 'b@example.com']);
    expect(splitList(undefined)).toEqual([]);
  });
});
