import { describe, it, expect } from 'vitest';
import { Id, IdError } from './id.js';

describe('Id', () => {
  it('generates v4 UUIDs', () => {
    expect(Id.new().asStr()).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
    );
    expect(Id.new().equals(Id.new())).toBe(false);
  });

  it('accepts path-safe strings', () => {
    const id = Id.fromString('acct-1');
    expect(id.asStr()).toBe('acct-1');
    expect(id.toString()).toBe('acct-1');
    expect(id.equals(Id.fromString('acct-1'))).toBe(true);
  });

  it('rejects values that are not a single path segment', () => {
    for (const bad of ['', '.', '..', 'a/b', 'a\\b', 'a\0b']) {
      expect(() => Id.fromString(bad)).toThrow(IdError);
    }
  });

  it('serializes as a plain string', () => {
    expect(JSON.stringify({ id: Id.fromString('acct-1') })).toBe('{"id":"acct-1"}');
  });
});
