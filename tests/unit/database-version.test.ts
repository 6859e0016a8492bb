import { describe, it, expect } from 'vitest';
import { parseDatabaseVersion } from '../../src/store/database.js';

describe('parseDatabaseVersion', () => {
  it('reads a plain integer', () => {
    expect(parseDatabaseVersion(' 26 ')).toBe(26);
  });

  it('reads a plist integer', () => {
    expect(parseDatabaseVersion('<plist version="1.0"><integer>24</integer></plist>')).toBe(24);
  });

  it('returns null for anything else', () => {
    expect(parseDatabaseVersion('<plist><string>26</string></plist>')).toBeNull();
    expect(parseDatabaseVersion('')).toBeNull();
  });
});
