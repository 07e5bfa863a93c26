import { describe, it, expect } from 'vitest';
import { isProperName } from '../proper-name';

describe('isProperName', () => {
  it('accepts a capitalized name', () => {
    expect(isProperName('Bakı')).toBe(true);
  });

  it('rejects a lowercase word', () => {
    expect(isProperName('baki')).toBe(false);
  });

  it('trims before checking', () => {
    expect(isProperName('  Bakı ')).toBe(true);
  });

  it('rejects empty and single-character text', () => {
    expect(isProperName('')).toBe(false);
    expect(isProperName('   ')).toBe(false);
    expect(isProperName('A')).toBe(false);
  });

  it('rejects digits', () => {
    expect(isProperName('2024')).toBe(false);
  });

  it('rejects stop words regardless of case', () => {
    expect(isProperName('Azərbaycan')).toBe(false);
    expect(isProperName('Nə üçün')).toBe(false);
    expect(isProperName('Bank')).toBe(false);
  });

  it('accepts a two-letter abbreviation', () => {
    expect(isProperName('AB')).toBe(true);
  });
});
