import { describe, expect, it } from 'vitest';
import { tryParse } from './tryParse.js';

describe('tryParse', () => {
  it('parses JSON objects', () => {
    expect(tryParse('{"code":"E01","message":"bad query"}')).toEqual({ code: 'E01', message: 'bad query' });
  });

  it('parses JSON arrays, with leading whitespace', () => {
    expect(tryParse('  [1,2,3]')).toEqual([1, 2, 3]);
  });

  it('leaves JSON scalars as text', () => {
    expect(tryParse('"hello"')).toBe('"hello"');
    expect(tryParse('404')).toBe('404');
    expect(tryParse('true')).toBe('true');
  });

  it('returns the original input when JSON is invalid', () => {
    expect(tryParse('{')).toBe('{');
    expect(tryParse('{bad json}')).toBe('{bad json}');
    expect(tryParse('Compilation: syntax error')).toBe('Compilation: syntax error');
  });

  it('returns whitespace-only input unchanged', () => {
    expect(tryParse('   ')).toBe('   ');
  });
});
