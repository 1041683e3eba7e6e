import {
  ConfigError, QueryError, SyntaxError, UnknownColumnError, UnknownTableError,
  UnsupportedFeatureError, keywordTypo,
} from '../errors';
import closeMatches, { levenshteinDistance } from '../util/closeMatches';

describe('QueryError', () => {
  it('should serialize to a plain object', () => {
    let error = new UnknownTableError('emp', ['employees', 'departments']);
    expect(error).toBeInstanceOf(QueryError);
    expect(error.toJSON()).toEqual({
      code: 'unknown_table',
      message: "Unknown table: 'emp'",
      suggestion: 'Available tables: employees, departments',
      severity: 'error',
      context: { table: 'emp', available: ['employees', 'departments'] },
    });
  });
  it('should suggest close column names', () => {
    let error = new UnknownColumnError('salry', 'employees', ['id', 'salary']);
    expect(error.message).toBe("Unknown column: 'salry' in table 'employees'");
    expect(error.suggestion).toBe('Did you mean: salary?');
  });
  it('should list columns when nothing is close', () => {
    let error = new UnknownColumnError('zzz', 't', ['id', 'name']);
    expect(error.suggestion).toBe('Available columns in t: id, name');
  });
  it('should fix keyword typos in syntax errors', () => {
    expect(new SyntaxError('Unexpected token', 'selec').suggestion)
      .toBe('Did you mean: SELECT?');
    expect(new SyntaxError('Unexpected token', 'WHER').suggestion)
      .toBe('Did you mean: WHERE?');
    expect(new SyntaxError('Unexpected token', 'FROM').suggestion).toBeNull();
    expect(new SyntaxError('Unexpected token', 'selec', 'Custom hint')
      .suggestion).toBe('Custom hint');
  });
  it('should mark unsupported features as warnings', () => {
    let error = new UnsupportedFeatureError('Subqueries');
    expect(error.severity).toBe('warning');
    expect(error.code).toBe('unsupported_feature');
  });
  it('should join config issues into the suggestion', () => {
    let error = new ConfigError('Invalid', [
      { path: 'a', message: 'bad' }, { path: 'b.c', message: 'worse' },
    ]);
    expect(error.suggestion).toBe('a: bad; b.c: worse');
  });
  it('should map common misspellings to keywords', () => {
    expect(keywordTypo('FORM')).toBe('FROM');
    expect(keywordTypo('hello')).toBeNull();
  });
});

describe('closeMatches', () => {
  it('should measure edit distance', () => {
    expect(levenshteinDistance('kitten', 'sitting')).toBe(3);
    expect(levenshteinDistance('', 'abc')).toBe(3);
  });
  it('should return the closest candidate above the cutoff', () => {
    expect(closeMatches('emplyees', ['departments', 'employees']))
      .toEqual(['employees']);
    expect(closeMatches('abc', ['xyz'])).toEqual([]);
    expect(closeMatches('NAME', ['name', 'names'], 2))
      .toEqual(['name', 'names']);
  });
});
