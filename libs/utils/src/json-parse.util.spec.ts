import { isPlainObject, safeJsonParseFromText } from './json-parse.util';

describe('safeJsonParseFromText', () => {
  it('parses a bare JSON object', () => {
    expect(safeJsonParseFromText('{"tom":"informal"}', 'object')).toEqual({
      tom: 'informal',
    });
  });

  it('extracts an object from a markdown fence', () => {
    const text = 'Here you go:\n```json\n{"valores":["humor"]}\n```\nThanks';

    expect(safeJsonParseFromText(text, 'object')).toEqual({
      valores: ['humor'],
    });
  });

  it('extracts an object surrounded by prose', () => {
    expect(
      safeJsonParseFromText('Result: {"engajamento":"alto"} end', 'object'),
    ).toEqual({ engajamento: 'alto' });
  });

  it('extracts an array when asked for one', () => {
    expect(safeJsonParseFromText('list: ["a", "b"]', 'array')).toEqual([
      'a',
      'b',
    ]);
  });

  it('returns undefined for text without JSON', () => {
    expect(safeJsonParseFromText('not json at all', 'object')).toBeUndefined();
  });

  it('returns undefined for an empty string', () => {
    expect(safeJsonParseFromText('', 'object')).toBeUndefined();
  });

  it('returns undefined for a truncated object', () => {
    expect(
      safeJsonParseFromText('{"estilo_conteudo": "humor', 'object'),
    ).toBeUndefined();
  });
});

describe('isPlainObject', () => {
  it.each([
    [{}, true],
    [{ a: 1 }, true],
    [[], false],
    [null, false],
    ['{}', false],
    [42, false],
  ])('%p -> %p', (value, expected) => {
    expect(isPlainObject(value)).toBe(expected);
  });
});
