import { toWinAnsiText } from './win-ansi.util';

describe('toWinAnsiText', () => {
  it('keeps Portuguese accents and cp1252 punctuation', () => {
    expect(toWinAnsiText('Ação “viral” – 5€')).toBe('Ação “viral” – 5€');
  });

  it('spells arrows and math signs in ASCII', () => {
    expect(toWinAnsiText('reach → sales, x ≥ 2')).toBe('reach -> sales, x >= 2');
  });

  it('drops diacritics Helvetica cannot draw', () => {
    expect(toWinAnsiText('Łódź Győr')).toBe('?ódz Gyor');
  });

  it('replaces CJK text and emoji with question marks', () => {
    expect(toWinAnsiText('日本 fans 😀')).toBe('?? fans ?');
  });
});
