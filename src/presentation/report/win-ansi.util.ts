/**
 * The PDF uses jsPDF's built-in Helvetica, which only has glyphs for the
 * WinAnsi (cp1252) set. Text outside it is mapped to the closest ASCII
 * spelling, or to `?` when there is none.
 */

// cp1252 characters outside Latin-1.
const CP1252_EXTRAS = new Set(
  '€‚ƒ„…†‡ˆ‰Š‹ŒŽ‘’“”•–—˜™š›œžŸ',
);

const SUBSTITUTES: Record<string, string> = {
  '→': '->',
  '←': '<-',
  '↔': '<->',
  '⇒': '=>',
  '−': '-',
  '‐': '-',
  '‑': '-',
  '≤': '<=',
  '≥': '>=',
  '✓': 'v',
  '✔': 'v',
};

function isWinAnsi(char: string): boolean {
  const code = char.codePointAt(0) ?? 0;
  return (
    char === '\n' ||
    (code >= 0x20 && code <= 0x7e) ||
    (code >= 0xa0 && code <= 0xff) ||
    CP1252_EXTRAS.has(char)
  );
}

function withoutDiacritics(char: string): string {
  return char.normalize('NFD').replace(/[\u0300-\u036f]/g, '');
}

export function toWinAnsiText(text: string): string {
  let result = '';
  for (const char of text.normalize('NFC')) {
    if (isWinAnsi(char)) {
      result += char;
    } else if (char === '\t') {
      result += ' ';
    } else if (char in SUBSTITUTES) {
      result += SUBSTITUTES[char];
    } else {
      const stripped = withoutDiacritics(char);
      result +=
        stripped !== char && [...stripped].every(isWinAnsi) ? stripped : '?';
    }
  }
  return result;
}
