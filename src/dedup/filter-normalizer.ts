/**
 * Normalize a row-filter expression for use as a dedup key.
 *
 * Works on the expression text, not a parse tree: whitespace runs outside
 * quoted string literals collapse to a single space and the ends are
 * trimmed. Whitespace inside quotes is part of the value and is kept.
 */
export function normalizeFilterText(text: string): string {
  let out = '';
  let quote: string | null = null;
  let pendingSpace = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (quote !== null) {
      out += ch;
      if (ch === '\\' && i + 1 < text.length) {
        out += text[++i];
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }

    if (/\s/.test(ch)) {
      pendingSpace = true;
      continue;
    }

    if (pendingSpace && out.length > 0) {
      out += ' ';
    }
    pendingSpace = false;
    out += ch;

    if (ch === '"' || ch === "'" || ch === '`') {
      quote = ch;
    }
  }

  return out;
}
