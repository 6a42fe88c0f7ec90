const WHITESPACE = new Set([' ', '\t', '\n', '\r']);

function skipWhitespace(text: string, from: number): number {
  let i = from;
  while (i < text.length && WHITESPACE.has(text.charAt(i))) i++;
  return i;
}

/** Index just past the closing quote of the string starting at `start` */
function stringEnd(text: string, start: number): number {
  for (let i = start + 1; i < text.length; i++) {
    const ch = text.charAt(i);
    if (ch === '\\') {
      i++;
    } else if (ch === '"') {
      return i + 1;
    }
  }
  return text.length;
}

/**
 * Re-indent JSON text without parsing it into objects.
 *
 * Keys stay in the order received and number literals are copied as written,
 * so integer-like keys and integers beyond 2^53 survive unchanged. Empty
 * objects and arrays stay on one line. The input must be valid JSON.
 */
export function formatJson(text: string, indent = 4): string {
  const newline = (depth: number) => `\n${' '.repeat(indent * depth)}`;
  let out = '';
  let depth = 0;
  let i = 0;

  while (i < text.length) {
    const ch = text.charAt(i);

    if (ch === '"') {
      const end = stringEnd(text, i);
      out += text.slice(i, end);
      i = end;
      continue;
    }

    if (ch === '{' || ch === '[') {
      const close = ch === '{' ? '}' : ']';
      const next = skipWhitespace(text, i + 1);
      if (text.charAt(next) === close) {
        out += ch + close;
        i = next + 1;
        continue;
      }
      depth++;
      out += ch + newline(depth);
    } else if (ch === '}' || ch === ']') {
      depth--;
      out += newline(depth) + ch;
    } else if (ch === ',') {
      out += `,${newline(depth)}`;
    } else if (ch === ':') {
      out += ': ';
    } else if (!WHITESPACE.has(ch)) {
      out += ch;
    }
    i++;
  }

  return out;
}
