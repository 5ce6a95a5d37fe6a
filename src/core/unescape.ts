/**
 * Decoder for escape sequences inside an extracted JSON string value
 */

const SIMPLE_ESCAPES: Record<string, string> = {
  '\\': '\\',
  '"': '"',
  '/': '/',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
};

const HEX4 = /^[0-9a-fA-F]{4}$/;

/**
 * Decode `\\ \" \/ \b \f \n \r \t \uXXXX`.
 *
 * `\uXXXX` above 0x7F becomes `?`; only ASCII code points are reproduced.
 * Unknown escapes yield the escaped character itself, and a lone trailing
 * backslash is kept as is.
 */
export function unescapeJsonString(raw: string): string {
  let out = '';

  for (let i = 0; i < raw.length; i++) {
    const c = raw[i];
    if (c !== '\\' || i + 1 >= raw.length) {
      out += c;
      continue;
    }

    const next = raw[++i];
    const simple = SIMPLE_ESCAPES[next];
    if (simple !== undefined) {
      out += simple;
      continue;
    }

    if (next === 'u') {
      const hex = raw.slice(i + 1, i + 5);
      if (HEX4.test(hex)) {
        const code = parseInt(hex, 16);
        out += code <= 0x7f ? String.fromCharCode(code) : '?';
        i += 4;
        continue;
      }
    }

    out += next;
  }

  return out;
}
