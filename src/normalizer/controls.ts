// Whitespace controls and Unicode line/paragraph separators collapse to a single space
const WHITESPACE_CONTROLS = /[\t\n\r\v\f\u2028\u2029]+/g;

// Remaining C0/C1 controls plus invisible format characters (zero-width, bidi overrides, BOM)
const INVISIBLE_CHARACTERS = /[\u0000-\u0008\u000E-\u001F\u007F-\u009F\u200B-\u200F\u202A-\u202E\u2060-\u2064\u2066-\u2069\uFEFF]/g;

export function stripControlCharacters(input: string): string {
  return input
    .replace(WHITESPACE_CONTROLS, ' ')
    .replace(INVISIBLE_CHARACTERS, '');
}

