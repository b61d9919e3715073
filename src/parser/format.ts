const CODE_FENCE = /^\s*```[a-z]*\s*$/i;

// KEY: value or KEY = value, tolerating list numbering, markdown bullets and emphasis around the key
const FIELD_LINE = /^[\s>*#-]*(?:\d+[.)])?[\s*]*([A-Za-z][A-Za-z _]*?)\s*\**\s*[:=]\s*(.*)$/;

const WRAPPERS: [string, string][] = [
  ['"', '"'],
  ["'", "'"],
  ['[', ']'],
  ['`', '`']
];

export function cleanValue(raw: string): string {
  let value = raw.trim().replace(/^\*+|\*+$/g, '').trim();

  for (const [open, close] of WRAPPERS) {
    if (value.length >= 2 && value.startsWith(open) && value.endsWith(close)) {
      value = value.slice(1, -1).trim();
    }
  }

  return value;
}

/**
 * Reads `KEY: value` lines out of a model answer. Keys are upper-cased with
 * spaces turned into underscores; the first occurrence of a key wins.
 */
export function extractFields(output: string): Record<string, string> {
  const fields: Record<string, string> = {};

  for (const line of output.split(/\r?\n/)) {
    if (CODE_FENCE.test(line)) continue;

    const match = FIELD_LINE.exec(line);
    if (!match) continue;

    const key = match[1].trim().toUpperCase().replace(/\s+/g, '_');
    if (key in fields) continue;

    fields[key] = cleanValue(match[2]);
  }

  return fields;
}

export function splitTags(value: string): string[] {
  return value
    .split(',')
    .map(tag => cleanValue(tag))
    .filter(tag => tag.length > 0);
}

export function splitActions(value: string): string[] {
  return value
    .split(';')
    .map(action => cleanValue(action.replace(/^[\s*-]+/, '')))
    .filter(action => action.length > 0);
}
