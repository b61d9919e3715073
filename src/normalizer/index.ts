import type { NormalizationFlag, NormalizedComplaint, Result } from '../types/index.js';
import { fail, ok } from '../types/index.js';
import { stripControlCharacters } from './controls.js';
import { stripDelimiters } from './delimiters.js';

export { stripControlCharacters } from './controls.js';
export { stripDelimiters } from './delimiters.js';

export const DEFAULT_MAX_INPUT_LENGTH = 2000;

export function normalize(rawText: string, maxLength: number = DEFAULT_MAX_INPUT_LENGTH): Result<NormalizedComplaint> {
  const flags: NormalizationFlag[] = [];

  const withoutControls = stripControlCharacters(rawText);
  if (withoutControls !== rawText) {
    flags.push('control_characters_removed');
  }

  const withoutDelimiters = stripDelimiters(withoutControls);
  if (withoutDelimiters !== withoutControls) {
    flags.push('delimiters_removed');
  }

  // NFC after stripping, so a second pass finds nothing left to compose
  const text = withoutDelimiters.normalize('NFC').trim();

  if (text.length === 0) {
    return fail('EmptyInput', 'Complaint text is empty');
  }

  if (text.length > maxLength) {
    return fail('InputTooLong', `Complaint text is ${text.length} characters, limit is ${maxLength}`);
  }

  return ok({ text, flags });
}
