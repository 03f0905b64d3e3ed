/**
 * Polish Text Utilities
 *
 * Diacritic folding used to build the fallback ("Polish characters") search
 * variants: a user typing `Lodz` should still find `Łódź`, and the other way
 * round. The house number matcher does not use this, it only reads digits and
 * ASCII letters.
 */

export const POLISH_CHARACTER_MAP: Readonly<Record<string, string>> = Object.freeze({
  ą: 'a',
  ć: 'c',
  ę: 'e',
  ł: 'l',
  ń: 'n',
  ó: 'o',
  ś: 's',
  ź: 'z',
  ż: 'z',
  Ą: 'A',
  Ć: 'C',
  Ę: 'E',
  Ł: 'L',
  Ń: 'N',
  Ó: 'O',
  Ś: 'S',
  Ź: 'Z',
  Ż: 'Z',
});

/**
 * Replace Polish diacritics with their ASCII base letters.
 *
 * @example
 * normalizePolishText('Łódź')      // 'Lodz'
 * normalizePolishText('Grabiszyńska') // 'Grabiszynska'
 */
export function normalizePolishText(text: string): string {
  let result = '';
  for (const char of text) {
    result += POLISH_CHARACTER_MAP[char] ?? char;
  }
  return result;
}

/**
 * Case- and diacritic-insensitive comparison key.
 */
export function toSearchKey(text: string): string {
  return normalizePolishText(text).toLowerCase();
}

export function normalizeOptionalText(text: string | undefined): string | undefined {
  return text === undefined ? undefined : normalizePolishText(text);
}
