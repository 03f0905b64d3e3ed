/**
 * Unit tests for Polish diacritic folding
 */

import {
  POLISH_CHARACTER_MAP,
  normalizeOptionalText,
  normalizePolishText,
  toSearchKey,
} from '../../../src/modules/common/utils/polish-text.utils';

describe('normalizePolishText', () => {
  test('should replace every Polish letter with its base letter', () => {
    expect(normalizePolishText('ąćęłńóśźż')).toBe('acelnoszz');
    expect(normalizePolishText('ĄĆĘŁŃÓŚŹŻ')).toBe('ACELNOSZZ');
  });

  test('should keep case and other characters', () => {
    expect(normalizePolishText('Łódź')).toBe('Lodz');
    expect(normalizePolishText('Grabiszyńska 12a')).toBe('Grabiszynska 12a');
    expect(normalizePolishText('Bielsko-Biała')).toBe('Bielsko-Biala');
  });

  test('should leave ASCII text unchanged', () => {
    expect(normalizePolishText('Warszawa')).toBe('Warszawa');
    expect(normalizePolishText('')).toBe('');
  });

  test('should be idempotent', () => {
    const once = normalizePolishText('Żółć gęślą jaźń');
    expect(normalizePolishText(once)).toBe(once);
  });
});

describe('POLISH_CHARACTER_MAP', () => {
  test('should be frozen', () => {
    expect(Object.isFrozen(POLISH_CHARACTER_MAP)).toBe(true);
  });

  test('should cover the nine letters in both cases', () => {
    expect(Object.keys(POLISH_CHARACTER_MAP)).toHaveLength(18);
  });
});

describe('toSearchKey', () => {
  test('should fold case and diacritics', () => {
    expect(toSearchKey('ŁÓDŹ')).toBe('lodz');
    expect(toSearchKey('Łódź')).toBe(toSearchKey('lodz'));
  });
});

describe('normalizeOptionalText', () => {
  test('should pass undefined through', () => {
    expect(normalizeOptionalText(undefined)).toBeUndefined();
    expect(normalizeOptionalText('Wąwozowa')).toBe('Wawozowa');
  });
});
