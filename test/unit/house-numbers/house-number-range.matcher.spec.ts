/**
 * Unit tests for the house number range matcher
 */

import {
  matchesHouseNumber,
  matchesRangeToken,
} from '../../../src/modules/house-numbers/house-number-range.matcher';
import {
  classifyRangeToken,
  parseHouseNumber,
} from '../../../src/modules/house-numbers/house-number-range.parser';

const range = (from: number, to: number): number[] =>
  Array.from({ length: to - from + 1 }, (_, i) => from + i);

describe('matchesHouseNumber', () => {
  describe('Register scenarios', () => {
    test.each([
      ['2', '1-12', true],
      ['13', '1-12', false],
      ['1', '1-41(n)', true],
      ['2', '1-41(n)', false],
      ['500', '337-DK', true],
      ['336', '337-DK', false],
      ['270', '270-336(p), 283-335(n)', true],
      ['283', '270-336(p), 283-335(n)', true],
      ['337', '270-336(p), 283-335(n)', false],
      ['4a', '4a-9/11', true],
      ['5', '4a-9/11', true],
      ['10', '4a-9/11', false],
      ['6', '6a-DK(p)', false],
      ['8', '6a-DK(p)', true],
      ['2', '2/4-10(p)', false],
      ['4', '2/4-10(p)', true],
      ['1', '1/3-23/25(n)', true],
      ['2', '1/3-23/25(n)', false],
      ['35c', '35c', true],
      ['35', '35c', false],
      ['', '1-10', false],
    ])('matchesHouseNumber(%p, %p) should be %p', (houseNumber, pattern, expected) => {
      expect(matchesHouseNumber(houseNumber, pattern)).toBe(expected);
    });
  });

  describe('Individual numbers', () => {
    test('should match a bare number by its numeric part', () => {
      expect(matchesHouseNumber('60', '60')).toBe(true);
      expect(matchesHouseNumber('60b', '60')).toBe(true);
      expect(matchesHouseNumber('61', '60')).toBe(false);
    });

    test('should require exact equality for a lettered number', () => {
      expect(matchesHouseNumber('35c', '35c')).toBe(true);
      expect(matchesHouseNumber('35d', '35c')).toBe(false);
    });

    test('should match individual tokens inside a comma list', () => {
      expect(matchesHouseNumber('35c', '6a-DK(p), 35c')).toBe(true);
      expect(matchesHouseNumber('35', '6a-DK(p), 35c')).toBe(false);
    });
  });

  describe('Simple ranges', () => {
    test('should match every number inside the bounds', () => {
      for (const n of range(5, 20)) {
        expect(matchesHouseNumber(String(n), '5-20')).toBe(true);
      }
    });

    test('should reject numbers outside the bounds', () => {
      expect(matchesHouseNumber('4', '5-20')).toBe(false);
      expect(matchesHouseNumber('21', '5-20')).toBe(false);
    });

    test('should match a degenerate range', () => {
      expect(matchesHouseNumber('5', '5-5')).toBe(true);
      expect(matchesHouseNumber('6', '5-5')).toBe(false);
    });

    test('should treat reversed bounds as an empty range', () => {
      for (const n of range(0, 25)) {
        expect(matchesHouseNumber(String(n), '20-5')).toBe(false);
      }
    });

    test('should extend a lettered end bound only to its own number', () => {
      expect(matchesHouseNumber('31', '31-31a')).toBe(true);
      expect(matchesHouseNumber('31a', '31-31a')).toBe(true);
      expect(matchesHouseNumber('32', '31-31a')).toBe(false);
    });

    test('should compare lettered house numbers by their numeric part', () => {
      expect(matchesHouseNumber('12a', '1-12')).toBe(true);
      expect(matchesHouseNumber('13a', '1-12')).toBe(false);
    });
  });

  describe('Side-restricted ranges', () => {
    test('should match only odd numbers for (n)', () => {
      for (const n of range(0, 45)) {
        expect(matchesHouseNumber(String(n), '1-41(n)')).toBe(n >= 1 && n <= 41 && n % 2 === 1);
      }
    });

    test('should match only even numbers for (p)', () => {
      for (const n of range(0, 45)) {
        expect(matchesHouseNumber(String(n), '2-38(p)')).toBe(n >= 2 && n <= 38 && n % 2 === 0);
      }
    });

    test('should apply parity to a degenerate range', () => {
      expect(matchesHouseNumber('5', '5-5(p)')).toBe(false);
      expect(matchesHouseNumber('6', '5-5(p)')).toBe(false);
      expect(matchesHouseNumber('5', '5-5(n)')).toBe(true);
    });
  });

  describe('Open-ended (DK) ranges', () => {
    test('should have no upper bound', () => {
      expect(matchesHouseNumber('337', '337-DK')).toBe(true);
      expect(matchesHouseNumber(String(337 + 10000), '337-DK')).toBe(true);
      expect(matchesHouseNumber('1', '1-DK')).toBe(true);
      expect(matchesHouseNumber('999999', '1-DK')).toBe(true);
    });

    test('should match house numbers beyond the safe integer range', () => {
      expect(matchesHouseNumber('9007199254740993', '1-DK')).toBe(true);
      expect(matchesHouseNumber('9007199254740993', '2-DK(p)')).toBe(false);
      expect(matchesHouseNumber('9007199254740993', '1-DK(n)')).toBe(true);
      expect(matchesHouseNumber('5', '99999999999999999999-DK')).toBe(false);
      expect(matchesHouseNumber('100000000000000000000', '99999999999999999999-DK')).toBe(true);
    });

    test('should compare long bounds and lettered numbers exactly', () => {
      expect(matchesHouseNumber('5', '1-99999999999999999999')).toBe(true);
      expect(matchesHouseNumber('99999999999999999999a', '99999999999999999999a')).toBe(true);
      expect(matchesHouseNumber('99999999999999999999b', '99999999999999999999a')).toBe(false);
    });

    test('should accept DK in any case', () => {
      expect(matchesHouseNumber('50', '2-dk')).toBe(true);
      expect(matchesHouseNumber('50', '2-Dk(p)')).toBe(true);
    });

    test('should apply parity', () => {
      expect(matchesHouseNumber('10001', '2-DK(p)')).toBe(false);
      expect(matchesHouseNumber('10002', '2-DK(p)')).toBe(true);
    });

    test('should exclude the bare number equal to a lettered start', () => {
      expect(matchesHouseNumber('6', '6a-DK')).toBe(false);
      expect(matchesHouseNumber('6a', '6a-DK')).toBe(true);
      expect(matchesHouseNumber('7', '6a-DK')).toBe(true);
      expect(matchesHouseNumber('7', '6a-DK(p)')).toBe(false);
    });
  });

  describe('Slash notation', () => {
    test('should match both members of a two-element set and nothing between', () => {
      expect(matchesHouseNumber('31', '31/33')).toBe(true);
      expect(matchesHouseNumber('33', '31/33')).toBe(true);
      expect(matchesHouseNumber('32', '31/33')).toBe(false);
    });

    test('should match a range closed at the middle number plus the trailing number', () => {
      expect(matchesHouseNumber('55', '55-69/71(n)')).toBe(true);
      expect(matchesHouseNumber('69', '55-69/71(n)')).toBe(true);
      expect(matchesHouseNumber('71', '55-69/71(n)')).toBe(true);
      expect(matchesHouseNumber('56', '55-69/71(n)')).toBe(false);
      expect(matchesHouseNumber('73', '55-69/71(n)')).toBe(false);
    });

    test('should anchor a slash-low range at the second number', () => {
      expect(['2', '4', '5', '6', '8', '10', '12'].map((n) => matchesHouseNumber(n, '2/4-10(p)'))).toEqual([
        false,
        true,
        false,
        true,
        true,
        true,
        false,
      ]);
    });

    test('should treat the complex form as a four-element set', () => {
      expect(['1', '3', '5', '23', '25', '27'].map((n) => matchesHouseNumber(n, '1/3-23/25(n)'))).toEqual([
        true,
        true,
        false,
        true,
        true,
        false,
      ]);
    });

    test('should evaluate slash tokens inside a comma list', () => {
      expect(matchesHouseNumber('71', '2-20(p), 55-69/71(n)')).toBe(true);
      expect(matchesHouseNumber('12', '2-20(p), 55-69/71(n)')).toBe(true);
      expect(matchesHouseNumber('13', '2-20(p), 55-69/71(n)')).toBe(false);
    });
  });

  describe('Comma composition', () => {
    const tokens = ['1-12', '270-336(p)', '283-335(n)', '337-DK', '35c', '2/4-10(p)', '4a-9/11'];
    const houseNumbers = ['1', '4', '4a', '10', '13', '35c', '270', '283', '300', '336', '337', '5000'];

    test('should equal the disjunction of its tokens', () => {
      for (const first of tokens) {
        for (const second of tokens) {
          const pattern = `${first}, ${second}`;
          for (const houseNumber of houseNumbers) {
            expect(matchesHouseNumber(houseNumber, pattern)).toBe(
              matchesHouseNumber(houseNumber, first) || matchesHouseNumber(houseNumber, second),
            );
          }
        }
      }
    });

    test('should ignore empty tokens', () => {
      expect(matchesHouseNumber('3', '1-5,,')).toBe(true);
      expect(matchesHouseNumber('3', ', 1-5')).toBe(true);
    });
  });

  describe('Fail-closed behavior', () => {
    test('should reject blank inputs', () => {
      expect(matchesHouseNumber('', '1-10')).toBe(false);
      expect(matchesHouseNumber('   ', '1-10')).toBe(false);
      expect(matchesHouseNumber('5', '')).toBe(false);
      expect(matchesHouseNumber('5', '  ')).toBe(false);
    });

    test('should trim stray whitespace', () => {
      expect(matchesHouseNumber(' 5 ', ' 1-10 ')).toBe(true);
    });

    test('should not match house numbers without digits', () => {
      expect(matchesHouseNumber('abc', '1-10')).toBe(false);
      expect(matchesHouseNumber('abc', '1-DK')).toBe(false);
    });

    test.each([
      'abc-def',
      '1-2-3',
      '1-10(x)',
      '(n)1-10',
      '1/2/3',
      '5(p)',
      '1//3',
      '1-41 (n)',
      '1 - 41',
    ])('should treat malformed pattern %p as non-matching', (pattern) => {
      expect(() => matchesHouseNumber('5', pattern)).not.toThrow();
      expect(matchesHouseNumber('5', pattern)).toBe(false);
    });

    test('should still match other tokens next to a malformed one', () => {
      expect(matchesHouseNumber('3', 'abc, 1-5')).toBe(true);
      expect(matchesHouseNumber('7', 'abc, 1-5')).toBe(false);
    });
  });
});

describe('matchesRangeToken', () => {
  test('should never match an unrecognized token', () => {
    expect(matchesRangeToken(parseHouseNumber('5'), classifyRangeToken('x-y'))).toBe(false);
  });

  test('should match a house number without digits only against an identical lettered token', () => {
    const house = parseHouseNumber('a');
    expect(matchesRangeToken(house, classifyRangeToken('1-10'))).toBe(false);
    expect(matchesRangeToken(house, classifyRangeToken('35c'))).toBe(false);
  });
});
