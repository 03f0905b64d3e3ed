import type {
  HouseNumberQuery,
  HouseNumberRef,
  RangeToken,
  Side,
} from './house-number-range.types';

/**
 * House Number Range Parser
 *
 * Turns a raw range pattern into classified {@link RangeToken}s.
 *
 * Parsing happens in two steps:
 * 1. Lexing: a token such as `4a-9/11(n)` becomes
 *    `NUMBER(4a) DASH NUMBER(9) SLASH NUMBER(11) SIDE(odd)`.
 * 2. Classification: the lexeme sequence (minus a trailing side indicator) is
 *    reduced to a shape key (`N-N/N`) and looked up in a closed table.
 *
 * Shape keys of different notations never overlap.
 *
 * Nothing in this module throws: input that does not fit any shape, including
 * a token with whitespace inside it (`1 - 41`), becomes an `unrecognized` token.
 */

/** Whole-pattern individual number, e.g. `60` or `35c`. */
export const INDIVIDUAL_PATTERN = /^\d+[a-z]?$/;

const LEADING_DIGITS = /^(\d+)(.*)$/;

type Lexeme =
  | { type: 'number'; ref: HouseNumberRef }
  | { type: 'dash' }
  | { type: 'slash' }
  | { type: 'to-end' }
  | { type: 'side'; side: Side };

type LexResult =
  | { ok: true; lexemes: Lexeme[] }
  | { ok: false; reason: string };

const SHAPE_SYMBOLS: Record<Exclude<Lexeme['type'], 'side'>, string> = {
  number: 'N',
  dash: '-',
  slash: '/',
  'to-end': 'K',
};

function isDigit(char: string | undefined): boolean {
  return char !== undefined && char >= '0' && char <= '9';
}

function isLowercaseLetter(char: string | undefined): boolean {
  return char !== undefined && char >= 'a' && char <= 'z';
}

/**
 * Parse a caller-supplied house number.
 *
 * The numeric part is the leading run of digits; a single lowercase letter
 * directly after it is kept as the suffix. Anything else after the digits is
 * preserved in `raw` only, which is what exact comparisons use.
 *
 * @example
 * parseHouseNumber(' 12a ') // { raw: '12a', numeric: 12n, letter: 'a' }
 * parseHouseNumber('abc')   // { raw: 'abc', numeric: null, letter: null }
 */
export function parseHouseNumber(value: string): HouseNumberQuery {
  const raw = value.trim();
  const match = LEADING_DIGITS.exec(raw);

  if (!match) {
    return { raw, numeric: null, letter: null };
  }

  const [, digits, rest] = match;
  const suffix = rest.charAt(0);

  return {
    raw,
    numeric: BigInt(digits),
    letter: isLowercaseLetter(suffix) ? suffix : null,
  };
}

function lex(token: string): LexResult {
  const lexemes: Lexeme[] = [];
  let position = 0;

  while (position < token.length) {
    const char = token[position];

    if (isDigit(char)) {
      const start = position;
      while (isDigit(token[position])) {
        position += 1;
      }

      const value = BigInt(token.slice(start, position));

      let letter: string | null = null;
      if (isLowercaseLetter(token[position])) {
        letter = token[position];
        position += 1;
      }

      lexemes.push({
        type: 'number',
        ref: { raw: token.slice(start, position), value, letter },
      });
      continue;
    }

    if (char === '-') {
      lexemes.push({ type: 'dash' });
      position += 1;
      continue;
    }

    if (char === '/') {
      lexemes.push({ type: 'slash' });
      position += 1;
      continue;
    }

    if (token.slice(position, position + 2).toUpperCase() === 'DK') {
      lexemes.push({ type: 'to-end' });
      position += 2;
      continue;
    }

    if (char === '(') {
      const indicator = token.slice(position, position + 3);
      if (indicator === '(n)' || indicator === '(p)') {
        lexemes.push({ type: 'side', side: indicator === '(n)' ? 'odd' : 'even' });
        position += 3;
        continue;
      }
    }

    return { ok: false, reason: `unexpected '${char}' at ${position}` };
  }

  return { ok: true, lexemes };
}

/**
 * Classify a single (comma-free) range token.
 *
 * @example
 * classifyRangeToken('1-41(n)').kind      // 'side-range'
 * classifyRangeToken('55-69/71(n)').kind  // 'slash-range-high'
 * classifyRangeToken('2/4-10(p)').kind    // 'slash-range-low'
 * classifyRangeToken('abc-def').kind      // 'unrecognized'
 */
export function classifyRangeToken(token: string): RangeToken {
  const raw = token.trim();
  const unrecognized = (reason: string): RangeToken => ({
    kind: 'unrecognized',
    raw,
    reason,
  });

  if (raw.length === 0) {
    return unrecognized('empty token');
  }

  const result = lex(raw);
  if (!result.ok) {
    return unrecognized(result.reason);
  }

  let side: Side | null = null;
  const lexemes = [...result.lexemes];
  const last = lexemes[lexemes.length - 1];
  if (last && last.type === 'side') {
    side = last.side;
    lexemes.pop();
  }

  const numbers: HouseNumberRef[] = [];
  let shape = '';
  for (const lexeme of lexemes) {
    if (lexeme.type === 'side') {
      return unrecognized('side indicator must close the token');
    }
    if (lexeme.type === 'number') {
      numbers.push(lexeme.ref);
    }
    shape += SHAPE_SYMBOLS[lexeme.type];
  }

  switch (shape) {
    case 'N':
      return side
        ? unrecognized('side indicator on an individual number')
        : { kind: 'individual', number: numbers[0] };

    case 'N-N':
      return side
        ? { kind: 'side-range', start: numbers[0], end: numbers[1], side }
        : { kind: 'simple-range', start: numbers[0], end: numbers[1] };

    case 'N-K':
      return { kind: 'open-ended', start: numbers[0], side };

    case 'N/N':
      return side
        ? unrecognized('side indicator on a slash set')
        : { kind: 'slash-set', members: [numbers[0], numbers[1]] };

    case 'N/N-N/N':
      return {
        kind: 'slash-complex',
        members: [numbers[0], numbers[1], numbers[2], numbers[3]],
        side,
      };

    case 'N-N/N':
      return {
        kind: 'slash-range-high',
        start: numbers[0],
        mid: numbers[1],
        end: numbers[2],
        side,
      };

    case 'N/N-N':
      return {
        kind: 'slash-range-low',
        first: numbers[0],
        start: numbers[1],
        end: numbers[2],
        side,
      };

    default:
      return unrecognized(`unsupported shape '${shape}'`);
  }
}

/**
 * Split a range pattern on commas and classify every non-empty token.
 *
 * @example
 * parseRangePattern('270-336(p), 283-335(n)').map((t) => t.kind)
 * // ['side-range', 'side-range']
 */
export function parseRangePattern(pattern: string): RangeToken[] {
  return pattern
    .split(',')
    .map((token) => token.trim())
    .filter((token) => token.length > 0)
    .map(classifyRangeToken);
}
