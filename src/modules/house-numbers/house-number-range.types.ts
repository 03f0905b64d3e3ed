/**
 * House number range types
 *
 * A range pattern (the `houseNumbers` column of a postal record) is a
 * comma-separated list of range tokens. Every token is classified into exactly
 * one variant of {@link RangeToken}; the evaluator switches over `kind`
 * exhaustively, so adding a variant without handling it is a compile error.
 *
 * Notation reference (Polish postal register):
 * - `60`, `35c`            individual house number
 * - `1-12`, `31-31a`       simple range
 * - `1-41(n)`, `2-38(p)`   side-restricted range, n = nieparzyste (odd), p = parzyste (even)
 * - `337-DK`, `2-DK(p)`    open-ended range, DK = "do końca" (to the end)
 * - `2/4`                  two-element set
 * - `55-69/71(n)`          range up to 69 plus 71
 * - `2/4-10(p)`            range anchored at 4 (2 is not part of it)
 * - `1/3-23/25(n)`         four-element set
 */

export type Side = 'odd' | 'even';

/**
 * A house number as written in a range pattern: numeric part plus an optional
 * single lowercase letter suffix. Digit runs have no length limit, hence bigint.
 */
export interface HouseNumberRef {
  raw: string;
  value: bigint;
  letter: string | null;
}

/**
 * A house number supplied by a caller. Unlike {@link HouseNumberRef} the
 * numeric part may be missing ("abc", "bud. 3").
 */
export interface HouseNumberQuery {
  raw: string;
  numeric: bigint | null;
  letter: string | null;
}

export interface IndividualToken {
  kind: 'individual';
  number: HouseNumberRef;
}

export interface SimpleRangeToken {
  kind: 'simple-range';
  start: HouseNumberRef;
  end: HouseNumberRef;
}

export interface SideRangeToken {
  kind: 'side-range';
  start: HouseNumberRef;
  end: HouseNumberRef;
  side: Side;
}

export interface OpenEndedToken {
  kind: 'open-ended';
  start: HouseNumberRef;
  side: Side | null;
}

export interface SlashSetToken {
  kind: 'slash-set';
  members: [HouseNumberRef, HouseNumberRef];
}

/** `start-mid/end`: a range closed at `mid`, plus the single number `end`. */
export interface SlashRangeHighToken {
  kind: 'slash-range-high';
  start: HouseNumberRef;
  mid: HouseNumberRef;
  end: HouseNumberRef;
  side: Side | null;
}

/** `first/start-end`: only `start` anchors the range, `first` is not a member. */
export interface SlashRangeLowToken {
  kind: 'slash-range-low';
  first: HouseNumberRef;
  start: HouseNumberRef;
  end: HouseNumberRef;
  side: Side | null;
}

export interface SlashComplexToken {
  kind: 'slash-complex';
  members: [HouseNumberRef, HouseNumberRef, HouseNumberRef, HouseNumberRef];
  side: Side | null;
}

/** Anything the tokenizer could not classify. Never matches. */
export interface UnrecognizedToken {
  kind: 'unrecognized';
  raw: string;
  reason: string;
}

export type RangeToken =
  | IndividualToken
  | SimpleRangeToken
  | SideRangeToken
  | OpenEndedToken
  | SlashSetToken
  | SlashRangeHighToken
  | SlashRangeLowToken
  | SlashComplexToken
  | UnrecognizedToken;
