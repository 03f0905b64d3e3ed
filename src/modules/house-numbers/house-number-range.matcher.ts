import {
  INDIVIDUAL_PATTERN,
  classifyRangeToken,
  parseHouseNumber,
  parseRangePattern,
} from './house-number-range.parser';
import type {
  HouseNumberQuery,
  HouseNumberRef,
  RangeToken,
  Side,
} from './house-number-range.types';

/**
 * House Number Range Matcher
 *
 * Decides whether a house number belongs to a postal record's range pattern.
 *
 * Contract:
 * - Pure and synchronous.
 * - Never throws. Blank input and unclassifiable tokens do not match.
 * - A pattern matches when ANY of its comma-separated tokens matches.
 */

function hasParity(value: bigint, side: Side | null): boolean {
  if (side === null) {
    return true;
  }
  return side === 'odd' ? value % 2n === 1n : value % 2n === 0n;
}

/**
 * Exact comparison used by individual tokens and slash-set members.
 * A lettered reference (`35c`) only equals the identical house number;
 * a bare one (`35`) equals any house number with numeric part 35.
 */
function equalsReference(house: HouseNumberQuery, ref: HouseNumberRef): boolean {
  if (ref.letter !== null) {
    return house.raw === ref.raw;
  }
  return house.numeric === ref.value;
}

/**
 * A lettered lower bound (`6a` in `6a-DK`) does not admit the bare number
 * with the same numeric part: `6` is a different building than `6a`.
 */
function admittedByLowerBound(numeric: bigint, house: HouseNumberQuery, start: HouseNumberRef): boolean {
  if (start.letter !== null && house.letter === null && numeric === start.value) {
    return false;
  }
  return numeric >= start.value;
}

function withinBounds(numeric: bigint, start: HouseNumberRef, end: HouseNumberRef): boolean {
  return start.value <= numeric && numeric <= end.value;
}

/**
 * Evaluate a single classified token against a parsed house number.
 */
export function matchesRangeToken(house: HouseNumberQuery, token: RangeToken): boolean {
  const numeric = house.numeric;

  if (numeric === null) {
    // Without a numeric part only an exact lettered individual could match.
    return token.kind === 'individual' && token.number.letter !== null
      ? house.raw === token.number.raw
      : false;
  }

  switch (token.kind) {
    case 'individual':
      return equalsReference(house, token.number);

    case 'simple-range':
      return withinBounds(numeric, token.start, token.end);

    case 'side-range':
      return withinBounds(numeric, token.start, token.end) && hasParity(numeric, token.side);

    case 'open-ended':
      return admittedByLowerBound(numeric, house, token.start) && hasParity(numeric, token.side);

    case 'slash-set':
      return token.members.some((member) => equalsReference(house, member));

    case 'slash-range-high': {
      const inRange =
        admittedByLowerBound(numeric, house, token.start) && numeric <= token.mid.value;
      return (inRange || equalsReference(house, token.end)) && hasParity(numeric, token.side);
    }

    case 'slash-range-low':
      return (
        admittedByLowerBound(numeric, house, token.start) &&
        numeric <= token.end.value &&
        hasParity(numeric, token.side)
      );

    case 'slash-complex':
      return (
        token.members.some((member) => equalsReference(house, member)) &&
        hasParity(numeric, token.side)
      );

    case 'unrecognized':
      return false;

    default: {
      const exhaustive: never = token;
      return exhaustive;
    }
  }
}

/**
 * Check whether `houseNumber` falls within `rangePattern`.
 *
 * @param houseNumber - House number as typed by the user, e.g. `"12"` or `"4a"`
 * @param rangePattern - Range pattern from the dataset, e.g. `"270-336(p), 283-335(n)"`
 *
 * @example
 * matchesHouseNumber('283', '270-336(p), 283-335(n)') // true
 * matchesHouseNumber('6', '6a-DK(p)')                  // false
 * matchesHouseNumber('4', '2/4-10(p)')                 // true
 * matchesHouseNumber('', '1-10')                       // false
 */
export function matchesHouseNumber(houseNumber: string, rangePattern: string): boolean {
  const house = parseHouseNumber(houseNumber);
  const pattern = rangePattern.trim();

  if (house.raw.length === 0 || pattern.length === 0) {
    return false;
  }

  if (INDIVIDUAL_PATTERN.test(pattern)) {
    return matchesRangeToken(house, classifyRangeToken(pattern));
  }

  return parseRangePattern(pattern).some((token) => matchesRangeToken(house, token));
}
