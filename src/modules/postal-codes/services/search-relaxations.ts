import type { SearchPassCriteria } from '../interfaces/postal-code-search.interface';

/**
 * A way of widening a search that returned nothing.
 *
 * Relaxations are tried in list order and the first one that yields results
 * wins. `describe` receives the criteria before relaxing.
 */
export interface SearchRelaxation {
  readonly name: 'house-number' | 'street';
  appliesTo(criteria: SearchPassCriteria): boolean;
  relax(criteria: SearchPassCriteria): SearchPassCriteria;
  describe(criteria: SearchPassCriteria): string;
}

function describeLocation(criteria: SearchPassCriteria): string {
  const parts: string[] = [];
  if (criteria.street) {
    parts.push(`street '${criteria.street}'`);
  }
  if (criteria.city) {
    parts.push(`city '${criteria.city}'`);
  }
  return parts.length > 0 ? ` in ${parts.join(' in ')}` : '';
}

export const HOUSE_NUMBER_RELAXATION: SearchRelaxation = {
  name: 'house-number',

  appliesTo: (criteria) => Boolean(criteria.houseNumber),

  relax: ({ houseNumber: _houseNumber, ...rest }) => rest,

  describe: (criteria) => {
    const location = describeLocation(criteria);
    return `House number '${criteria.houseNumber ?? ''}' not found${location}. Showing all results${location}.`;
  },
};

export const STREET_RELAXATION: SearchRelaxation = {
  name: 'street',

  appliesTo: (criteria) => Boolean(criteria.city && criteria.street),

  relax: ({ street: _street, houseNumber: _houseNumber, ...rest }) => rest,

  describe: ({ city, street, houseNumber }) =>
    houseNumber
      ? `Street '${street ?? ''}' with house number '${houseNumber}' not found in ${city}. Showing all results for ${city}.`
      : `Street '${street ?? ''}' not found in ${city}. Showing all results for ${city}.`,
};

/** Drop the house number first, then the street. */
export const SEARCH_RELAXATIONS: readonly SearchRelaxation[] = [
  HOUSE_NUMBER_RELAXATION,
  STREET_RELAXATION,
];
