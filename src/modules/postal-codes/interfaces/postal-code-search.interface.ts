import type { PostalRecord } from '@schemas/postal-record.schema';

/**
 * Search input as accepted by PostalCodeSearchService.
 * Blank strings are treated like absent values.
 */
export interface PostalCodeSearchCriteria {
  city: string;
  street?: string;
  houseNumber?: string;
  province?: string;
  county?: string;
  municipality?: string;
  /** Falls back to APP_SEARCH_DEFAULT_LIMIT, capped at APP_SEARCH_MAX_LIMIT */
  limit?: number;
}

/**
 * Criteria of a single search pass: trimmed, blanks removed, no limit.
 */
export interface SearchPassCriteria {
  city: string;
  street?: string;
  houseNumber?: string;
  province?: string;
  county?: string;
  municipality?: string;
}

export type SearchType = 'exact' | 'polish_characters';

export interface PostalCodeSearchResponse {
  results: PostalRecord[];
  count: number;
  searchType: SearchType;
  /** Explains a relaxed or normalized search */
  message?: string;
  fallbackUsed?: boolean;
  polishNormalizationUsed?: boolean;
}

export interface PostalCodeLookupResponse {
  postalCode: string;
  results: PostalRecord[];
  count: number;
}
