import type { PostalRecord } from '@schemas/postal-record.schema';

/**
 * Location columns a postal record can be filtered or grouped by.
 */
export type LocationField = 'province' | 'county' | 'municipality' | 'city' | 'street';

/**
 * Store-level search criteria. The house number is deliberately absent:
 * range patterns are evaluated by the caller, not by the store.
 */
export interface PostalRecordCriteria {
  city?: string;
  street?: string;
  province?: string;
  county?: string;
  municipality?: string;
}

export interface FindOptions {
  /** Compare diacritic-free forms of both the criteria and the records. */
  normalized: boolean;
  limit: number;
}

export type LocationFilters = Partial<Record<LocationField, string>>;

/**
 * Postal Record Repository
 *
 * Read-only access to the postal register. Registered in the DI container
 * under this abstract class, so tests can swap the implementation with
 * `overrideProvider(PostalRecordRepository)`.
 *
 * Matching rules for {@link find} (all case-insensitive):
 * - city: prefix match
 * - street: substring match
 * - province / county / municipality: equality
 */
export abstract class PostalRecordRepository {
  abstract find(criteria: PostalRecordCriteria, options: FindOptions): Promise<PostalRecord[]>;

  abstract findByPostalCode(postalCode: string): Promise<PostalRecord[]>;

  /**
   * Sorted distinct non-empty values of `field` among records whose columns
   * equal every given filter.
   */
  abstract distinct(field: LocationField, filters: LocationFilters): Promise<string[]>;

  abstract count(): Promise<number>;
}
