import type { PostalRecord } from '@schemas/postal-record.schema';
import { toSearchKey } from '@common/utils/polish-text.utils';
import {
  PostalRecordRepository,
  type FindOptions,
  type LocationField,
  type LocationFilters,
  type PostalRecordCriteria,
} from './postal-record.repository';

const LOCATION_FIELDS: readonly LocationField[] = [
  'province',
  'county',
  'municipality',
  'city',
  'street',
];

type SearchKeys = Record<LocationField, string | null>;

interface IndexedRecord {
  record: PostalRecord;
  /** Lower-cased column values */
  keys: SearchKeys;
  /** Lower-cased, diacritic-free column values */
  normalizedKeys: SearchKeys;
}

function buildKeys(record: PostalRecord, toKey: (value: string) => string): SearchKeys {
  const keys: SearchKeys = {
    province: null,
    county: null,
    municipality: null,
    city: null,
    street: null,
  };
  for (const field of LOCATION_FIELDS) {
    const value = record[field];
    keys[field] = value === null ? null : toKey(value);
  }
  return keys;
}

const toLowerKey = (value: string): string => value.toLowerCase();

/**
 * In-memory postal register
 *
 * Holds the whole dataset loaded at startup. Search keys are computed once
 * per record, after which the store is read-only.
 */
export class InMemoryPostalRecordRepository extends PostalRecordRepository {
  private readonly records: readonly IndexedRecord[];

  constructor(records: readonly PostalRecord[]) {
    super();
    this.records = records.map((record) => ({
      record,
      keys: buildKeys(record, toLowerKey),
      normalizedKeys: buildKeys(record, toSearchKey),
    }));
  }

  async find(criteria: PostalRecordCriteria, options: FindOptions): Promise<PostalRecord[]> {
    const toKey = options.normalized ? toSearchKey : toLowerKey;
    const city = criteria.city ? toKey(criteria.city) : null;
    const street = criteria.street ? toKey(criteria.street) : null;
    const equalities = (['province', 'county', 'municipality'] as const)
      .map((field) => {
        const value = criteria[field];
        return value ? { field, key: toKey(value) } : null;
      })
      .filter((entry): entry is { field: 'province' | 'county' | 'municipality'; key: string } =>
        entry !== null,
      );

    const results: PostalRecord[] = [];
    for (const indexed of this.records) {
      if (results.length >= options.limit) {
        break;
      }

      const keys = options.normalized ? indexed.normalizedKeys : indexed.keys;

      if (city !== null && !(keys.city ?? '').startsWith(city)) {
        continue;
      }
      if (street !== null && !(keys.street !== null && keys.street.includes(street))) {
        continue;
      }
      if (!equalities.every(({ field, key }) => keys[field] === key)) {
        continue;
      }

      results.push(indexed.record);
    }

    return results;
  }

  async findByPostalCode(postalCode: string): Promise<PostalRecord[]> {
    return this.records
      .filter(({ record }) => record.postalCode === postalCode)
      .map(({ record }) => record);
  }

  async distinct(field: LocationField, filters: LocationFilters): Promise<string[]> {
    const activeFilters = LOCATION_FIELDS.flatMap((filterField) => {
      const value = filters[filterField];
      return value ? [{ field: filterField, key: toLowerKey(value) }] : [];
    });

    const values = new Set<string>();
    for (const { record, keys } of this.records) {
      const value = record[field];
      if (value === null) {
        continue;
      }
      if (activeFilters.every(({ field: filterField, key }) => keys[filterField] === key)) {
        values.add(value);
      }
    }

    return [...values].sort((a, b) => a.localeCompare(b, 'pl'));
  }

  async count(): Promise<number> {
    return this.records.length;
  }
}
