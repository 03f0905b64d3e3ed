import { Injectable } from '@nestjs/common';
import { toSearchKey } from '@common/utils/polish-text.utils';
import { trimToUndefined } from '@common/utils/text.utils';
import {
  PostalRecordRepository,
  type LocationField,
  type LocationFilters,
} from '../repositories/postal-record.repository';

export interface LocationQuery {
  province?: string;
  county?: string;
  municipality?: string;
  city?: string;
  prefix?: string;
}

interface LocationFilterEcho {
  filteredByProvince?: string;
  filteredByCounty?: string;
  filteredByMunicipality?: string;
  filteredByCity?: string;
  filteredByPrefix?: string;
}

export type ProvincesResponse = { provinces: string[]; count: number } & LocationFilterEcho;
export type CountiesResponse = { counties: string[]; count: number } & LocationFilterEcho;
export type MunicipalitiesResponse = { municipalities: string[]; count: number } & LocationFilterEcho;
export type CitiesResponse = { cities: string[]; count: number } & LocationFilterEcho;
export type StreetsResponse = { streets: string[]; count: number } & LocationFilterEcho;

/**
 * Case-insensitive prefix match that accepts both spellings: `lod` and `łód`
 * both match `Łódź`.
 */
export function matchesLocationPrefix(value: string, prefix: string): boolean {
  return (
    value.toLowerCase().startsWith(prefix.toLowerCase()) ||
    toSearchKey(value).startsWith(toSearchKey(prefix))
  );
}

/**
 * Locations Service
 *
 * Distinct administrative units and street names from the postal register,
 * for building cascading address pickers. Filters compare whole values
 * (case-insensitive); `prefix` narrows the listed values.
 */
@Injectable()
export class LocationsService {
  constructor(private readonly repository: PostalRecordRepository) {}

  async getProvinces(query: Pick<LocationQuery, 'prefix'> = {}): Promise<ProvincesResponse> {
    const { values, echo } = await this.list('province', query, []);
    return { provinces: values, count: values.length, ...echo };
  }

  async getCounties(
    query: Pick<LocationQuery, 'province' | 'prefix'> = {},
  ): Promise<CountiesResponse> {
    const { values, echo } = await this.list('county', query, ['province']);
    return { counties: values, count: values.length, ...echo };
  }

  async getMunicipalities(
    query: Pick<LocationQuery, 'province' | 'county' | 'prefix'> = {},
  ): Promise<MunicipalitiesResponse> {
    const { values, echo } = await this.list('municipality', query, ['province', 'county']);
    return { municipalities: values, count: values.length, ...echo };
  }

  async getCities(
    query: Pick<LocationQuery, 'province' | 'county' | 'municipality' | 'prefix'> = {},
  ): Promise<CitiesResponse> {
    const { values, echo } = await this.list('city', query, [
      'province',
      'county',
      'municipality',
    ]);
    return { cities: values, count: values.length, ...echo };
  }

  async getStreets(query: LocationQuery = {}): Promise<StreetsResponse> {
    const { values, echo } = await this.list('street', query, [
      'city',
      'province',
      'county',
      'municipality',
    ]);
    return { streets: values, count: values.length, ...echo };
  }

  private async list(
    field: LocationField,
    query: LocationQuery,
    filterFields: ReadonlyArray<Exclude<LocationField, 'street'>>,
  ): Promise<{ values: string[]; echo: LocationFilterEcho }> {
    const filters: LocationFilters = {};
    for (const filterField of filterFields) {
      const value = trimToUndefined(query[filterField]);
      if (value !== undefined) {
        filters[filterField] = value;
      }
    }

    const prefix = trimToUndefined(query.prefix);
    const distinct = await this.repository.distinct(field, filters);
    const values =
      prefix === undefined ? distinct : distinct.filter((value) => matchesLocationPrefix(value, prefix));

    return { values, echo: this.echoFilters(filters, prefix) };
  }

  private echoFilters(filters: LocationFilters, prefix: string | undefined): LocationFilterEcho {
    const echo: LocationFilterEcho = {};
    if (filters.province !== undefined) echo.filteredByProvince = filters.province;
    if (filters.county !== undefined) echo.filteredByCounty = filters.county;
    if (filters.municipality !== undefined) echo.filteredByMunicipality = filters.municipality;
    if (filters.city !== undefined) echo.filteredByCity = filters.city;
    if (prefix !== undefined) echo.filteredByPrefix = prefix;
    return echo;
  }
}
