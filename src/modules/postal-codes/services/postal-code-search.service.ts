import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Environment } from '@config/environment.schema';
import type { PostalRecord } from '@schemas/postal-record.schema';
import { BusinessException } from '@common/exceptions/business-exceptions';
import { normalizeOptionalText, normalizePolishText } from '@common/utils/polish-text.utils';
import { toCanonicalPostalCode } from '@common/utils/postal-code.utils';
import { trimToUndefined } from '@common/utils/text.utils';
import { matchesHouseNumber } from '@modules/house-numbers/house-number-range.matcher';
import { PostalRecordRepository } from '../repositories/postal-record.repository';
import type {
  PostalCodeLookupResponse,
  PostalCodeSearchCriteria,
  PostalCodeSearchResponse,
  SearchPassCriteria,
} from '../interfaces/postal-code-search.interface';
import { SEARCH_RELAXATIONS, type SearchRelaxation } from './search-relaxations';

/**
 * One step of the search cascade.
 */
export interface SearchPlan {
  /** Compare diacritic-free forms on both sides */
  normalized: boolean;
  relaxation: SearchRelaxation | null;
}

/**
 * Order in which the cascade is tried; the first plan with results wins:
 * 1. exact
 * 2. Polish-normalized
 * 3. exact with each relaxation
 * 4. normalized with each relaxation
 */
export const SEARCH_PLANS: readonly SearchPlan[] = [
  { normalized: false, relaxation: null },
  { normalized: true, relaxation: null },
  ...SEARCH_RELAXATIONS.map((relaxation) => ({ normalized: false, relaxation })),
  ...SEARCH_RELAXATIONS.map((relaxation) => ({ normalized: true, relaxation })),
];

const NORMALIZATION_SUFFIX = ' Polish characters were normalized for search.';
const NORMALIZATION_MESSAGE = 'Search performed with Polish character normalization.';

function normalizeCriteria(criteria: SearchPassCriteria): SearchPassCriteria {
  return {
    city: normalizePolishText(criteria.city),
    street: normalizeOptionalText(criteria.street),
    houseNumber: normalizeOptionalText(criteria.houseNumber),
    province: normalizeOptionalText(criteria.province),
    county: normalizeOptionalText(criteria.county),
    municipality: normalizeOptionalText(criteria.municipality),
  };
}

/**
 * Postal Code Search Service
 *
 * Address → postal code lookup. Location filters are answered by the record
 * store; the house number is checked here against each candidate's range
 * pattern, since the store cannot evaluate range patterns.
 */
@Injectable()
export class PostalCodeSearchService {
  private readonly logger = new Logger(PostalCodeSearchService.name);
  private readonly defaultLimit: number;
  private readonly maxLimit: number;
  private readonly scanMultiplier: number;
  private readonly scanCap: number;

  constructor(
    private readonly repository: PostalRecordRepository,
    configService: ConfigService<Environment, true>,
  ) {
    this.defaultLimit = configService.get('APP_SEARCH_DEFAULT_LIMIT', { infer: true });
    this.maxLimit = configService.get('APP_SEARCH_MAX_LIMIT', { infer: true });
    this.scanMultiplier = configService.get('APP_HOUSE_NUMBER_SCAN_MULTIPLIER', { infer: true });
    this.scanCap = configService.get('APP_HOUSE_NUMBER_SCAN_CAP', { infer: true });
  }

  async search(
    criteria: PostalCodeSearchCriteria,
    correlationId?: string,
  ): Promise<PostalCodeSearchResponse> {
    const limit = this.resolveLimit(criteria.limit);
    const exact: SearchPassCriteria = {
      city: criteria.city.trim(),
      street: trimToUndefined(criteria.street),
      houseNumber: trimToUndefined(criteria.houseNumber),
      province: trimToUndefined(criteria.province),
      county: trimToUndefined(criteria.county),
      municipality: trimToUndefined(criteria.municipality),
    };
    const normalized = normalizeCriteria(exact);

    for (const [index, plan] of SEARCH_PLANS.entries()) {
      const base = plan.normalized ? normalized : exact;
      if (plan.relaxation && !plan.relaxation.appliesTo(base)) {
        continue;
      }

      const passCriteria = plan.relaxation ? plan.relaxation.relax(base) : base;
      const results = await this.runPass(passCriteria, plan.normalized, limit);

      if (results.length > 0) {
        if (index > 0) {
          this.logger.debug('Search succeeded with fallback plan', {
            correlationId,
            plan: index,
            normalized: plan.normalized,
            relaxation: plan.relaxation?.name ?? null,
            count: results.length,
          });
        }
        return this.buildResponse(results, plan, base);
      }
    }

    this.logger.debug('Search returned no results', { correlationId, city: exact.city });
    return { results: [], count: 0, searchType: 'exact' };
  }

  /**
   * All records of a postal code.
   *
   * @param postalCode - `XX-XXX` or five bare digits
   * @throws BusinessException INVALID_POSTAL_CODE_FORMAT / POSTAL_CODE_NOT_FOUND
   */
  async findByPostalCode(
    postalCode: string,
    correlationId: string,
  ): Promise<PostalCodeLookupResponse> {
    const canonical = toCanonicalPostalCode(postalCode);
    if (canonical === null) {
      throw new BusinessException({
        errorCode: 'INVALID_POSTAL_CODE_FORMAT',
        message: 'Invalid postal code format. Expected XX-XXX or XXXXX.',
        correlationId,
        source: 'INTERNAL',
        details: { postalCode },
      });
    }

    const results = await this.repository.findByPostalCode(canonical);
    if (results.length === 0) {
      throw new BusinessException({
        errorCode: 'POSTAL_CODE_NOT_FOUND',
        message: `Postal code ${canonical} not found`,
        correlationId,
        source: 'POSTAL_DATASET',
        details: { postalCode: canonical },
      });
    }

    return { postalCode: canonical, results, count: results.length };
  }

  resolveLimit(requested: number | undefined): number {
    const limit = requested ?? this.defaultLimit;
    return Math.min(Math.max(1, Math.floor(limit)), this.maxLimit);
  }

  /**
   * Query the store and, when a house number is given, keep only records
   * whose range pattern contains it. Records without a pattern never match
   * a house number. More candidates than `limit` are fetched in that case,
   * since some of them will be filtered out.
   */
  private async runPass(
    criteria: SearchPassCriteria,
    normalized: boolean,
    limit: number,
  ): Promise<PostalRecord[]> {
    const { houseNumber, ...location } = criteria;

    if (!houseNumber) {
      return this.repository.find(location, { normalized, limit });
    }

    const scanLimit = Math.min(limit * this.scanMultiplier, this.scanCap);
    const candidates = await this.repository.find(location, { normalized, limit: scanLimit });

    const matched: PostalRecord[] = [];
    for (const record of candidates) {
      if (record.houseNumbers !== null && matchesHouseNumber(houseNumber, record.houseNumbers)) {
        matched.push(record);
        if (matched.length >= limit) {
          break;
        }
      }
    }
    return matched;
  }

  private buildResponse(
    results: PostalRecord[],
    plan: SearchPlan,
    criteria: SearchPassCriteria,
  ): PostalCodeSearchResponse {
    const fallbackMessage = plan.relaxation ? plan.relaxation.describe(criteria) : undefined;

    const response: PostalCodeSearchResponse = {
      results,
      count: results.length,
      searchType: plan.normalized ? 'polish_characters' : 'exact',
    };

    if (fallbackMessage !== undefined) {
      response.message = fallbackMessage;
      response.fallbackUsed = true;
    }

    if (plan.normalized) {
      response.message =
        fallbackMessage !== undefined
          ? `${fallbackMessage}${NORMALIZATION_SUFFIX}`
          : NORMALIZATION_MESSAGE;
      response.polishNormalizationUsed = true;
    }

    return response;
  }
}
