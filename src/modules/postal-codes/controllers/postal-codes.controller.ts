import { Controller, Get, Param, Query } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { CorrelationId } from '@common/decorators/correlation-id.decorator';
import { ErrorResponseDto } from '../dto/error-response.dto';
import { PostalCodeParamDto } from '../dto/postal-code-param.dto';
import { PostalCodeSearchQueryDto } from '../dto/postal-code-search-query.dto';
import type {
  PostalCodeLookupResponse,
  PostalCodeSearchResponse,
} from '../interfaces/postal-code-search.interface';
import { PostalCodeSearchService } from '../services/postal-code-search.service';

@ApiTags('Postal codes')
@Controller('api/postal-codes')
export class PostalCodesController {
  constructor(private readonly searchService: PostalCodeSearchService) {}

  @Get()
  @ApiOperation({
    summary: 'Find postal codes for an address',
    description:
      'Filters the postal register by location and house number. When nothing matches, ' +
      'the search is retried without Polish diacritics, then without the house number, ' +
      'then without the street. The response tells which fallback was used.',
  })
  @ApiResponse({ status: 200, description: 'Search results (possibly empty)' })
  @ApiResponse({ status: 400, description: 'Invalid query parameters', type: ErrorResponseDto })
  @ApiResponse({ status: 429, description: 'Rate limit exceeded', type: ErrorResponseDto })
  async search(
    @Query() query: PostalCodeSearchQueryDto,
    @CorrelationId() correlationId: string,
  ): Promise<PostalCodeSearchResponse> {
    return this.searchService.search(query, correlationId);
  }

  @Get(':postalCode')
  @ApiOperation({
    summary: 'List addresses of a postal code',
    description: 'Accepts XX-XXX or XXXXX.',
  })
  @ApiResponse({ status: 200, description: 'Records with this postal code' })
  @ApiResponse({ status: 400, description: 'Malformed postal code', type: ErrorResponseDto })
  @ApiResponse({ status: 404, description: 'Postal code not in the register', type: ErrorResponseDto })
  async getByPostalCode(
    @Param() params: PostalCodeParamDto,
    @CorrelationId() correlationId: string,
  ): Promise<PostalCodeLookupResponse> {
    return this.searchService.findByPostalCode(params.postalCode, correlationId);
  }
}
