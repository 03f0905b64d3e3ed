import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsNotEmpty, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';
import { SEARCH_LIMIT_CEILING } from '@config/environment.schema';
import { TrimToUndefined } from '@common/decorators/trim-to-undefined.decorator';

/**
 * Query parameters of GET /api/postal-codes
 *
 * Validated by AppValidationPipe; blank values are treated as absent.
 */
export class PostalCodeSearchQueryDto {
  @ApiProperty({
    description: 'City name, matched as a case-insensitive prefix',
    example: 'Wrocław',
    maxLength: 100,
  })
  @TrimToUndefined()
  @IsNotEmpty({ message: 'city is required' })
  @IsString({ message: 'city must be a string' })
  @MaxLength(100)
  city!: string;

  @ApiPropertyOptional({
    description: 'Street name, matched as a case-insensitive substring',
    example: 'Grabiszyńska',
    maxLength: 100,
  })
  @TrimToUndefined()
  @IsOptional()
  @IsString()
  @MaxLength(100)
  street?: string;

  @ApiPropertyOptional({
    description: 'House number, checked against each record\'s house number ranges',
    example: '12a',
    maxLength: 20,
  })
  @TrimToUndefined()
  @IsOptional()
  @IsString()
  @MaxLength(20)
  houseNumber?: string;

  @ApiPropertyOptional({ description: 'Province (województwo), exact match', example: 'dolnośląskie' })
  @TrimToUndefined()
  @IsOptional()
  @IsString()
  @MaxLength(100)
  province?: string;

  @ApiPropertyOptional({ description: 'County (powiat), exact match', example: 'Wrocław' })
  @TrimToUndefined()
  @IsOptional()
  @IsString()
  @MaxLength(100)
  county?: string;

  @ApiPropertyOptional({ description: 'Municipality (gmina), exact match', example: 'Wrocław' })
  @TrimToUndefined()
  @IsOptional()
  @IsString()
  @MaxLength(100)
  municipality?: string;

  @ApiPropertyOptional({
    description:
      'Maximum number of results. Defaults to APP_SEARCH_DEFAULT_LIMIT and is capped at APP_SEARCH_MAX_LIMIT',
    example: 100,
    minimum: 1,
    maximum: SEARCH_LIMIT_CEILING,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'limit must be an integer' })
  @Min(1)
  @Max(SEARCH_LIMIT_CEILING)
  limit?: number;
}
