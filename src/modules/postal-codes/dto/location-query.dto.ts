import { ApiPropertyOptional, PickType } from '@nestjs/swagger';
import { IsOptional, IsString, MaxLength } from 'class-validator';
import { TrimToUndefined } from '@common/decorators/trim-to-undefined.decorator';

/**
 * All filters accepted by the /api/locations endpoints. Each endpoint takes
 * the subset picked below, so unknown filters are rejected by the whitelist.
 */
export class LocationQueryDto {
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

  @ApiPropertyOptional({ description: 'City, exact match', example: 'Wrocław' })
  @TrimToUndefined()
  @IsOptional()
  @IsString()
  @MaxLength(100)
  city?: string;

  @ApiPropertyOptional({
    description: 'Name prefix, case-insensitive, with or without Polish characters',
    example: 'lod',
  })
  @TrimToUndefined()
  @IsOptional()
  @IsString()
  @MaxLength(100)
  prefix?: string;
}

export class ProvincesQueryDto extends PickType(LocationQueryDto, ['prefix'] as const) {}

export class CountiesQueryDto extends PickType(LocationQueryDto, ['province', 'prefix'] as const) {}

export class MunicipalitiesQueryDto extends PickType(LocationQueryDto, [
  'province',
  'county',
  'prefix',
] as const) {}

export class CitiesQueryDto extends PickType(LocationQueryDto, [
  'province',
  'county',
  'municipality',
  'prefix',
] as const) {}

export class StreetsQueryDto extends LocationQueryDto {}
