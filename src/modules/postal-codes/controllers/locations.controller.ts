import { Controller, Get, Query } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ErrorResponseDto } from '../dto/error-response.dto';
import {
  CitiesQueryDto,
  CountiesQueryDto,
  MunicipalitiesQueryDto,
  ProvincesQueryDto,
  StreetsQueryDto,
} from '../dto/location-query.dto';
import {
  LocationsService,
  type CitiesResponse,
  type CountiesResponse,
  type MunicipalitiesResponse,
  type ProvincesResponse,
  type StreetsResponse,
} from '../services/locations.service';

interface LocationsIndexResponse {
  endpoints: Record<string, { path: string; filters: string[] }>;
}

@ApiTags('Locations')
@ApiResponse({ status: 400, description: 'Invalid query parameters', type: ErrorResponseDto })
@Controller('api/locations')
export class LocationsController {
  constructor(private readonly locationsService: LocationsService) {}

  @Get()
  @ApiOperation({ summary: 'List the location endpoints and their filters' })
  getIndex(): LocationsIndexResponse {
    return {
      endpoints: {
        provinces: { path: '/api/locations/provinces', filters: ['prefix'] },
        counties: { path: '/api/locations/counties', filters: ['province', 'prefix'] },
        municipalities: {
          path: '/api/locations/municipalities',
          filters: ['province', 'county', 'prefix'],
        },
        cities: {
          path: '/api/locations/cities',
          filters: ['province', 'county', 'municipality', 'prefix'],
        },
        streets: {
          path: '/api/locations/streets',
          filters: ['city', 'province', 'county', 'municipality', 'prefix'],
        },
      },
    };
  }

  @Get('provinces')
  @ApiOperation({ summary: 'Provinces (województwa)' })
  async getProvinces(@Query() query: ProvincesQueryDto): Promise<ProvincesResponse> {
    return this.locationsService.getProvinces(query);
  }

  @Get('counties')
  @ApiOperation({ summary: 'Counties (powiaty), optionally within a province' })
  async getCounties(@Query() query: CountiesQueryDto): Promise<CountiesResponse> {
    return this.locationsService.getCounties(query);
  }

  @Get('municipalities')
  @ApiOperation({ summary: 'Municipalities (gminy), optionally within a province and county' })
  async getMunicipalities(
    @Query() query: MunicipalitiesQueryDto,
  ): Promise<MunicipalitiesResponse> {
    return this.locationsService.getMunicipalities(query);
  }

  @Get('cities')
  @ApiOperation({ summary: 'Cities and villages' })
  async getCities(@Query() query: CitiesQueryDto): Promise<CitiesResponse> {
    return this.locationsService.getCities(query);
  }

  @Get('streets')
  @ApiOperation({ summary: 'Street names, optionally within a city' })
  async getStreets(@Query() query: StreetsQueryDto): Promise<StreetsResponse> {
    return this.locationsService.getStreets(query);
  }
}
