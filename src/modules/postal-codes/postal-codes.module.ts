import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { PostalCodesController } from './controllers/postal-codes.controller';
import { LocationsController } from './controllers/locations.controller';
import { HealthController } from './controllers/health.controller';
import { PostalCodeSearchService } from './services/postal-code-search.service';
import { LocationsService } from './services/locations.service';
import { PostalRecordRepositoryProvider } from './dataset/postal-record-repository.provider';

/**
 * Postal Codes Module
 *
 * - Address → postal code search with the fallback cascade
 * - Postal code → addresses lookup
 * - Location listings (provinces, counties, municipalities, cities, streets)
 * - Health endpoints; readiness depends on the loaded dataset, so the
 *   HealthController lives here rather than in CommonModule
 *
 * The record store is loaded once by PostalRecordRepositoryProvider.
 */
@Module({
  imports: [TerminusModule],
  controllers: [PostalCodesController, LocationsController, HealthController],
  providers: [PostalRecordRepositoryProvider, PostalCodeSearchService, LocationsService],
  exports: [PostalCodeSearchService, LocationsService],
})
export class PostalCodesModule {}
