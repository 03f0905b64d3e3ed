import { FactoryProvider, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Environment } from '@config/environment.schema';
import { PostalRecordRepository } from '../repositories/postal-record.repository';
import { InMemoryPostalRecordRepository } from '../repositories/in-memory-postal-record.repository';
import { loadPostalDataset } from './postal-dataset.loader';

/**
 * Provider for the postal record store
 *
 * Loads the dataset from POSTAL_DATA_PATH once, while the module initializes.
 * A broken dataset rejects the factory, which aborts bootstrap.
 *
 * Integration tests replace it with a fixture-backed store:
 * ```typescript
 * Test.createTestingModule({ imports: [AppModule] })
 *   .overrideProvider(PostalRecordRepository)
 *   .useValue(new InMemoryPostalRecordRepository(records));
 * ```
 */
export const PostalRecordRepositoryProvider: FactoryProvider<PostalRecordRepository> = {
  provide: PostalRecordRepository,
  inject: [ConfigService],
  useFactory: async (
    configService: ConfigService<Environment, true>,
  ): Promise<PostalRecordRepository> => {
    const logger = new Logger('PostalDataset');
    const dataPath = configService.get('POSTAL_DATA_PATH', { infer: true });
    const startTime = Date.now();

    const records = await loadPostalDataset(dataPath);

    logger.log(`Loaded ${records.length} postal records`, {
      dataPath,
      duration: Date.now() - startTime,
    });

    if (records.length === 0) {
      logger.warn('Postal dataset is empty - every search will return no results', {
        dataPath,
      });
    }

    return new InMemoryPostalRecordRepository(records);
  },
};
