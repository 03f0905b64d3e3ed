import {
  calculateBurstLimit,
  calculateDefaultLimit,
  calculateThrottlerLimits,
  getThrottlerConfigsArray,
} from '../../../src/modules/common/config/throttler-limits.helper';
import {
  RATE_LIMIT_ERROR_MESSAGE,
  ThrottlerConfigService,
  shouldSkipThrottling,
} from '../../../src/modules/common/config/throttler.config';
import { createTestConfigService } from '../../helpers/test-config';

describe('Throttler limits', () => {
  it('should use the configured per-minute limit as the default window', () => {
    expect(calculateDefaultLimit(100)).toEqual({ name: 'default', ttl: 60000, limit: 100 });
  });

  it('should derive the burst limit from the per-minute limit', () => {
    expect(calculateBurstLimit(100).limit).toBe(10);
    expect(calculateBurstLimit(30).limit).toBe(5);
    expect(calculateBurstLimit(3).limit).toBe(1);
    expect(calculateBurstLimit(1000).limit).toBe(10);
    expect(calculateBurstLimit(30).ttl).toBe(10000);
  });

  it('should return the windows in [default, burst] order', () => {
    expect(getThrottlerConfigsArray(60)).toEqual([
      { name: 'default', ttl: 60000, limit: 60 },
      { name: 'burst', ttl: 10000, limit: 10 },
    ]);
    expect(calculateThrottlerLimits(60).burst).toEqual({ name: 'burst', ttl: 10000, limit: 10 });
  });
});

describe('shouldSkipThrottling', () => {
  it('should always skip health endpoints', () => {
    expect(shouldSkipThrottling('/api/health', 'production')).toBe(true);
    expect(shouldSkipThrottling('/api/health/ready', 'staging')).toBe(true);
  });

  it('should skip everything in development and test', () => {
    expect(shouldSkipThrottling('/api/postal-codes', 'development')).toBe(true);
    expect(shouldSkipThrottling('/api/postal-codes', 'test')).toBe(true);
  });

  it('should throttle API endpoints in staging and production', () => {
    expect(shouldSkipThrottling('/api/postal-codes', 'staging')).toBe(false);
    expect(shouldSkipThrottling('/api/locations/cities', 'production')).toBe(false);
  });
});

describe('ThrottlerConfigService', () => {
  it('should build throttler options from APP_RATE_LIMIT_PER_MINUTE', () => {
    const service = new ThrottlerConfigService(
      createTestConfigService({ APP_RATE_LIMIT_PER_MINUTE: '30' }),
    );

    const options = service.createThrottlerOptions();

    expect(Array.isArray(options)).toBe(false);
    if (!Array.isArray(options)) {
      expect(options.throttlers).toEqual([
        { name: 'default', ttl: 60000, limit: 30 },
        { name: 'burst', ttl: 10000, limit: 5 },
      ]);
      expect(options.errorMessage).toBe(RATE_LIMIT_ERROR_MESSAGE);
    }
  });
});
