import {
  DEFAULT_POSTAL_DATA_PATH,
  EnvironmentSchema,
} from '../../../src/config/environment.schema';

describe('EnvironmentSchema', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    // Reset process.env before each test
    process.env = { ...originalEnv };
    delete process.env.POSTAL_DATA_PATH;
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  describe('Development Environment', () => {
    it('should use default values for optional fields', () => {
      const result = EnvironmentSchema.parse({ NODE_ENV: 'development' });

      expect(result.PORT).toBe(3000);
      expect(result.POSTAL_DATA_PATH).toBe(DEFAULT_POSTAL_DATA_PATH);
      expect(result.APP_SEARCH_DEFAULT_LIMIT).toBe(100);
      expect(result.APP_SEARCH_MAX_LIMIT).toBe(1000);
      expect(result.APP_HOUSE_NUMBER_SCAN_MULTIPLIER).toBe(5);
      expect(result.APP_HOUSE_NUMBER_SCAN_CAP).toBe(1000);
      expect(result.APP_RATE_LIMIT_PER_MINUTE).toBe(100);
      expect(result.APP_SWAGGER_ENABLED).toBe(true);
      expect(result.APP_ENABLE_HELMET).toBe(true);
      expect(result.APP_CORS_ALLOWED_ORIGINS).toEqual([
        'http://localhost:3000',
        'http://localhost:5173',
      ]);
    });

    it('should default NODE_ENV to development', () => {
      expect(EnvironmentSchema.parse({}).NODE_ENV).toBe('development');
    });

    it('should coerce numeric strings', () => {
      const result = EnvironmentSchema.parse({
        PORT: '8080',
        APP_SEARCH_DEFAULT_LIMIT: '25',
        APP_SEARCH_MAX_LIMIT: '50',
      });

      expect(result.PORT).toBe(8080);
      expect(result.APP_SEARCH_DEFAULT_LIMIT).toBe(25);
      expect(result.APP_SEARCH_MAX_LIMIT).toBe(50);
    });

    it('should allow APP_CORS_ALLOWED_ORIGINS="*" in development', () => {
      const result = EnvironmentSchema.parse({ APP_CORS_ALLOWED_ORIGINS: '*' });

      expect(result.APP_CORS_ALLOWED_ORIGINS).toEqual(['*']);
    });

    it('should parse comma-separated CORS origins correctly', () => {
      const result = EnvironmentSchema.parse({
        APP_CORS_ALLOWED_ORIGINS: 'http://localhost:3000, http://localhost:5173 , ,http://127.0.0.1:3000',
      });

      expect(result.APP_CORS_ALLOWED_ORIGINS).toEqual([
        'http://localhost:3000',
        'http://localhost:5173',
        'http://127.0.0.1:3000',
      ]);
    });
  });

  describe('Boolean flags', () => {
    it('should read "false" as false', () => {
      const result = EnvironmentSchema.parse({
        APP_SWAGGER_ENABLED: 'false',
        APP_ENABLE_HELMET: 'false',
      });

      expect(result.APP_SWAGGER_ENABLED).toBe(false);
      expect(result.APP_ENABLE_HELMET).toBe(false);
    });

    it('should reject values other than true/false', () => {
      expect(() => EnvironmentSchema.parse({ APP_ENABLE_HELMET: 'yes' })).toThrow();
    });
  });

  describe('Search limits', () => {
    it('should reject a default limit above the max limit', () => {
      const result = EnvironmentSchema.safeParse({
        APP_SEARCH_DEFAULT_LIMIT: '500',
        APP_SEARCH_MAX_LIMIT: '100',
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues).toHaveLength(1);
        expect(result.error.issues[0].path).toEqual(['APP_SEARCH_DEFAULT_LIMIT']);
        expect(result.error.issues[0].message).toBe(
          'APP_SEARCH_DEFAULT_LIMIT (500) must not exceed APP_SEARCH_MAX_LIMIT (100)',
        );
      }
    });

    it('should reject limits outside the allowed range', () => {
      expect(() => EnvironmentSchema.parse({ APP_SEARCH_MAX_LIMIT: '0' })).toThrow();
      expect(() => EnvironmentSchema.parse({ APP_SEARCH_MAX_LIMIT: '10001' })).toThrow();
      expect(() => EnvironmentSchema.parse({ APP_HOUSE_NUMBER_SCAN_MULTIPLIER: '51' })).toThrow();
    });
  });

  describe('Production Environment', () => {
    it('should accept production config with an explicit dataset path', () => {
      process.env.POSTAL_DATA_PATH = '/srv/data/postal-codes.json';

      const result = EnvironmentSchema.parse({
        NODE_ENV: 'production',
        PORT: '8080',
        POSTAL_DATA_PATH: '/srv/data/postal-codes.json',
        APP_CORS_ALLOWED_ORIGINS: 'https://app.example.com,https://www.example.com',
      });

      expect(result.NODE_ENV).toBe('production');
      expect(result.POSTAL_DATA_PATH).toBe('/srv/data/postal-codes.json');
      expect(result.APP_CORS_ALLOWED_ORIGINS).toEqual([
        'https://app.example.com',
        'https://www.example.com',
      ]);
    });

    it('should reject production config without POSTAL_DATA_PATH', () => {
      const result = EnvironmentSchema.safeParse({
        NODE_ENV: 'production',
        APP_CORS_ALLOWED_ORIGINS: 'https://app.example.com',
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues.map((issue) => issue.path.join('.'))).toEqual([
          'POSTAL_DATA_PATH',
        ]);
      }
    });

    it('should reject APP_CORS_ALLOWED_ORIGINS="*" in production', () => {
      process.env.POSTAL_DATA_PATH = 'data/postal-codes.json';

      const result = EnvironmentSchema.safeParse({
        NODE_ENV: 'production',
        POSTAL_DATA_PATH: 'data/postal-codes.json',
        APP_CORS_ALLOWED_ORIGINS: '*',
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues.map((issue) => issue.path.join('.'))).toEqual([
          'APP_CORS_ALLOWED_ORIGINS',
        ]);
      }
    });
  });
});
