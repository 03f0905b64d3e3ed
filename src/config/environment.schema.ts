import { z } from 'zod';

/** Dataset location used when POSTAL_DATA_PATH is not set (outside production). */
export const DEFAULT_POSTAL_DATA_PATH = 'data/postal-codes.json';

/** Highest value APP_SEARCH_MAX_LIMIT (and a request's `limit`) may take. */
export const SEARCH_LIMIT_CEILING = 10000;

/**
 * Boolean flag read from the environment. Only the literal strings
 * "true" and "false" are accepted, z.coerce.boolean() would treat "false"
 * as true.
 */
const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false'])
    .default(defaultValue ? 'true' : 'false')
    .transform((value) => value === 'true');

export const EnvironmentSchema = z
  .object({
    // Server Configuration
    NODE_ENV: z
      .enum(['development', 'test', 'staging', 'production'])
      .default('development'),
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),

    // Postal dataset
    POSTAL_DATA_PATH: z
      .string()
      .min(1)
      .default(DEFAULT_POSTAL_DATA_PATH)
      .describe('Path to the postal dataset JSON file - MUST be explicitly set in production'),

    // Search limits
    APP_SEARCH_DEFAULT_LIMIT: z.coerce.number().int().min(1).max(SEARCH_LIMIT_CEILING).default(100),
    APP_SEARCH_MAX_LIMIT: z.coerce.number().int().min(1).max(SEARCH_LIMIT_CEILING).default(1000),
    APP_HOUSE_NUMBER_SCAN_MULTIPLIER: z.coerce
      .number()
      .int()
      .min(1)
      .max(50)
      .default(5)
      .describe('Candidate records fetched per requested result when filtering by house number'),
    APP_HOUSE_NUMBER_SCAN_CAP: z.coerce
      .number()
      .int()
      .min(1)
      .max(100000)
      .default(1000)
      .describe('Upper bound on candidate records fetched when filtering by house number'),

    // Application-level Rate Limiting (incoming requests)
    APP_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().min(1).max(1000).default(100),

    // Application-level Swagger Configuration
    APP_SWAGGER_ENABLED: booleanFlag(true),
    APP_SWAGGER_SERVER_URL_DEVELOPMENT: z.string().url().default('http://localhost:3000'),
    APP_SWAGGER_SERVER_URL_PRODUCTION: z.string().url().optional(),

    // Application-level CORS Configuration
    APP_CORS_ALLOWED_ORIGINS: z
      .string()
      .default('http://localhost:3000,http://localhost:5173')
      .transform((str) => {
        if (str.trim() === '*') return ['*'];
        return str
          .split(',')
          .map((origin) => origin.trim())
          .filter(Boolean);
      }),

    // Application-level Security Configuration
    APP_ENABLE_HELMET: booleanFlag(true),
  })
  .superRefine((config, ctx) => {
    if (config.APP_SEARCH_DEFAULT_LIMIT > config.APP_SEARCH_MAX_LIMIT) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['APP_SEARCH_DEFAULT_LIMIT'],
        message: `APP_SEARCH_DEFAULT_LIMIT (${config.APP_SEARCH_DEFAULT_LIMIT}) must not exceed APP_SEARCH_MAX_LIMIT (${config.APP_SEARCH_MAX_LIMIT})`,
      });
    }

    if (config.NODE_ENV === 'production') {
      // Checked on process.env: the default path must not be picked up silently.
      if (!process.env.POSTAL_DATA_PATH) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['POSTAL_DATA_PATH'],
          message:
            'Production environment requires explicit POSTAL_DATA_PATH configuration, ' +
            'even if it points at the default location.',
        });
      }

      if (config.APP_CORS_ALLOWED_ORIGINS.includes('*')) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['APP_CORS_ALLOWED_ORIGINS'],
          message:
            'APP_CORS_ALLOWED_ORIGINS="*" not allowed in production environment. ' +
            'Set it to a comma-separated list of allowed origins, ' +
            'e.g. APP_CORS_ALLOWED_ORIGINS=https://yourapp.com,https://admin.yourapp.com',
        });
      }
    }
  });

export type Environment = z.infer<typeof EnvironmentSchema>;
