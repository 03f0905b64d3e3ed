import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { ERROR_CODES, ErrorSourceSchema } from '@schemas/error-response.schema';

/**
 * Swagger model of the error envelope (see ErrorResponseSchema)
 */
export class ErrorResponseDto {
  @ApiProperty({
    description: 'Standardized error code',
    example: ERROR_CODES.POSTAL_CODE_NOT_FOUND,
    enum: Object.values(ERROR_CODES),
  })
  errorCode!: string;

  @ApiProperty({
    description: 'Human-readable error message',
    example: 'Postal code 00-000 not found',
  })
  message!: string;

  @ApiProperty({
    description: 'Request correlation ID, also sent as the X-Correlation-ID header',
    example: 'req-m1x2y3z4-8x7v2w9pq',
  })
  correlationId!: string;

  @ApiProperty({
    description: 'Where the error originated',
    example: 'POSTAL_DATASET',
    enum: ErrorSourceSchema.options,
  })
  source!: string;

  @ApiProperty({
    description: 'Error timestamp in ISO format',
    example: '2026-01-15T10:30:00.000Z',
    format: 'date-time',
  })
  timestamp!: string;

  @ApiPropertyOptional({
    description: 'Additional error details',
    example: {
      validationErrors: [
        { property: 'city', constraint: 'isNotEmpty', message: 'city is required' },
      ],
    },
  })
  details?: Record<string, unknown>;
}
