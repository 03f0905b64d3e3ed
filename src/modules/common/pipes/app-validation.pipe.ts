import {
  ValidationPipe,
  BadRequestException,
  ArgumentMetadata,
  ValidationPipeOptions,
} from '@nestjs/common';
import { ValidationError } from 'class-validator';
import { ValidationExceptionFactory } from '../factories/validation-exception.factory';
import { ValidationException } from '../exceptions/validation.exception';

const WHITELIST_MESSAGE = /^property (\S+) should not exist$/i;

/**
 * ValidationPipe whose every rejection is a ValidationException.
 *
 * Constraint failures go through exceptionFactory. Unknown query parameters
 * under `forbidNonWhitelisted` surface from class-validator as
 * "property x should not exist" messages and are rebuilt here as
 * `whitelistValidation` errors.
 */
export class AppValidationPipe extends ValidationPipe {
  constructor(options?: ValidationPipeOptions) {
    super({
      ...options,
      exceptionFactory: (errors: ValidationError[]) => {
        if (errors.length === 0) {
          return new BadRequestException('Validation failed');
        }
        return ValidationExceptionFactory.create(errors);
      },
    });
  }

  async transform(value: unknown, metadata: ArgumentMetadata): Promise<unknown> {
    try {
      return await super.transform(value, metadata);
    } catch (error) {
      if (error instanceof BadRequestException) {
        const fieldNames = this.extractWhitelistViolations(error);
        if (fieldNames.length > 0) {
          throw this.createWhitelistException(fieldNames);
        }
      }
      throw error;
    }
  }

  // @nestjs/common gives no structured code for these, only the message text
  private extractWhitelistViolations(error: BadRequestException): string[] {
    const response = error.getResponse();

    if (typeof response !== 'object' || response === null) {
      return [];
    }
    if (!('message' in response) || !Array.isArray(response.message)) {
      return [];
    }

    const messages: unknown[] = response.message;
    return messages.flatMap((msg) => {
      const match = typeof msg === 'string' ? WHITELIST_MESSAGE.exec(msg) : null;
      return match ? [match[1]] : [];
    });
  }

  private createWhitelistException(fieldNames: string[]): ValidationException {
    const validationErrors = fieldNames.map((fieldName) => {
      const error = new ValidationError();
      error.property = fieldName;
      error.value = undefined;
      error.constraints = {
        whitelistValidation: `property ${fieldName} should not exist`,
      };
      return error;
    });

    return ValidationExceptionFactory.create(validationErrors);
  }
}
