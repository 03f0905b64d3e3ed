import { ValidationError } from 'class-validator';
import {
  ValidationException,
  type ValidationErrorDetail,
} from '../exceptions/validation.exception';
import { type ErrorCode, ERROR_CODES } from '@schemas/error-response.schema';

const MISSING_FIELD_CONSTRAINTS = new Set(['isNotEmpty', 'isDefined']);

const WHITELIST_CONSTRAINT = 'whitelistValidation';

/**
 * Picks the error code for a set of class-validator failures, by constraint
 * name rather than message. First match wins:
 * 1. anything on `postalCode` is INVALID_POSTAL_CODE_FORMAT
 * 2. an unknown parameter is INVALID_REQUEST_FORMAT
 * 3. isNotEmpty or isDefined is MISSING_REQUIRED_FIELDS
 * 4. otherwise INVALID_REQUEST_FORMAT
 */
export class ValidationExceptionFactory {
  static create(errors: ValidationError[]): ValidationException {
    const validationErrors = ValidationExceptionFactory.extractValidationErrors(errors);
    const errorCode = ValidationExceptionFactory.determineErrorCode(validationErrors);
    const message = ValidationExceptionFactory.createMessage(errorCode, validationErrors);

    return new ValidationException(errorCode, message, validationErrors);
  }

  private static extractValidationErrors(errors: ValidationError[]): ValidationErrorDetail[] {
    const details: ValidationErrorDetail[] = [];

    for (const error of errors) {
      if (error.constraints) {
        for (const [constraint, message] of Object.entries(error.constraints)) {
          details.push({
            property: error.property,
            value: error.value,
            constraint,
            message,
          });
        }
      }

      if (error.children?.length) {
        details.push(...ValidationExceptionFactory.extractValidationErrors(error.children));
      }
    }

    return details;
  }

  private static determineErrorCode(errors: ValidationErrorDetail[]): ErrorCode {
    if (errors.some((err) => err.property === 'postalCode')) {
      return ERROR_CODES.INVALID_POSTAL_CODE_FORMAT;
    }

    if (errors.some((err) => err.constraint === WHITELIST_CONSTRAINT)) {
      return ERROR_CODES.INVALID_REQUEST_FORMAT;
    }

    if (errors.some((err) => MISSING_FIELD_CONSTRAINTS.has(err.constraint))) {
      return ERROR_CODES.MISSING_REQUIRED_FIELDS;
    }

    return ERROR_CODES.INVALID_REQUEST_FORMAT;
  }

  private static uniqueProperties(
    errors: ValidationErrorDetail[],
    predicate: (err: ValidationErrorDetail) => boolean,
  ): string[] {
    return [...new Set(errors.filter(predicate).map((err) => err.property))];
  }

  private static createMessage(errorCode: ErrorCode, errors: ValidationErrorDetail[]): string {
    switch (errorCode) {
      case ERROR_CODES.INVALID_POSTAL_CODE_FORMAT:
        return 'Invalid postal code format. Expected XX-XXX or XXXXX.';

      case ERROR_CODES.MISSING_REQUIRED_FIELDS: {
        const fields = ValidationExceptionFactory.uniqueProperties(errors, (err) =>
          MISSING_FIELD_CONSTRAINTS.has(err.constraint),
        );
        return fields.length === 1
          ? `Required field is missing: ${fields[0]}`
          : `Required fields are missing: ${fields.join(', ')}`;
      }

      case ERROR_CODES.INVALID_REQUEST_FORMAT: {
        const extraFields = ValidationExceptionFactory.uniqueProperties(
          errors,
          (err) => err.constraint === WHITELIST_CONSTRAINT,
        );
        if (extraFields.length > 0) {
          return `Invalid request format. Unexpected fields: ${extraFields.join(', ')}`;
        }

        const fields = ValidationExceptionFactory.uniqueProperties(errors, () => true);
        return `Invalid request format. Check fields: ${fields.join(', ')}`;
      }

      default:
        return 'Validation failed.';
    }
  }
}
