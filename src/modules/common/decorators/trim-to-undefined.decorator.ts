import { Transform } from 'class-transformer';
import { trimToUndefined } from '../utils/text.utils';

/**
 * Trim string query values; blank strings become undefined so `@IsOptional()`
 * treats them as absent. Non-string values are left for the validators.
 */
export function TrimToUndefined(): PropertyDecorator {
  return Transform(({ value }: { value: unknown }) =>
    typeof value === 'string' ? trimToUndefined(value) : value,
  );
}
