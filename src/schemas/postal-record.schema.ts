import { z } from 'zod';
import {
  POLISH_POSTAL_CODE_PATTERN,
  formatPolishPostalCode,
} from '@common/utils/postal-code.utils';

/**
 * Zod schema for a single postal register row
 *
 * Source: the postal dataset JSON file (one object per PNA row:
 * PNA, Miejscowość, Ulica, Numery, Gmina, Powiat, Województwo).
 *
 * Optional text columns are normalized to `null` when missing or blank,
 * so downstream code only ever sees `string | null`.
 */

const optionalText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  });

export const PostalRecordSchema = z.object({
  postalCode: z
    .string()
    .trim()
    .transform(formatPolishPostalCode)
    .pipe(
      z
        .string()
        .regex(POLISH_POSTAL_CODE_PATTERN, 'Must match Polish postal code format XX-XXX'),
    )
    .describe('Postal code (PNA), XX-XXX'),
  city: z.string().trim().min(1, 'City is required').describe('Miejscowość'),
  street: optionalText.describe('Ulica'),
  houseNumbers: optionalText.describe('Numery - house number range pattern'),
  municipality: optionalText.describe('Gmina'),
  county: optionalText.describe('Powiat'),
  province: optionalText.describe('Województwo'),
});

export type PostalRecord = z.infer<typeof PostalRecordSchema>;

/** Raw (pre-transform) shape, as stored in the dataset file. */
export type PostalRecordInput = z.input<typeof PostalRecordSchema>;

export const PostalDatasetSchema = z.array(PostalRecordSchema);
