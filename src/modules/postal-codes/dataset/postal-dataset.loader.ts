import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { ZodError } from 'zod';
import { PostalDatasetSchema, type PostalRecord } from '@schemas/postal-record.schema';

/**
 * Raised when the postal dataset cannot be read, parsed or validated.
 * Thrown during module initialization, so it stops application bootstrap.
 */
export class DatasetLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DatasetLoadError';
  }
}

/** Number of validation issues copied into the error details. */
const MAX_REPORTED_ISSUES = 10;

function summarizeIssues(error: ZodError): Array<{ path: string; message: string }> {
  return error.issues.slice(0, MAX_REPORTED_ISSUES).map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Load and validate the postal dataset
 *
 * The file is a JSON array of postal records (see PostalRecordSchema).
 * Relative paths are resolved against the process working directory.
 *
 * @throws DatasetLoadError when the file is missing, not JSON, or any record is invalid
 */
export async function loadPostalDataset(filePath: string): Promise<PostalRecord[]> {
  const absolutePath = resolve(filePath);

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf8');
  } catch (error) {
    throw new DatasetLoadError(
      `Cannot read postal dataset: ${absolutePath}`,
      absolutePath,
      undefined,
      { cause: error },
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new DatasetLoadError(
      `Postal dataset is not valid JSON: ${absolutePath}`,
      absolutePath,
      undefined,
      { cause: error },
    );
  }

  const result = PostalDatasetSchema.safeParse(json);
  if (!result.success) {
    throw new DatasetLoadError(
      `Postal dataset failed validation (${result.error.issues.length} issues): ${absolutePath}`,
      absolutePath,
      { issues: summarizeIssues(result.error) },
    );
  }

  return result.data;
}
