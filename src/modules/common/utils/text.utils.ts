/**
 * Trimmed text, or undefined when the input is missing or blank.
 *
 * @example
 * trimToUndefined('  Wrocław ') // 'Wrocław'
 * trimToUndefined('   ')        // undefined
 */
export function trimToUndefined(value: string | undefined | null): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
