/**
 * String utilities.
 */

/**
 * Code-point ordering, independent of the host locale.
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
