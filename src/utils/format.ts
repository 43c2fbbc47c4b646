/**
 * Number formatting for terminal and text output.
 */

/**
 * Format a 0..1 rate as a percentage, e.g. 0.6667 -> "66.7%".
 */
export function formatPercent(value: number, digits: number = 1): string {
  return `${(value * 100).toFixed(digits)}%`;
}

export function formatFixed(value: number, digits: number = 3): string {
  return value.toFixed(digits);
}

/**
 * Format a value that may be undefined for lack of data.
 */
export function formatMaybe(
  metric: { readonly defined: true; readonly value: number } | { readonly defined: false; readonly reason: string },
  format: (value: number) => string = formatFixed,
  placeholder: string = 'n/a'
): string {
  return metric.defined ? format(metric.value) : placeholder;
}
