/**
 * Tagged optional for metric values that can legitimately lack data.
 *
 * An undefined measurement is never a computed zero: consumers must branch
 * on `defined` before reading `value`.
 */

export type Measured<T = number> =
  | { readonly defined: true; readonly value: T }
  | { readonly defined: false; readonly reason: string };

export const NO_DATA = 'no data';

export function measured<T>(value: T): Measured<T> {
  return { defined: true, value };
}

export function undefinedMetric(reason: string): Measured<never> {
  return { defined: false, reason };
}

/**
 * `value / total`, undefined when `total` is zero.
 */
export function ratio(value: number, total: number, reason: string = NO_DATA): Measured<number> {
  return total === 0 ? undefinedMetric(reason) : measured(value / total);
}

export function toNullable<T>(metric: Measured<T>): T | null {
  return metric.defined ? metric.value : null;
}
