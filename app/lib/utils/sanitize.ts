/**
 * Numeric Sanitization Utilities
 *
 * Plotting needs finite numbers. The player model can overflow once its
 * share leaves [0, 1], so chart series go through here on the way out.
 * Trajectories themselves are never altered.
 */

/**
 * Sanitize a series of numeric values
 * @param fallbackStrategy 'previous' repeats the last finite value, 'zero' writes 0
 */
export function sanitizeSeries(
  arr: readonly (number | null | undefined)[],
  fallbackStrategy: 'previous' | 'zero' = 'previous'
): number[] {
  const result: number[] = [];
  let lastValid: number | null = null;

  for (const value of arr) {
    if (value !== null && value !== undefined && isFinite(value)) {
      result.push(value);
      lastValid = value;
    } else if (fallbackStrategy === 'previous' && lastValid !== null) {
      result.push(lastValid);
    } else {
      result.push(0);
    }
  }

  return result;
}

/**
 * Boolean mask, true where sanitizeSeries had to impute
 */
export function createImputationMask(arr: readonly (number | null | undefined)[]): boolean[] {
  return arr.map(value => value === null || value === undefined || !isFinite(value));
}

/**
 * Assert that a value is within a valid range (dev mode only)
 * @returns x unchanged; only logs
 */
export function assertRange(name: string, x: number, lo: number, hi: number): number {
  if (process.env.NODE_ENV === 'development') {
    if (x < lo || x > hi) {
      console.warn(
        `[SANITIZE] ${name}=${x} is outside expected range [${lo}, ${hi}]. ` +
        `This may indicate an unstable step size.`
      );
    }
  }
  return x;
}
