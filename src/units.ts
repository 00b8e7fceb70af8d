// ============================================================================
// SI unit formatting
//
// Squeezes a magnitude into a few columns by pairing a short mantissa with a
// base-1000 prefix: 1500 B → "1.5kB", 0.0025 s → "2.5ms".
// ============================================================================

import { PlotError } from './errors.ts'

/** Base-1000 exponent → SI prefix symbol. */
export const SI_PREFIXES: ReadonlyMap<number, string> = new Map([
  [18, 'E'],
  [15, 'P'],
  [12, 'T'],
  [9, 'G'],
  [6, 'M'],
  [3, 'k'],
  [0, ''],
  [-3, 'm'],
  [-6, 'u'],
  [-9, 'n'],
  [-12, 'p'],
  [-15, 'f'],
  [-18, 'a'],
])

const MIN_EXPONENT = -18
const MAX_EXPONENT = 18

/** Significant digits used when no width budget is given. */
export const DEFAULT_PRECISION = 3

// toExponential / toFixed 的参数上限是 100，但 double 本身只有 ~17 位有效数字，
// 超过 21 位没有意义。
const MAX_PRECISION = 21

function clampPrecision(precision: number): number {
  return Math.min(MAX_PRECISION, Math.max(1, Math.floor(precision)))
}

/** Strip trailing fractional zeros, and the decimal point if nothing is left. */
function trimFraction(digits: string): string {
  if (!digits.includes('.')) return digits
  return digits.replace(/0+$/, '').replace(/\.$/, '')
}

/**
 * Print `value` like C's `%.<precision>g`: fixed notation for moderate
 * exponents, scientific otherwise, trailing zeros removed.
 */
export function formatG(value: number, precision: number): string {
  if (!Number.isFinite(value)) return String(value)
  const p = clampPrecision(precision)

  // The exponent is taken after rounding, so 9.996 at p=3 reads as 1e+01.
  const [mantissa = '0', exponentText = '0'] = value.toExponential(p - 1).split('e')
  const exponent = Number(exponentText)

  if (exponent < -4 || exponent >= p) {
    const sign = exponent < 0 ? '-' : '+'
    const magnitude = String(Math.abs(exponent)).padStart(2, '0')
    return `${trimFraction(mantissa)}e${sign}${magnitude}`
  }

  return trimFraction(value.toFixed(p - 1 - exponent))
}

/** Round to `precision` significant digits. */
function roundSignificant(value: number, precision: number): number {
  return Number(value.toPrecision(precision))
}

/**
 * Base-1000 exponent of a non-zero value, clamped to the prefix table.
 * Values beyond exa/atto keep the outermost prefix and a larger mantissa.
 */
export function prefixExponent(value: number): number {
  const exp3 = 3 * Math.floor(Math.log10(Math.abs(value)) / 3)
  return Math.min(MAX_EXPONENT, Math.max(MIN_EXPONENT, exp3))
}

function scaleByPowerOfTen(value: number, exponent: number): number {
  // 负指数时用乘法：0.0025 * 1000 比 0.0025 / 0.001 少一次舍入误差。
  return exponent < 0 ? value * 10 ** -exponent : value / 10 ** exponent
}

/**
 * Format `value` followed by an SI prefix and `unit`, e.g. `formatUnit(1500, 'B')`
 * gives `"1.5kB"`.
 *
 * With `width`, the number of significant digits is chosen so that the result
 * usually fits in `width` columns (sign, prefix and unit included). It is a
 * budget, not a hard cap: at least one significant digit is always printed.
 */
export function formatUnit(value: number, unit = '', width?: number): string {
  if (!Number.isFinite(value)) {
    throw new PlotError(`cannot format non-finite value ${value}`)
  }
  if (value === 0) return '0' + unit

  const requested = width === undefined
    ? DEFAULT_PRECISION
    : width - ((value < 0 ? 1 : 0) + 2 + unit.length)
  const precision = clampPrecision(requested)

  const rounded = roundSignificant(value, precision)
  const exponent = prefixExponent(rounded)
  const prefix = SI_PREFIXES.get(exponent) ?? ''

  return formatG(scaleByPowerOfTen(rounded, exponent), precision) + prefix + unit
}
