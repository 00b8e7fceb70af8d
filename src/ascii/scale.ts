// ============================================================================
// ASCII plot renderer — data space → grid mapping
// ============================================================================

import type { AxisRange } from './types.ts'
import { PlotError } from '../errors.ts'

/** Maps a data-space value to a (possibly out-of-grid) cell index. */
export type Scale = (value: number) => number

export function isDegenerateRange(range: AxisRange): boolean {
  return range.min === range.max
}

/** Fraction of the way from `min` to `max`; 0 at min, 1 at max. */
function fraction(value: number, range: AxisRange): number {
  const span = range.max - range.min
  if (Number.isFinite(span)) return (value - range.min) / span
  // 跨度超出 double 范围（如 [-1e308, 1e308]）：两边同除以 2 再算。
  return (value / 2 - range.min / 2) / (range.max / 2 - range.min / 2)
}

/**
 * Linear map of `[range.min, range.max]` onto `[0, extent - 1]`, floored.
 * Values outside the range map outside the grid; callers clip.
 *
 * The result is always a finite integer. Data so far out that the exact
 * index would overflow a double is pinned to ±Number.MAX_VALUE.
 */
export function makeScale(range: AxisRange, extent: number): Scale {
  if (isDegenerateRange(range)) {
    throw new PlotError(`cannot scale an empty range [${range.min}, ${range.max}]`)
  }
  return (value) => {
    const index = Math.floor((extent - 1) * fraction(value, range))
    // extent 为 1 时 0 × ∞ 得 NaN：只有一格，全部落在第 0 格。
    if (Number.isNaN(index)) return 0
    return Math.min(Math.max(index, -Number.MAX_VALUE), Number.MAX_VALUE)
  }
}
