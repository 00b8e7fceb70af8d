// ============================================================================
// ASCII plot renderer — line rasterization
//
// Integer-only incremental error walk (Bresenham). Produces every cell the
// segment between two grid points passes through, both ends included.
//
// 裁剪：
// - 数据远离 xlim/ylim 时，端点可能落在网格外几百万甚至 1e300 格之外；
// - 逐格走完整条线会让渲染耗时取决于数据离网格多远，而不是网格大小；
// - 因此给定 bounds 时，先直接算出线段进入/离开网格的步数，再从入口开始走，
//   出口处停止。入口处的误差项也直接算出，所以网格内的 cell 与完整走一遍完全一致。
// - 端点坐标可能超出 2^53，位置与误差项一律用 BigInt 计算。
// ============================================================================

import type { Cell, GridBounds } from './types.ts'
import { PlotError } from '../errors.ts'

function assertIntegerCell(cell: Cell, name: string): void {
  if (!Number.isInteger(cell.col) || !Number.isInteger(cell.row)) {
    throw new PlotError(`${name} must be an integer cell, got (${cell.col},${cell.row})`)
  }
}

function abs(n: bigint): bigint {
  return n < 0n ? -n : n
}

/** floor(a / b) for b > 0. */
function floorDiv(a: bigint, b: bigint): bigint {
  const q = a / b
  return a % b !== 0n && a < 0n ? q - 1n : q
}

/** ceil(a / b) for b > 0. */
function ceilDiv(a: bigint, b: bigint): bigint {
  return -floorDiv(-a, b)
}

function maxBig(a: bigint, b: bigint): bigint {
  return a > b ? a : b
}

function minBig(a: bigint, b: bigint): bigint {
  return a < b ? a : b
}

interface Segment {
  x0: bigint
  y0: bigint
  x1: bigint
  y1: bigint
  dx: bigint
  dy: bigint
  sx: bigint
  sy: bigint
  /** Number of steps; the walk visits steps + 1 cells. */
  steps: bigint
  xMajor: boolean
}

function toSegment(from: Cell, to: Cell): Segment {
  const x0 = BigInt(from.col)
  const y0 = BigInt(from.row)
  const x1 = BigInt(to.col)
  const y1 = BigInt(to.row)
  const dx = abs(x1 - x0)
  const dy = abs(y1 - y0)
  return {
    x0, y0, x1, y1, dx, dy,
    sx: x0 < x1 ? 1n : -1n,
    sy: y0 < y1 ? 1n : -1n,
    steps: maxBig(dx, dy),
    xMajor: dx >= dy,
  }
}

/**
 * The walk advances the major axis on every step. After `i` steps the minor
 * axis has advanced floor((2·i·dMinor + dMajor - 1) / (2·dMajor)).
 */
function minorOffset(seg: Segment, i: bigint): bigint {
  const [major, minor] = seg.xMajor ? [seg.dx, seg.dy] : [seg.dy, seg.dx]
  if (major === 0n) return 0n
  return floorDiv(2n * i * minor + major - 1n, 2n * major)
}

function cellAtStep(seg: Segment, i: bigint): { col: bigint; row: bigint } {
  const minor = minorOffset(seg, i)
  return seg.xMajor
    ? { col: seg.x0 + seg.sx * i, row: seg.y0 + seg.sy * minor }
    : { col: seg.x0 + seg.sx * minor, row: seg.y0 + seg.sy * i }
}

/** Offsets from `origin` in direction `sign` that stay inside [0, limit). */
function offsetRange(origin: bigint, sign: bigint, limit: bigint): [bigint, bigint] {
  return sign > 0n ? [-origin, limit - 1n - origin] : [origin - limit + 1n, origin]
}

/** First and last step whose cell lies inside `bounds`; first > last when none does. */
function stepsInside(seg: Segment, bounds: GridBounds): [bigint, bigint] {
  const width = BigInt(bounds.width)
  const height = BigInt(bounds.height)
  const [majorRange, minorRange] = seg.xMajor
    ? [offsetRange(seg.x0, seg.sx, width), offsetRange(seg.y0, seg.sy, height)]
    : [offsetRange(seg.y0, seg.sy, height), offsetRange(seg.x0, seg.sx, width)]

  let [first, last] = majorRange
  const [lo, hi] = minorRange
  const [major, minor] = seg.xMajor ? [seg.dx, seg.dy] : [seg.dy, seg.dx]

  if (minor === 0n) {
    if (lo > 0n || hi < 0n) return [1n, 0n]
  } else {
    first = maxBig(first, ceilDiv(2n * major * lo - major + 1n, 2n * minor))
    last = minBig(last, floorDiv(2n * major * (hi + 1n) - major, 2n * minor))
  }
  return [maxBig(first, 0n), minBig(last, seg.steps)]
}

/** Steps whose minor-axis offset is `offset`: one contiguous run per offset. */
function stepsAtMinorOffset(seg: Segment, offset: bigint): [bigint, bigint] {
  const [major, minor] = seg.xMajor ? [seg.dx, seg.dy] : [seg.dy, seg.dx]
  if (minor === 0n) return [0n, seg.steps]
  return [
    maxBig(ceilDiv(2n * major * offset - major + 1n, 2n * minor), 0n),
    minBig(floorDiv(2n * major * (offset + 1n) - major, 2n * minor), seg.steps),
  ]
}

function* walkColumnTops(seg: Segment, bounds: GridBounds): Generator<Cell, void, undefined> {
  const height = BigInt(bounds.height)
  const clampRow = (row: bigint): number => Number(minBig(maxBig(row, 0n), height))
  const [lo, hi] = offsetRange(seg.x0, seg.sx, BigInt(bounds.width))
  const first = maxBig(lo, 0n)

  if (seg.xMajor) {
    // 横向为主轴：每一步正好占一列。
    const last = minBig(hi, seg.steps)
    for (let i = first; i <= last; i++) {
      const { col, row } = cellAtStep(seg, i)
      yield { col: Number(col), row: clampRow(row) }
    }
    return
  }

  const last = minBig(hi, seg.dx)
  for (let g = first; g <= last; g++) {
    const [from, to] = stepsAtMinorOffset(seg, g)
    const top = seg.sy > 0n ? to : from
    yield { col: Number(seg.x0 + seg.sx * g), row: clampRow(seg.y0 + seg.sy * top) }
  }
}

function* walkLine(seg: Segment, first: bigint, last: bigint): Generator<Cell, void, undefined> {
  if (first > last) return

  const { dx, dy, sx, sy, x1, y1 } = seg
  let { col, row } = first === 0n ? { col: seg.x0, row: seg.y0 } : cellAtStep(seg, first)
  // 每个 x 步减 dy，每个 y 步加 dx：入口处的误差项可以直接由已走的步数算出。
  let err = dx - dy - abs(col - seg.x0) * dy + abs(row - seg.y0) * dx

  for (let i = first; ; i++) {
    yield { col: Number(col), row: Number(row) }
    if (i === last || (col === x1 && row === y1)) return

    const err2 = 2n * err
    if (err2 > -dy) {
      err -= dy
      col += sx
    }
    // 已到终点：不再做 y 步进，回到循环顶部输出终点后结束。
    if (col === x1 && row === y1) continue
    if (err2 < dx) {
      err += dx
      row += sy
    }
  }
}

/**
 * Cells on the straight segment `from → to`.
 *
 * The result is lazy and restartable: every iteration walks the segment again.
 * Steps are axis-aligned or diagonal, so the length is `max(|dx|, |dy|) + 1`
 * and no cell repeats.
 *
 * With `bounds`, only the cells inside `[0,width) × [0,height)` are produced,
 * in the same order, and the cost depends on the grid size rather than on how
 * far the endpoints lie outside it.
 */
export function rasterizeLine(from: Cell, to: Cell, bounds?: GridBounds): Iterable<Cell> {
  assertIntegerCell(from, 'line start')
  assertIntegerCell(to, 'line end')
  const seg = toSegment(from, to)
  return {
    [Symbol.iterator]: () => {
      const [first, last] = bounds ? stepsInside(seg, bounds) : [0n, seg.steps]
      return walkLine(seg, first, last)
    },
  }
}

/**
 * For every column of `bounds` the segment crosses, its highest cell there,
 * with the row clamped to `[0, bounds.height]`.
 *
 * Area fills only need this top cell: the stem under it covers every lower
 * cell of the same column. Parts of the line above the grid still count, so
 * a segment that leaves through the top fills the whole column.
 */
export function columnTops(from: Cell, to: Cell, bounds: GridBounds): Iterable<Cell> {
  assertIntegerCell(from, 'line start')
  assertIntegerCell(to, 'line end')
  const seg = toSegment(from, to)
  return { [Symbol.iterator]: () => walkColumnTops(seg, bounds) }
}
