// ============================================================================
// ASCII plot renderer — layered cell map
//
// Every series contributes four geometry layers (points, lines, point-drops,
// line-drops). They are composited into one dense grid, cells[row][col], where
// each cell keeps a single occupant: the one with the smallest layer rank.
//
// 关键不变量：
// - 点 (rank 0) 永远压住线 (rank 1)，线永远压住竖线/填充 (rank 2/3)，
//   与 series 的提交顺序无关；
// - 同一 rank 上先提交的 series 胜出（后来者不覆盖）；
// - 网格外的 cell 一律裁掉。
// ============================================================================

import type { AxisRange, Cell, GridBounds, LayerRank } from './types.ts'
import { LAYER_RANKS } from './types.ts'
import { columnTops, rasterizeLine } from './raster.ts'
import { isDegenerateRange, makeScale, type Scale } from './scale.ts'
import type { Series } from '../series.ts'

export interface Occupant {
  rank: LayerRank
  series: Series
  glyph: string
}

/** Dense grid indexed `[row][col]`; row 0 is the bottom of the plot. */
export type CellMap = (Occupant | null)[][]

/** Optional axis bounds; a missing bound is fitted to the data. */
export interface AxisLimits {
  min?: number | null
  max?: number | null
}

/** Create an empty `width × height` cell map. */
export function mkCellMap(width: number, height: number): CellMap {
  const cells: CellMap = []
  for (let row = 0; row < height; row++) {
    cells.push(new Array<Occupant | null>(width).fill(null))
  }
  return cells
}

/** Returns [width, height] of the map. */
export function getCellMapSize(cells: CellMap): [number, number] {
  return [cells[0]?.length ?? 0, cells.length]
}

export function getOccupant(cells: CellMap, cell: Cell): Occupant | null {
  return cells[cell.row]?.[cell.col] ?? null
}

/**
 * Write `occupant` at `cell` unless the cell already holds an equal or
 * smaller rank. Cells outside the map are ignored.
 */
export function claimCell(cells: CellMap, cell: Cell, occupant: Occupant): void {
  const row = cells[cell.row]
  if (row === undefined || cell.col < 0 || cell.col >= row.length) return

  const current = row[cell.col]
  if (current != null && current.rank <= occupant.rank) return
  row[cell.col] = occupant
}

/** All occupied cells, bottom row first. */
export function* occupiedCells(cells: CellMap): Generator<[Cell, Occupant], void, undefined> {
  for (let row = 0; row < cells.length; row++) {
    const line = cells[row] ?? []
    for (let col = 0; col < line.length; col++) {
      const occupant = line[col]
      if (occupant != null) yield [{ col, row }, occupant]
    }
  }
}

// ============================================================================
// Axis ranges
// ============================================================================

function extent(values: Iterable<number>): AxisRange | null {
  let min = Infinity
  let max = -Infinity
  for (const v of values) {
    if (v < min) min = v
    if (v > max) max = v
  }
  return min <= max ? { min, max } : null
}

function* allValues(series: readonly Series[], axis: 'x' | 'y'): Generator<number> {
  for (const s of series) yield* s[axis]
}

function resolveAxis(series: readonly Series[], axis: 'x' | 'y', limits: AxisLimits): AxisRange {
  const fitted = extent(allValues(series, axis))
  // 没有任何数据时退化为 [0, 0]：渲染出空白 plot，而不是报错。
  return {
    min: limits.min ?? fitted?.min ?? 0,
    max: limits.max ?? fitted?.max ?? 0,
  }
}

/** Axis ranges for a render: explicit bounds first, then the data's min/max. */
export function resolveRanges(
  series: readonly Series[],
  xLimits: AxisLimits = {},
  yLimits: AxisLimits = {},
): { xRange: AxisRange; yRange: AxisRange } {
  return {
    xRange: resolveAxis(series, 'x', xLimits),
    yRange: resolveAxis(series, 'y', yLimits),
  }
}

// ============================================================================
// Layer geometry
// ============================================================================

function* segments(points: readonly Cell[]): Generator<[Cell, Cell], void, undefined> {
  for (let i = 1; i < points.length; i++) {
    const from = points[i - 1]
    const to = points[i]
    if (from === undefined || to === undefined) continue
    yield [from, to]
  }
}

function* linePath(points: readonly Cell[], bounds?: GridBounds): Generator<Cell, void, undefined> {
  for (const [from, to] of segments(points)) {
    yield* rasterizeLine(from, to, bounds)
  }
}

function* lineTops(points: readonly Cell[], bounds: GridBounds): Generator<Cell, void, undefined> {
  for (const [from, to] of segments(points)) {
    yield* columnTops(from, to, bounds)
  }
}

/**
 * Vertical stems from row 0 up to (excluding) each cell. Stems are cut at
 * `rowLimit` since nothing above the grid is drawn.
 */
function* dropPath(cells: Iterable<Cell>, rowLimit: number): Generator<Cell, void, undefined> {
  for (const cell of cells) {
    const top = Math.min(cell.row, rowLimit)
    for (let row = 0; row < top; row++) {
      yield { col: cell.col, row }
    }
  }
}

/**
 * The four geometry sequences of one series, indexed by layer rank.
 * Sequences are lazy and may be iterated again.
 *
 * With `bounds`, line and line-drop cells are limited to the grid before they
 * are produced, so samples far outside the axis limits cost no more than
 * samples at its edge. Without it every cell of every segment is produced.
 */
export function layerPaths(
  series: Series,
  xScale: Scale,
  yScale: Scale,
  bounds?: GridBounds,
): [Iterable<Cell>, Iterable<Cell>, Iterable<Cell>, Iterable<Cell>] {
  const points: Cell[] = series.x.map((x, i) => ({
    col: xScale(x),
    row: yScale(series.y[i] ?? 0),
  }))
  const lines: Iterable<Cell> = { [Symbol.iterator]: () => linePath(points, bounds) }
  const rowLimit = bounds?.height ?? Infinity
  const lineDrops: Iterable<Cell> = bounds
    ? { [Symbol.iterator]: () => dropPath(lineTops(points, bounds), rowLimit) }
    : { [Symbol.iterator]: () => dropPath(linePath(points), rowLimit) }

  return [
    points,
    lines,
    { [Symbol.iterator]: () => dropPath(points, rowLimit) },
    lineDrops,
  ]
}

// ============================================================================
// Compositing
// ============================================================================

/**
 * Composite every series into a single cell map.
 *
 * Returns an empty map when either range is degenerate (min == max).
 */
export function composeLayers(
  series: readonly Series[],
  xRange: AxisRange,
  yRange: AxisRange,
  width: number,
  height: number,
): CellMap {
  const cells = mkCellMap(width, height)
  if (isDegenerateRange(xRange) || isDegenerateRange(yRange)) return cells

  const xScale = makeScale(xRange, width)
  const yScale = makeScale(yRange, height)

  for (const s of series) {
    if (s.isInvisible) continue
    const paths = layerPaths(s, xScale, yScale, { width, height })

    for (const rank of LAYER_RANKS) {
      const glyph = s.glyph(rank)
      if (glyph === null) continue

      const occupant: Occupant = { rank, series: s, glyph }
      for (const cell of paths[rank]) {
        claimCell(cells, cell, occupant)
      }
    }
  }

  return cells
}
