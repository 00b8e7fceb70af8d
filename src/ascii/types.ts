// ============================================================================
// ASCII plot renderer — shared types
// ============================================================================

/** One character position of the plot body. `col` grows right, `row` grows up. */
export interface Cell {
  col: number
  row: number
}

/** Size of the plot body; valid cells are `[0, width) × [0, height)`. */
export interface GridBounds {
  width: number
  height: number
}

/** Closed data-space interval of one axis. */
export interface AxisRange {
  min: number
  max: number
}

/**
 * Geometry layers in occlusion order. A smaller rank always wins a cell.
 */
export const LayerRank = {
  Point: 0,
  Line: 1,
  PointDrop: 2,
  LineDrop: 3,
} as const

export type LayerRank = (typeof LayerRank)[keyof typeof LayerRank]

export const LAYER_RANKS: readonly LayerRank[] = [
  LayerRank.Point,
  LayerRank.Line,
  LayerRank.PointDrop,
  LayerRank.LineDrop,
]

