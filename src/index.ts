// ============================================================================
// shell-plot — public API
// ============================================================================

export { Plot, resolveDimensions, DEFAULT_WIDTH, DEFAULT_HEIGHT, type PlotOptions } from './plot.ts'
export { Series, DEFAULT_CHARS, type SeriesStyle, type Pair } from './series.ts'
export { parsePlotInput, loadPlotInput } from './input.ts'
export { formatUnit, formatG, SI_PREFIXES } from './units.ts'
export { StatusReporter } from './status.ts'
export { PlotError, PlotInputError } from './errors.ts'

export { rasterizeLine } from './ascii/raster.ts'
export { makeScale, isDegenerateRange, type Scale } from './ascii/scale.ts'
export {
  composeLayers, layerPaths, resolveRanges, occupiedCells, getOccupant,
  type CellMap, type Occupant, type AxisLimits,
} from './ascii/canvas.ts'
export {
  renderPlot, renderPlotToString, renderLines, GUTTER_WIDTH,
  type PlotFrame, type PlotOutput, type RenderOptions,
} from './ascii/render.ts'
export { COLOR_NAMES, isColorName, paint, type ColorName } from './ascii/palette.ts'
export { LayerRank, type Cell, type AxisRange } from './ascii/types.ts'
