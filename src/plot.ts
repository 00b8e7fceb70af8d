// ============================================================================
// Plot — the canvas model
//
// Holds the series to draw, optional axis limits and target dimensions.
// Nothing is cached: every render resolves ranges and rebuilds the cell map
// from scratch, so mutating the plot between renders is always safe.
//
//   const plot = new Plot({ height: 10 })
//   plot.plotValues([1, 4, 9, 16], { color: 'blue' })
//   process.stdout.write(plot.dumps())
// ============================================================================

import { PlotInputError } from './errors.ts'
import { Series, type Pair, type SeriesStyle } from './series.ts'
import { composeLayers, resolveRanges, type AxisLimits } from './ascii/canvas.ts'
import {
  renderPlot, renderPlotToString,
  type PlotFrame, type PlotOutput, type RenderOptions,
} from './ascii/render.ts'

/** Fallback plot width when the terminal size is unknown. */
export const DEFAULT_WIDTH = 72
/** Fallback plot height; also fixes the default aspect ratio. */
export const DEFAULT_HEIGHT = 20

/** Columns kept free next to the plot body when sizing to a terminal. */
const TERMINAL_MARGIN = 8

export interface PlotOptions {
  /** Plot body width in cells. Defaults to the terminal width, else 72. */
  width?: number
  /** Plot body height in cells. Defaults to `width * 20 / 72`. */
  height?: number
  /** `[min, max]`; either bound may be null to fit the data. */
  xlim?: readonly [number | null, number | null]
  ylim?: readonly [number | null, number | null]
  /** Unit appended to x axis labels, e.g. `'B'`. */
  xUnit?: string
  /** Unit appended to y axis labels, e.g. `'s'`. */
  yUnit?: string
}

function checkDimension(value: number | null | undefined, name: string): number | undefined {
  if (value == null) return undefined
  if (!Number.isInteger(value) || value < 1) {
    throw new PlotInputError(`${name} must be a positive integer, got ${value}`)
  }
  return value
}

function checkLimit(value: number | null | undefined, name: string): number | null {
  if (value == null) return null
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new PlotInputError(`${name} must be a finite number or null, got ${String(value)}`)
  }
  return value
}

/**
 * Pick the plot body size. Explicit values win; otherwise a terminal's column
 * count is used (minus a margin, capped at the default), else the defaults.
 */
export function resolveDimensions(
  explicit: { width?: number; height?: number },
  out?: PlotOutput,
): { width: number; height: number } {
  let width = explicit.width ?? DEFAULT_WIDTH
  if (explicit.width === undefined && out?.isTTY === true) {
    const columns = out.columns
    if (typeof columns === 'number' && columns > 0) {
      width = Math.max(1, Math.min(columns - TERMINAL_MARGIN, DEFAULT_WIDTH))
    }
  }

  const height = explicit.height
    ?? Math.max(1, Math.floor((width * DEFAULT_HEIGHT) / DEFAULT_WIDTH))
  return { width, height }
}

export class Plot {
  private readonly seriesList: Series[] = []
  private width: number | undefined
  private height: number | undefined
  private xLimits: AxisLimits = {}
  private yLimits: AxisLimits = {}
  private readonly xUnit: string
  private readonly yUnit: string

  constructor(options: PlotOptions = {}) {
    this.setWidth(options.width)
    this.setHeight(options.height)
    if (options.xlim) this.setXLim(...options.xlim)
    if (options.ylim) this.setYLim(...options.ylim)
    this.xUnit = options.xUnit ?? ''
    this.yUnit = options.yUnit ?? ''
  }

  /** Set the body width; `null` returns to automatic sizing. */
  setWidth(width?: number | null): this {
    this.width = checkDimension(width, 'width')
    return this
  }

  /** Set the body height; `null` returns to automatic sizing. */
  setHeight(height?: number | null): this {
    this.height = checkDimension(height, 'height')
    return this
  }

  /** Fix the x range. An omitted or null bound is fitted to the data. */
  setXLim(min?: number | null, max?: number | null): this {
    this.xLimits = { min: checkLimit(min, 'xlim min'), max: checkLimit(max, 'xlim max') }
    return this
  }

  /** Fix the y range. An omitted or null bound is fitted to the data. */
  setYLim(min?: number | null, max?: number | null): this {
    this.yLimits = { min: checkLimit(min, 'ylim min'), max: checkLimit(max, 'ylim max') }
    return this
  }

  addSeries(series: Series): this {
    this.seriesList.push(series)
    return this
  }

  plotValues(y: readonly number[], style?: SeriesStyle): this {
    return this.addSeries(Series.fromValues(y, style))
  }

  plotPairs(pairs: readonly Pair[], style?: SeriesStyle): this {
    return this.addSeries(Series.fromPairs(pairs, style))
  }

  plotXY(x: readonly number[], y: readonly number[], style?: SeriesStyle): this {
    return this.addSeries(Series.fromXY(x, y, style))
  }

  get series(): readonly Series[] {
    return this.seriesList
  }

  /** Build the frame for one render pass at the given size. */
  generate(width: number, height: number): PlotFrame {
    const { xRange, yRange } = resolveRanges(this.seriesList, this.xLimits, this.yLimits)
    return {
      cells: composeLayers(this.seriesList, xRange, yRange, width, height),
      xRange,
      yRange,
      width,
      height,
      xUnit: this.xUnit,
      yUnit: this.yUnit,
    }
  }

  /** Size for a render to `out`, sampling the terminal once. */
  dimensionsFor(out?: PlotOutput): { width: number; height: number } {
    return resolveDimensions({ width: this.width, height: this.height }, out)
  }

  /** Render to a stream, colored when it is a terminal. */
  dump(out: PlotOutput = process.stdout, options: RenderOptions = {}): void {
    const { width, height } = this.dimensionsFor(out)
    renderPlot(this.generate(width, height), out, options)
  }

  /** Render to a string; no terminal is involved, so colors are off by default. */
  dumps(options: RenderOptions = {}): string {
    const { width, height } = this.dimensionsFor()
    return renderPlotToString(this.generate(width, height), options)
  }
}
