// ============================================================================
// ASCII plot renderer — cell map → text
//
// Layout (G = gutter, 5 columns):
//
//   G^ooo        top row: y max label
//   G|   ..
//   G+------->   axis row: y min label
//    xmin  xmax  x labels under the first / last column
//
// Color escapes wrap single glyphs only and never count toward layout width.
// ============================================================================

import type { AxisRange } from './types.ts'
import type { CellMap, Occupant } from './canvas.ts'
import { paint } from './palette.ts'
import { padEndDisplay, padStartDisplay } from './text-width.ts'
import { formatUnit } from '../units.ts'

/** Width of the left axis gutter, in columns. */
export const GUTTER_WIDTH = 5

/** Column budget of an axis label. */
const LABEL_WIDTH = 5

/** Everything one render pass needs, computed fresh by the plot. */
export interface PlotFrame {
  cells: CellMap
  xRange: AxisRange
  yRange: AxisRange
  width: number
  height: number
  xUnit: string
  yUnit: string
}

/** Minimal writable sink; a Node TTY WriteStream satisfies it. */
export interface PlotOutput {
  write(chunk: string): unknown
  isTTY?: boolean
  columns?: number
}

export interface RenderOptions {
  /** Force colors on or off; defaults to whether the output is a terminal. */
  color?: boolean
}

function axisLabel(value: number, unit: string): string {
  return formatUnit(value, unit, LABEL_WIDTH)
}

/** y labels are right-aligned in 4 columns, then padded to the gutter. */
function gutterLabel(label: string): string {
  return padEndDisplay(padStartDisplay(label, GUTTER_WIDTH - 1), GUTTER_WIDTH)
}

function renderCell(occupant: Occupant | null, useColor: boolean): string {
  if (occupant === null) return ' '
  const color = occupant.series.color
  return useColor && color !== null ? paint(occupant.glyph, color) : occupant.glyph
}

/** Render a frame into lines of text, top row first, without newlines. */
export function renderLines(frame: PlotFrame, useColor = false): string[] {
  const { cells, width, height } = frame
  const lines: string[] = []

  for (let row = height - 1; row >= 0; row--) {
    let line = row === height - 1
      ? gutterLabel(axisLabel(frame.yRange.max, frame.yUnit)) + '^'
      : ' '.repeat(GUTTER_WIDTH) + '|'

    const cellRow = cells[row]
    for (let col = 0; col < width; col++) {
      line += renderCell(cellRow?.[col] ?? null, useColor)
    }
    lines.push(line)
  }

  lines.push(
    gutterLabel(axisLabel(frame.yRange.min, frame.yUnit))
      + '+' + '-'.repeat(Math.max(0, width - 1)) + '>',
  )

  lines.push(
    ' '.repeat(GUTTER_WIDTH)
      + padEndDisplay(axisLabel(frame.xRange.min, frame.xUnit), LABEL_WIDTH)
      + ' '.repeat(Math.max(0, width - 9))
      + padStartDisplay(axisLabel(frame.xRange.max, frame.xUnit), LABEL_WIDTH),
  )

  return lines
}

/** Write a frame to `out`, one newline-terminated line at a time. */
export function renderPlot(frame: PlotFrame, out: PlotOutput, options: RenderOptions = {}): void {
  const useColor = options.color ?? out.isTTY === true
  for (const line of renderLines(frame, useColor)) {
    out.write(line + '\n')
  }
}

/** Render a frame to a string. Colors are off unless forced. */
export function renderPlotToString(frame: PlotFrame, options: RenderOptions = {}): string {
  return renderLines(frame, options.color ?? false).map((line) => line + '\n').join('')
}
