// ============================================================================
// JSON input documents
//
// A document is one entry or an array of entries:
//
//   { "y": [1, 2, 4, 8], "color": "blue", "chars": "o-" }
//   [{ "width": 40, "ylim": [0, null] }, { "x": [0, 2], "y": [[0, 1], [2, 3]] }]
//
// Canvas keys (width, height, xlim, ylim) are applied before the entry's
// series is added. Anything unexpected is rejected with the path of the
// offending field; nothing is guessed or silently dropped.
// ============================================================================

import { PlotInputError } from './errors.ts'
import { Plot } from './plot.ts'
import { Series, type Pair, type SeriesStyle } from './series.ts'
import { isColorName } from './ascii/palette.ts'

const ENTRY_KEYS = new Set(['x', 'y', 'color', 'chars', 'width', 'height', 'xlim', 'ylim'])

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isPair(value: unknown): value is Pair {
  return Array.isArray(value) && value.length === 2
    && typeof value[0] === 'number' && typeof value[1] === 'number'
}

function allPairs(values: unknown[]): values is Pair[] {
  return values.every(isPair)
}

function join(path: string, key: string): string {
  return path ? `${path}.${key}` : key
}

/** Re-throw input errors raised without a location as errors at `path`. */
function atPath<T>(path: string, fn: () => T): T {
  try {
    return fn()
  } catch (err) {
    if (err instanceof PlotInputError && err.path === undefined && path) {
      throw new PlotInputError(err.message, path)
    }
    throw err
  }
}

function readNumbers(value: unknown, path: string): number[] {
  if (!Array.isArray(value)) {
    throw new PlotInputError('expected an array of numbers', path)
  }
  return value.map((v: unknown, i) => {
    if (typeof v !== 'number') {
      throw new PlotInputError(`expected a number, got ${JSON.stringify(v)}`, `${path}[${i}]`)
    }
    return v
  })
}

function readDimension(value: unknown, path: string): number | null {
  if (value === null) return null
  if (typeof value !== 'number') {
    throw new PlotInputError(`expected a number, got ${JSON.stringify(value)}`, path)
  }
  return value
}

function readLimits(value: unknown, path: string): [number | null, number | null] {
  if (!Array.isArray(value) || value.length !== 2) {
    throw new PlotInputError('expected [min, max]', path)
  }
  const [min, max]: unknown[] = value
  const bound = (v: unknown, i: number): number | null => {
    if (v === null || typeof v === 'number') return v
    throw new PlotInputError(`expected a number or null, got ${JSON.stringify(v)}`, `${path}[${i}]`)
  }
  return [bound(min, 0), bound(max, 1)]
}

function readStyle(entry: Record<string, unknown>, path: string): SeriesStyle {
  const style: SeriesStyle = {}

  const { color, chars } = entry
  if (color !== undefined && color !== null) {
    if (typeof color !== 'string' || !isColorName(color)) {
      throw new PlotInputError(`unknown color ${JSON.stringify(color)}`, join(path, 'color'))
    }
    style.color = color
  }
  if (chars !== undefined) {
    if (typeof chars !== 'string') {
      throw new PlotInputError('expected a string of glyphs', join(path, 'chars'))
    }
    style.chars = chars
  }
  return style
}

function readSeries(entry: Record<string, unknown>, path: string): Series | null {
  const { x, y } = entry
  if (y === undefined) {
    if (x !== undefined) throw new PlotInputError('x given without y', join(path, 'y'))
    return null
  }

  const style = readStyle(entry, path)

  if (x !== undefined) {
    const xs = readNumbers(x, join(path, 'x'))
    const ys = readNumbers(y, join(path, 'y'))
    return atPath(path, () => Series.fromXY(xs, ys, style))
  }

  if (!Array.isArray(y)) {
    throw new PlotInputError('expected an array of numbers or of [x, y] pairs', join(path, 'y'))
  }
  if (y.length > 0 && allPairs(y)) {
    return atPath(path, () => Series.fromPairs(y, style))
  }
  if (y.some(Array.isArray)) {
    throw new PlotInputError('mixes numbers and [x, y] pairs', join(path, 'y'))
  }
  const ys = readNumbers(y, join(path, 'y'))
  return atPath(path, () => Series.fromValues(ys, style))
}

function applyEntry(plot: Plot, entry: unknown, path: string): void {
  if (!isRecord(entry)) {
    throw new PlotInputError('expected an object', path || undefined)
  }
  for (const key of Object.keys(entry)) {
    if (!ENTRY_KEYS.has(key)) {
      throw new PlotInputError(`unknown key ${JSON.stringify(key)}`, path || undefined)
    }
  }

  if ('width' in entry) {
    const width = readDimension(entry.width, join(path, 'width'))
    atPath(join(path, 'width'), () => plot.setWidth(width))
  }
  if ('height' in entry) {
    const height = readDimension(entry.height, join(path, 'height'))
    atPath(join(path, 'height'), () => plot.setHeight(height))
  }
  if ('xlim' in entry) {
    const [min, max] = readLimits(entry.xlim, join(path, 'xlim'))
    atPath(join(path, 'xlim'), () => plot.setXLim(min, max))
  }
  if ('ylim' in entry) {
    const [min, max] = readLimits(entry.ylim, join(path, 'ylim'))
    atPath(join(path, 'ylim'), () => plot.setYLim(min, max))
  }

  const series = readSeries(entry, path)
  if (series) plot.addSeries(series)
}

/**
 * Apply a parsed input document to `plot` (a fresh one by default) and
 * return it.
 */
export function parsePlotInput(document: unknown, plot: Plot = new Plot()): Plot {
  if (Array.isArray(document)) {
    document.forEach((entry: unknown, i) => applyEntry(plot, entry, `[${i}]`))
  } else {
    applyEntry(plot, document, '')
  }
  return plot
}

/** Parse JSON text and apply it like {@link parsePlotInput}. */
export function loadPlotInput(text: string, plot?: Plot): Plot {
  let document: unknown
  try {
    document = JSON.parse(text)
  } catch (err) {
    throw new PlotInputError(`invalid JSON: ${err instanceof Error ? err.message : String(err)}`)
  }
  return parsePlotInput(document, plot)
}
