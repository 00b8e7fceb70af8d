// ============================================================================
// Series — one curve of the plot
//
// A series is an ordered list of (x, y) samples plus up to four glyphs, one per
// geometry layer: [point, line, point-drop, line-drop]. A missing glyph or a
// space disables that layer. Everything is validated when the series is built
// and frozen afterwards.
// ============================================================================

import { PlotInputError } from './errors.ts'
import { isColorName, type ColorName } from './ascii/palette.ts'
import { charDisplayWidth } from './ascii/text-width.ts'
import { LAYER_RANKS, type LayerRank } from './ascii/types.ts'

/** Points, then lines; no drop layers. */
export const DEFAULT_CHARS = 'oo.'

export const MAX_GLYPHS = LAYER_RANKS.length

export interface SeriesStyle {
  /** Palette color; `null` or absent draws uncolored glyphs. */
  color?: ColorName | null
  /** Up to four glyphs indexed by layer, defaults to {@link DEFAULT_CHARS}. */
  chars?: string
}

export type Pair = readonly [number, number]

function assertFiniteValues(values: readonly number[], axis: string): void {
  values.forEach((v, i) => {
    if (typeof v !== 'number' || !Number.isFinite(v)) {
      throw new PlotInputError(`${axis}[${i}] must be a finite number, got ${String(v)}`)
    }
  })
}

function parseGlyphs(chars: string): (string | null)[] {
  const glyphs = Array.from(chars)
  if (glyphs.length > MAX_GLYPHS) {
    throw new PlotInputError(`chars takes at most ${MAX_GLYPHS} glyphs, got ${JSON.stringify(chars)}`)
  }
  return LAYER_RANKS.map((rank) => {
    const glyph = glyphs[rank]
    if (glyph === undefined || glyph === ' ') return null
    if (charDisplayWidth(glyph) !== 1) {
      throw new PlotInputError(`glyph ${JSON.stringify(glyph)} does not occupy exactly one terminal column`)
    }
    return glyph
  })
}

function resolveColor(color: ColorName | null | undefined): ColorName | null {
  if (color == null) return null
  if (!isColorName(color)) {
    throw new PlotInputError(`unknown color ${JSON.stringify(color)}`)
  }
  return color
}

export class Series {
  readonly x: readonly number[]
  readonly y: readonly number[]
  readonly color: ColorName | null
  private readonly glyphs: readonly (string | null)[]

  private constructor(x: readonly number[], y: readonly number[], style: SeriesStyle) {
    if (y.length === 0) {
      throw new PlotInputError('a series needs at least one sample')
    }
    if (x.length !== y.length) {
      throw new PlotInputError(`x has ${x.length} values but y has ${y.length}`)
    }
    assertFiniteValues(x, 'x')
    assertFiniteValues(y, 'y')

    this.x = Object.freeze([...x])
    this.y = Object.freeze([...y])
    this.color = resolveColor(style.color)
    this.glyphs = Object.freeze(parseGlyphs(style.chars ?? DEFAULT_CHARS))
    Object.freeze(this)
  }

  /** y values sampled at x = 0, 1, ..., N-1. */
  static fromValues(y: readonly number[], style: SeriesStyle = {}): Series {
    return new Series(y.map((_, i) => i), y, style)
  }

  /** Explicit (x, y) pairs, in drawing order. */
  static fromPairs(pairs: readonly Pair[], style: SeriesStyle = {}): Series {
    pairs.forEach((pair, i) => {
      if (!Array.isArray(pair) || pair.length !== 2) {
        throw new PlotInputError(`pair ${i} must have exactly two values`)
      }
    })
    return new Series(pairs.map(([x]) => x), pairs.map(([, y]) => y), style)
  }

  /** Parallel x and y sequences of equal length. */
  static fromXY(x: readonly number[], y: readonly number[], style: SeriesStyle = {}): Series {
    return new Series(x, y, style)
  }

  get length(): number {
    return this.y.length
  }

  /** Glyph drawn for `rank`, or null when that layer is disabled. */
  glyph(rank: LayerRank): string | null {
    return this.glyphs[rank] ?? null
  }

  /** True when no layer has a glyph, i.e. the series never claims a cell. */
  get isInvisible(): boolean {
    return this.glyphs.every((g) => g === null)
  }
}
