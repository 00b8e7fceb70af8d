/**
 * Unit tests for layer compositing.
 *
 * composeLayers() must keep, for every cell, the occupant with the smallest
 * layer rank no matter which series was submitted first. At equal rank the
 * earlier series keeps the cell.
 */
import { describe, it, expect } from 'vitest'
import {
  composeLayers, getOccupant, layerPaths, occupiedCells, resolveRanges, getCellMapSize,
  type CellMap,
} from '../ascii/canvas.ts'
import { makeScale } from '../ascii/scale.ts'
import { LayerRank, type AxisRange } from '../ascii/types.ts'
import { Series } from '../series.ts'
import { Plot } from '../plot.ts'
import { PlotError } from '../errors.ts'

// ============================================================================
// Test helpers
// ============================================================================

/** 0..4 on both axes over a 5×5 grid: data values map to identical cells. */
const UNIT: AxisRange = { min: 0, max: 4 }

function compose5x5(series: Series[]): CellMap {
  return composeLayers(series, UNIT, UNIT, 5, 5)
}

/** Glyphs of the map, top row first. */
function glyphRows(cells: CellMap): string[] {
  return cells
    .map((row) => row.map((o) => o?.glyph ?? ' ').join(''))
    .reverse()
}

describe('makeScale', () => {
  it('maps the range linearly onto [0, extent - 1], flooring', () => {
    const scale = makeScale({ min: 0, max: 10 }, 11)
    expect(scale(0)).toBe(0)
    expect(scale(5)).toBe(5)
    expect(scale(10)).toBe(10)
    expect(scale(7.9)).toBe(7)
  })

  it('maps values outside the range outside the grid', () => {
    const scale = makeScale({ min: 0, max: 10 }, 11)
    expect(scale(-1)).toBe(-1)
    expect(scale(12)).toBe(12)
  })

  it('stays finite when the exact index overflows', () => {
    const tiny = makeScale({ min: 0, max: 1e-300 }, 5)
    expect(tiny(1e300)).toBe(Number.MAX_VALUE)
    expect(tiny(-1e300)).toBe(-Number.MAX_VALUE)
    expect(makeScale({ min: 0, max: 1e-300 }, 1)(1e300)).toBe(0)
  })

  it('handles ranges wider than the largest double', () => {
    const wide = makeScale({ min: -1e308, max: 1e308 }, 5)
    expect(wide(-1e308)).toBe(0)
    expect(wide(0)).toBe(2)
    expect(wide(1e308)).toBe(4)
  })

  it('refuses an empty range', () => {
    expect(() => makeScale({ min: 3, max: 3 }, 10)).toThrow(PlotError)
  })
})

describe('resolveRanges', () => {
  const a = Series.fromPairs([[1, 10], [3, 20]])
  const b = Series.fromPairs([[-2, 15], [2, 5]])

  it('fits missing bounds to all series', () => {
    expect(resolveRanges([a, b])).toEqual({
      xRange: { min: -2, max: 3 },
      yRange: { min: 5, max: 20 },
    })
  })

  it('prefers explicit bounds one by one', () => {
    expect(resolveRanges([a, b], { max: 10 }, { min: 0 })).toEqual({
      xRange: { min: -2, max: 10 },
      yRange: { min: 0, max: 20 },
    })
  })

  it('falls back to an empty range without data', () => {
    expect(resolveRanges([])).toEqual({
      xRange: { min: 0, max: 0 },
      yRange: { min: 0, max: 0 },
    })
  })
})

describe('layerPaths', () => {
  it('produces points, lines and both drop layers', () => {
    const s = Series.fromPairs([[0, 0], [2, 2]])
    const scale = makeScale(UNIT, 5)
    const [points, lines, pointDrops, lineDrops] = layerPaths(s, scale, scale)

    expect([...points]).toEqual([{ col: 0, row: 0 }, { col: 2, row: 2 }])
    expect([...lines]).toEqual([{ col: 0, row: 0 }, { col: 1, row: 1 }, { col: 2, row: 2 }])
    expect([...pointDrops]).toEqual([{ col: 2, row: 0 }, { col: 2, row: 1 }])
    expect([...lineDrops]).toEqual([{ col: 1, row: 0 }, { col: 2, row: 0 }, { col: 2, row: 1 }])
  })
})

describe('composeLayers', () => {
  const line = Series.fromPairs([[0, 2], [4, 2]], { chars: ' -' })
  const point = Series.fromPairs([[2, 2]], { chars: '*' })

  it('keeps the point over the line whichever is added first', () => {
    for (const order of [[line, point], [point, line]]) {
      const cells = compose5x5(order)
      const crossing = getOccupant(cells, { col: 2, row: 2 })
      expect(crossing?.rank).toBe(LayerRank.Point)
      expect(crossing?.series).toBe(point)
      expect(crossing?.glyph).toBe('*')
      expect(getOccupant(cells, { col: 1, row: 2 })?.glyph).toBe('-')
    }
  })

  it('gives equal-rank ties to the earlier series', () => {
    const other = Series.fromPairs([[2, 2]], { chars: 'x' })
    expect(getOccupant(compose5x5([point, other]), { col: 2, row: 2 })?.glyph).toBe('*')
    expect(getOccupant(compose5x5([other, point]), { col: 2, row: 2 })?.glyph).toBe('x')
  })

  it('draws point stems under each sample', () => {
    const s = Series.fromPairs([[0, 0], [4, 3]], { chars: 'o |' })
    expect(glyphRows(compose5x5([s]))).toEqual([
      '     ',
      '    o',
      '    |',
      '    |',
      'o   |',
    ])
  })

  it('fills the area under the interpolated line', () => {
    const s = Series.fromPairs([[0, 0], [2, 2]], { chars: ' - #' })
    const cells = composeLayers([s], { min: 0, max: 2 }, { min: 0, max: 2 }, 3, 3)
    expect(glyphRows(cells)).toEqual([
      '  -',
      ' -#',
      '-##',
    ])
  })

  it('attributes no cell to a series whose glyphs are blank', () => {
    const blank = Series.fromPairs([[0, 0], [4, 4]], { chars: '' })
    const spaces = Series.fromPairs([[0, 4], [4, 0]], { chars: '    ' })
    const cells = compose5x5([blank, spaces, point])

    const owners = [...occupiedCells(cells)].map(([, o]) => o.series)
    expect(owners).toEqual([point])
  })

  it('clips everything outside the grid', () => {
    const s = Series.fromXY([-3, 0, 1, 2, 5], [-5, 10, 3, 1, 2], { chars: 'o-|#' })
    const cells = composeLayers([s], { min: 0, max: 2 }, { min: 0, max: 4 }, 3, 5)

    expect(getCellMapSize(cells)).toEqual([3, 5])
    const occupied = [...occupiedCells(cells)]
    expect(occupied.length).toBeGreaterThan(0)
    for (const [cell] of occupied) {
      expect(cell.col).toBeGreaterThanOrEqual(0)
      expect(cell.col).toBeLessThan(3)
      expect(cell.row).toBeGreaterThanOrEqual(0)
      expect(cell.row).toBeLessThan(5)
    }
  })

  it('is empty when a range is degenerate', () => {
    const flat = Series.fromValues([3, 3, 3])
    const cells = composeLayers([flat], { min: 0, max: 2 }, { min: 3, max: 3 }, 4, 4)
    expect([...occupiedCells(cells)]).toEqual([])
    expect(getCellMapSize(cells)).toEqual([4, 4])
  })
})

describe('composeLayers with far-off data', () => {
  const X: AxisRange = { min: 0, max: 1 }
  const Y: AxisRange = { min: 0, max: 1 }

  function compose10x5(y: number[], chars?: string, yRange: AxisRange = Y): CellMap {
    return composeLayers([Series.fromValues(y, chars === undefined ? {} : { chars })], X, yRange, 10, 5)
  }

  it('draws the same in-grid cells however far the sample lies', () => {
    const expected = Array.from({ length: 5 }, () => 'o        .')
    for (const far of [20, 2e7, 2e8, 1e300]) {
      expect(glyphRows(compose10x5([0, far]))).toEqual(expected)
    }
  })

  it('produces no more line cells than the grid holds', () => {
    const s = Series.fromValues([0, 2e8])
    const scale = makeScale(X, 10)
    const [, lines, , lineDrops] = layerPaths(s, scale, makeScale(Y, 5), { width: 10, height: 5 })
    expect([...lines]).toEqual([0, 1, 2, 3, 4].map((row) => ({ col: 0, row })))
    expect([...lineDrops]).toHaveLength(50)
  })

  it('fills whole columns under a line that leaves through the top', () => {
    const expected = Array.from({ length: 5 }, () => '-########|')
    expect(glyphRows(compose10x5([0, 20], ' -|#'))).toEqual(expected)
    expect(glyphRows(compose10x5([0, 1e300], ' -|#'))).toEqual(expected)
  })

  it('does not throw when the scaled index overflows', () => {
    expect(glyphRows(compose10x5([0, 1e300], undefined, { min: 0, max: 1e-300 })))
      .toEqual(Array.from({ length: 5 }, () => 'o        .'))
    const plot = new Plot({ width: 10, height: 5, ylim: [0, 1e-300] }).plotValues([0, 1e300])
    expect(() => plot.dumps()).not.toThrow()
  })

  it('fits a range wider than the largest double', () => {
    const s = Series.fromValues([-1e308, 1e308])
    const { xRange, yRange } = resolveRanges([s])
    const cells = composeLayers([s], xRange, yRange, 10, 5)
    expect(getOccupant(cells, { col: 0, row: 0 })?.rank).toBe(LayerRank.Point)
    expect(getOccupant(cells, { col: 9, row: 4 })?.rank).toBe(LayerRank.Point)
  })
})
