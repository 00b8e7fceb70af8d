// ============================================================================
// ASCII plot renderer — terminal color palette
//
// Colors are plain ANSI 16-color escapes (chalk at level 1). They only ever
// wrap a single glyph, so they never change the layout width of a row.
// ============================================================================

import { Chalk, type ChalkInstance } from 'chalk'

export const COLOR_NAMES = [
  'black',
  'red',
  'green',
  'yellow',
  'blue',
  'magenta',
  'cyan',
  'white',
  'bright black',
  'bright red',
  'bright green',
  'bright yellow',
  'bright blue',
  'bright magenta',
  'bright cyan',
  'bright white',
] as const

export type ColorName = (typeof COLOR_NAMES)[number]

const STYLES: Record<ColorName, (c: ChalkInstance) => ChalkInstance> = {
  'black': (c) => c.black,
  'red': (c) => c.red,
  'green': (c) => c.green,
  'yellow': (c) => c.yellow,
  'blue': (c) => c.blue,
  'magenta': (c) => c.magenta,
  'cyan': (c) => c.cyan,
  'white': (c) => c.white,
  'bright black': (c) => c.blackBright,
  'bright red': (c) => c.redBright,
  'bright green': (c) => c.greenBright,
  'bright yellow': (c) => c.yellowBright,
  'bright blue': (c) => c.blueBright,
  'bright magenta': (c) => c.magentaBright,
  'bright cyan': (c) => c.cyanBright,
  'bright white': (c) => c.whiteBright,
}

export function isColorName(name: string): name is ColorName {
  return COLOR_NAMES.some((known) => known === name)
}

// 固定 level 1：是否上色由 renderer 根据输出流决定，不依赖 chalk 自己的终端探测。
const ansi = new Chalk({ level: 1 })

/** Wrap `text` in the escape for `color`, followed by the closing code. */
export function paint(text: string, color: ColorName): string {
  return STYLES[color](ansi)(text)
}
