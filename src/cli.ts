// ============================================================================
// shell-plot command line
//
//   shell-plot data.json --width 60
//   some-benchmark | shell-plot --no-color
//
// The input document format is described in input.ts. Command line sizes are
// applied first, so a document's own width/height keys take precedence.
// ============================================================================

import minimist from 'minimist'
import { Chalk } from 'chalk'
import { PlotInputError } from './errors.ts'
import { Plot } from './plot.ts'
import { loadPlotInput } from './input.ts'
import type { PlotOutput } from './ascii/render.ts'

export const USAGE = 'usage: shell-plot [file.json] [--width N] [--height N] [--color | --no-color]'

/** Process bindings, injected so the command can run in-process. */
export interface CliIO {
  stdout: PlotOutput
  stderr: PlotOutput
  stdinIsTTY: boolean
  readStdin(): Promise<string>
  readFile(path: string): Promise<string>
}

interface CliOptions {
  file: string | undefined
  width: number | undefined
  height: number | undefined
  color: boolean | undefined
  help: boolean
}

function parseSize(value: unknown, name: string): number | undefined {
  if (value === undefined) return undefined
  const n = Number(value)
  if (!Number.isInteger(n) || n < 1) {
    throw new PlotInputError(`--${name} must be a positive integer, got ${JSON.stringify(value)}`)
  }
  return n
}

/** `--color` / `--no-color` / `--color=false`; absent means follow the terminal. */
function colorFlagGiven(argv: readonly string[]): boolean {
  return argv.some((arg) => /^--(no-)?color(=|$)/.test(arg))
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const args = minimist([...argv], {
    string: ['width', 'height'],
    boolean: ['help', 'color'],
    alias: { w: 'width', h: 'height' },
  })

  const positional = args._.map(String)
  if (positional.length > 1) {
    throw new PlotInputError(`expected at most one input file, got ${positional.length}`)
  }

  return {
    file: positional[0],
    width: parseSize(args.width, 'width'),
    height: parseSize(args.height, 'height'),
    // minimist 会把未出现的 boolean 默认成 false，这里需要区分“未指定”（跟随终端）。
    color: colorFlagGiven(argv) ? args.color === true : undefined,
    help: args.help === true,
  }
}

async function readInput(options: CliOptions, io: CliIO): Promise<string | null> {
  if (options.file !== undefined) return io.readFile(options.file)
  if (!io.stdinIsTTY) return io.readStdin()
  return null
}

/** Run the command; resolves to the process exit code. */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  const paint = new Chalk({ level: io.stderr.isTTY === true ? 1 : 0 })
  const fail = (message: string): number => {
    io.stderr.write(`${paint.red('error:')} ${message}\n`)
    return 1
  }

  let options: CliOptions
  try {
    options = parseCliArgs(argv)
  } catch (err) {
    if (err instanceof PlotInputError) return fail(`${err.message}\n${USAGE}`)
    throw err
  }

  if (options.help) {
    io.stdout.write(USAGE + '\n')
    return 0
  }

  let text: string | null
  try {
    text = await readInput(options, io)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    return fail(`cannot read ${options.file ?? 'standard input'}: ${reason}`)
  }
  if (text === null) {
    io.stderr.write(USAGE + '\n')
    return 1
  }

  try {
    const plot = new Plot({ width: options.width, height: options.height })
    loadPlotInput(text, plot)
    plot.dump(io.stdout, { color: options.color })
  } catch (err) {
    if (err instanceof PlotInputError) return fail(err.message)
    throw err
  }
  return 0
}
