/**
 * In-process tests for the command line entry point.
 */
import { describe, it, expect } from 'vitest'
import { runCli, parseCliArgs, USAGE, type CliIO } from '../cli.ts'

// ============================================================================
// Test helpers
// ============================================================================

interface FakeIO extends CliIO {
  out: string[]
  err: string[]
}

function fakeIO(files: Record<string, string> = {}, stdin: string | null = null): FakeIO {
  const out: string[] = []
  const err: string[] = []
  return {
    out,
    err,
    stdout: { isTTY: false, write: (chunk: string) => out.push(chunk) },
    stderr: { isTTY: false, write: (chunk: string) => err.push(chunk) },
    stdinIsTTY: stdin === null,
    readStdin: async () => stdin ?? '',
    readFile: async (path: string) => {
      const content = files[path]
      if (content === undefined) throw new Error(`ENOENT: no such file '${path}'`)
      return content
    },
  }
}

const EXPECTED = [
  '   2 ^       ooo',
  '     |   oooo  .',
  '     |ooo .    .',
  '   0 +--------->',
  '     0         2',
  '',
].join('\n')

describe('parseCliArgs', () => {
  it('reads sizes, the color switch and the file', () => {
    expect(parseCliArgs(['-w', '30', '--height=4', '--no-color', 'a.json'])).toEqual({
      file: 'a.json',
      width: 30,
      height: 4,
      color: false,
      help: false,
    })
  })

  it('leaves color unset unless asked', () => {
    expect(parseCliArgs([]).color).toBeUndefined()
    expect(parseCliArgs(['--color']).color).toBe(true)
  })
})

describe('runCli', () => {
  it('plots a file', async () => {
    const io = fakeIO({ 'data.json': '{"y": [0, 1, 2]}' })
    expect(await runCli(['--width', '10', '--height', '3', 'data.json'], io)).toBe(0)
    expect(io.out.join('')).toBe(EXPECTED)
    expect(io.err).toEqual([])
  })

  it('reads standard input when it is piped', async () => {
    const io = fakeIO({}, '[{"width": 10, "height": 3}, {"y": [0, 1, 2]}]')
    expect(await runCli([], io)).toBe(0)
    expect(io.out.join('')).toBe(EXPECTED)
  })

  it('prints usage without any input', async () => {
    const io = fakeIO()
    expect(await runCli([], io)).toBe(1)
    expect(io.err.join('')).toBe(USAGE + '\n')
  })

  it('prints usage on --help', async () => {
    const io = fakeIO()
    expect(await runCli(['--help'], io)).toBe(0)
    expect(io.out.join('')).toBe(USAGE + '\n')
  })

  it('reports invalid input with its location', async () => {
    const io = fakeIO({ 'bad.json': '{"y": [1], "color": "purple"}' })
    expect(await runCli(['bad.json'], io)).toBe(1)
    expect(io.err.join('')).toBe('error: color: unknown color "purple"\n')
    expect(io.out).toEqual([])
  })

  it('reports unreadable files', async () => {
    const io = fakeIO()
    expect(await runCli(['missing.json'], io)).toBe(1)
    expect(io.err.join('')).toBe("error: cannot read missing.json: ENOENT: no such file 'missing.json'\n")
  })

  it('rejects a bad size flag', async () => {
    const io = fakeIO({ 'data.json': '{"y": [1]}' })
    expect(await runCli(['--width', 'wide', 'data.json'], io)).toBe(1)
    expect(io.err.join('')).toBe(`error: --width must be a positive integer, got "wide"\n${USAGE}\n`)
  })
})
