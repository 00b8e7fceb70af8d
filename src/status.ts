// ============================================================================
// Status reporter for long-running sweeps
//
// Data-producing harnesses (benchmarks, profilers) report through one
// explicit reporter object instead of shared global state:
//
//   const status = new StatusReporter(process.stdout)
//   status.beginSection('heap_usage')
//   status.progress('insert', 'compiling')   // transient, terminals only
//   status.result('insert', '1.5kB')         // always printed
//   status.endSection('heap_usage')
// ============================================================================

import { PlotError } from './errors.ts'
import type { PlotOutput } from './ascii/render.ts'
import { textDisplayWidth } from './ascii/text-width.ts'

export class StatusReporter {
  private openSection: string | null = null
  /** Display width of the transient progress line currently on screen. */
  private transientWidth = 0

  constructor(private readonly out: PlotOutput) {}

  get section(): string | null {
    return this.openSection
  }

  beginSection(name: string): void {
    if (this.openSection !== null) {
      throw new PlotError(`section "${name}" started inside open section "${this.openSection}"`)
    }
    this.clearTransient()
    this.openSection = name
    this.out.write(`--- ${name} ---\n`)
  }

  endSection(name: string): void {
    if (this.openSection !== name) {
      throw new PlotError(`cannot end section "${name}": open section is ${JSON.stringify(this.openSection)}`)
    }
    this.clearTransient()
    this.openSection = null
    this.out.write('\n')
  }

  /** Run `fn` inside a section; the section is closed even if `fn` throws. */
  withSection<T>(name: string, fn: () => T): T {
    this.beginSection(name)
    try {
      return fn()
    } finally {
      this.endSection(name)
    }
  }

  /**
   * Show what is happening now. The line is erased by the next write and is
   * omitted entirely when the output is not a terminal.
   */
  progress(label: string, state?: string): void {
    if (this.out.isTTY !== true) return
    this.clearTransient()

    const status = state ? `${label}: ${state}... ` : `${label}... `
    this.out.write(status)
    this.transientWidth = textDisplayWidth(status)
  }

  /** Print a final result line. */
  result(label: string, value: string): void {
    this.clearTransient()
    this.out.write(`${label}: ${value}\n`)
  }

  private clearTransient(): void {
    if (this.transientWidth === 0) return
    this.out.write('\r' + ' '.repeat(this.transientWidth) + '\r')
    this.transientWidth = 0
  }
}
