// ============================================================================
// Error types
//
// PlotError covers misuse of the engine (bad ranges, bad coordinates).
// PlotInputError covers malformed series / input documents; `path` points at
// the offending field, e.g. `[1].color`.
// ============================================================================

export class PlotError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'PlotError'
  }
}

export class PlotInputError extends PlotError {
  readonly path: string | undefined

  constructor(message: string, path?: string) {
    super(path ? `${path}: ${message}` : message)
    this.name = 'PlotInputError'
    this.path = path
  }
}
