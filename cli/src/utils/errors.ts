/**
 * Error taxonomy
 *
 * Every failure the pipeline distinguishes carries a `kind` tag so loop
 * boundaries can decide between "note it and continue" and "halt the run".
 */

export type TriageErrorKind =
  | 'BackendUnavailable'
  | 'NotFound'
  | 'EntryNotFound'
  | 'DecompilationFailed'
  | 'SummarizationFailed'
  | 'MalformedResponse'
  | 'DispatchNotResolved'
  | 'ConfigError'

export class TriageError extends Error {
  readonly kind: TriageErrorKind

  constructor(kind: TriageErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.kind = kind
    this.name = `${kind}Error`
  }
}

/** Transport-level; fatal to the run */
export class BackendUnavailableError extends TriageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('BackendUnavailable', message, options)
  }
}

export class NotFoundError extends TriageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('NotFound', message, options)
  }
}

export class EntryNotFoundError extends TriageError {
  readonly symbol: string

  constructor(symbol: string) {
    super('EntryNotFound', `${symbol} is not present in the import table`)
    this.symbol = symbol
  }
}

export class DecompilationFailedError extends TriageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DecompilationFailed', message, options)
  }
}

export class SummarizationFailedError extends TriageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SummarizationFailed', message, options)
  }
}

export class MalformedResponseError extends TriageError {
  readonly rawText: string

  constructor(message: string, rawText: string) {
    super('MalformedResponse', message)
    this.rawText = rawText
  }
}

export class DispatchNotResolvedError extends TriageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DispatchNotResolved', message, options)
  }
}

export class ConfigError extends TriageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ConfigError', message, options)
  }
}

export function isTriageError(err: unknown, kind?: TriageErrorKind): err is TriageError {
  return err instanceof TriageError && (kind === undefined || err.kind === kind)
}

export function isFatal(err: unknown): boolean {
  return isTriageError(err, 'BackendUnavailable')
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
