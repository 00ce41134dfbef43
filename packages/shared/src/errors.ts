export type PipelineErrorKind =
  | 'ConfigurationContradiction'
  | 'ExternalToolFailure'
  | 'PolicyMismatch'
  | 'MissingResource'
  | 'InvariantViolation'
  | 'MalformedResource'

/**
 * Fatal pipeline condition. The message names the offending path, locale or ID.
 */
export class PipelineError extends Error {
  readonly kind: PipelineErrorKind

  constructor(kind: PipelineErrorKind, message: string) {
    super(message)
    this.name = 'PipelineError'
    this.kind = kind
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError
}
