/**
 * Error taxonomy for the decoding engine.
 *
 * Every recoverable failure inside a strategy is a DecodeError with a kind;
 * the orchestrator turns them into attempt records and only reports
 * AllStrategiesFailed. A missing codec is a different class because it aborts
 * the whole run instead of one file.
 */

export type DecodeErrorKind =
  | 'MalformedHeader'
  | 'DecompressionFailure'
  | 'SizeMismatch'
  | 'IndexRegionNotFound'
  | 'ImplausibleResult'
  | 'AllStrategiesFailed'

export class DecodeError extends Error {
  readonly kind: DecodeErrorKind

  constructor(kind: DecodeErrorKind, message: string) {
    super(message)
    this.name = 'DecodeError'
    this.kind = kind
  }
}

export class CodecUnavailableError extends Error {
  readonly attempted: string[]

  constructor(message: string, attempted: string[]) {
    super(message)
    this.name = 'CodecUnavailableError'
    this.attempted = attempted
  }
}
