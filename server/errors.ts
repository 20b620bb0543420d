export type LiveSinkErrorCode =
  | 'DUPLICATE_ID'
  | 'NEGOTIATION_FAILED'
  | 'DELIVERY_FAILED'
  | 'TRACK_CLOSED'
  | 'SINK_STATE'
  | 'INVALID_CONFIG'
  | 'INVALID_INPUT'

export class LiveSinkError extends Error {
  readonly code: LiveSinkErrorCode

  constructor(code: LiveSinkErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

/** An id was inserted twice. Allocation makes this unreachable in practice. */
export class DuplicateIdError extends LiveSinkError {
  constructor(readonly sessionId: string) {
    super('DUPLICATE_ID', `Session ${sessionId} is already registered`)
  }
}

export class NegotiationError extends LiveSinkError {
  constructor(
    message: string,
    readonly sessionId: string,
    cause?: unknown,
  ) {
    super('NEGOTIATION_FAILED', message, { cause })
  }
}

/** One peer's transport rejected a sample. Logged, never thrown to the producer. */
export class DeliveryError extends LiveSinkError {
  constructor(
    readonly sessionId: string,
    cause: unknown,
  ) {
    super('DELIVERY_FAILED', `Failed to deliver sample to ${sessionId}: ${describeError(cause)}`, { cause })
  }
}

export class TrackClosedError extends LiveSinkError {
  constructor() {
    super('TRACK_CLOSED', 'Distribution track has been destroyed')
  }
}

export class SinkStateError extends LiveSinkError {
  constructor(message: string) {
    super('SINK_STATE', message)
  }
}

export class ConfigError extends LiveSinkError {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super('INVALID_CONFIG', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message)
  }
}

/** The upstream byte stream is not in the expected container format. */
export class InputFormatError extends LiveSinkError {
  constructor(message: string) {
    super('INVALID_INPUT', message)
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}

export function httpStatusForError(err: unknown): number {
  if (!(err instanceof LiveSinkError)) return 500
  switch (err.code) {
    case 'DUPLICATE_ID':
      return 409
    case 'SINK_STATE':
    case 'TRACK_CLOSED':
      return 503
    case 'INVALID_CONFIG':
      return 400
    default:
      return 500
  }
}
