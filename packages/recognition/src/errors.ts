/**
 * Recognition Errors
 *
 * Every failure the pipeline knows how to handle is a RecognitionError
 * carrying a `kind`. Callers switch on `kind`, not on the class.
 *
 * | kind               | handling                                      |
 * |--------------------|-----------------------------------------------|
 * | NetworkTimeout     | error-flagged set (detect) / Unknown label    |
 * | NetworkUnreachable | same                                          |
 * | MalformedResponse  | same                                          |
 * | EmptyFrame         | capture retried on the next tick              |
 * | EncodeFailure      | cycle skipped, previous set kept              |
 * | FrameSourceClosed  | fatal, shutdown requested                     |
 */

import { ZodError } from 'zod'
import { recognitionKeywords } from './vocabulary/keywords'
import type { ErrorKind } from './vocabulary/keywords'
import type { CycleError } from './vocabulary/schemas'

const { errorKinds } = recognitionKeywords

type ErrorOptions = { cause?: unknown }

export class RecognitionError extends Error {
  readonly kind: ErrorKind

  constructor(kind: ErrorKind, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
    this.kind = kind
  }
}

export class NetworkTimeoutError extends RecognitionError {
  constructor(message: string, options?: ErrorOptions) {
    super(errorKinds.networkTimeout, message, options)
  }
}

export class NetworkUnreachableError extends RecognitionError {
  constructor(message: string, options?: ErrorOptions) {
    super(errorKinds.networkUnreachable, message, options)
  }
}

export class MalformedResponseError extends RecognitionError {
  constructor(message: string, options?: ErrorOptions) {
    super(errorKinds.malformedResponse, message, options)
  }
}

export class EmptyFrameError extends RecognitionError {
  constructor(message: string, options?: ErrorOptions) {
    super(errorKinds.emptyFrame, message, options)
  }
}

export class EncodeFailureError extends RecognitionError {
  constructor(message: string, options?: ErrorOptions) {
    super(errorKinds.encodeFailure, message, options)
  }
}

export class FrameSourceClosedError extends RecognitionError {
  constructor(message: string, options?: ErrorOptions) {
    super(errorKinds.frameSourceClosed, message, options)
  }
}

export const isRecognitionError = (
  error: unknown,
  kind?: ErrorKind,
): error is RecognitionError =>
  error instanceof RecognitionError && (kind === undefined || error.kind === kind)

/**
 * Map whatever a remote call threw onto the taxonomy.
 *
 * - AbortSignal.timeout() rejects with a `TimeoutError`
 * - fetch() rejects with a TypeError when the host cannot be reached
 * - bad JSON or a schema mismatch is a malformed response
 */
export function toRecognitionError(error: unknown): RecognitionError {
  if (error instanceof RecognitionError) return error

  if (error instanceof ZodError) {
    return new MalformedResponseError(error.issues[0]?.message ?? 'Invalid response', {
      cause: error,
    })
  }

  if (error instanceof Error) {
    if (error.name === 'TimeoutError' || error.name === 'AbortError') {
      return new NetworkTimeoutError(error.message, { cause: error })
    }
    if (error instanceof SyntaxError) {
      return new MalformedResponseError(error.message, { cause: error })
    }
    return new NetworkUnreachableError(error.message, { cause: error })
  }

  return new NetworkUnreachableError(String(error))
}

/**
 * Plain `{ kind, message }` for embedding in a ResultSet
 */
export const toCycleError = (error: unknown): CycleError => {
  const { kind, message } = toRecognitionError(error)
  return { kind, message }
}
