export type TalkdeckErrorName =
  | 'InsufficientInputError'
  | 'FrameMismatchError'
  | 'ExternalCallError'
  | 'AbortError'

function createNamedError(name: TalkdeckErrorName, message: string, cause?: unknown): Error {
  const error = new Error(message, cause === undefined ? undefined : { cause })
  error.name = name
  return error
}

export function createInsufficientInputError(message: string): Error {
  return createNamedError('InsufficientInputError', message)
}

export function createFrameMismatchError(message: string): Error {
  return createNamedError('FrameMismatchError', message)
}

export function createExternalCallError(message: string, cause?: unknown): Error {
  return createNamedError('ExternalCallError', message, cause)
}

export function createAbortError(reason?: unknown): Error {
  if (reason instanceof Error && reason.name === 'AbortError') return reason
  return createNamedError('AbortError', 'Operation was aborted', reason)
}

export function isNamedError(error: unknown, name: TalkdeckErrorName): error is Error {
  return error instanceof Error && error.name === name
}

export function throwIfAborted(signal: AbortSignal | null | undefined): void {
  if (signal?.aborted) throw createAbortError(signal.reason)
}

export function formatErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
