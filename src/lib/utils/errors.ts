/**
 * Custom error classes for the quote pipeline. Each failure is scoped to the
 * request that raised it.
 */
export class ProviderError extends Error {
  constructor(message: string, public provider: string, public statusCode?: number, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ProviderError'
  }
}

export class AuthError extends Error {
  constructor(message: string, public provider: string, public statusCode?: number) {
    super(message)
    this.name = 'AuthError'
  }
}

export class NotFoundError extends Error {
  constructor(message: string, public productId: string) {
    super(message)
    this.name = 'NotFoundError'
  }
}

export class CacheIOError extends Error {
  constructor(message: string, public operation: 'get' | 'set' | 'delete', options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'CacheIOError'
  }
}

export class ValidationError extends Error {
  constructor(message: string, public field?: string) {
    super(message)
    this.name = 'ValidationError'
  }
}

/**
 * Extract user-friendly error message from error object
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return 'An unknown error occurred'
}

export interface ErrorResponse {
  status: number
  body: { error: string; message: string }
}

/**
 * Map an error to the HTTP status and JSON body returned by route handlers
 */
export function errorToResponse(error: unknown): ErrorResponse {
  if (error instanceof ValidationError) {
    return { status: 400, body: { error: 'Invalid request', message: error.message } }
  }
  if (error instanceof AuthError) {
    return { status: 401, body: { error: 'Provider credential rejected', message: error.message } }
  }
  if (error instanceof NotFoundError) {
    return { status: 404, body: { error: 'Not available', message: error.message } }
  }
  if (error instanceof ProviderError) {
    return { status: 502, body: { error: 'Quote provider failure', message: error.message } }
  }
  return { status: 500, body: { error: 'Internal error', message: getErrorMessage(error) } }
}
