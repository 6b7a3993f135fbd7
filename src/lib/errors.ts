// Engine error types
// Malformed input surfaces as TwinValidationError; tolerated input never throws

import type { ZodError } from 'zod'

export class TwinValidationError extends Error {
  readonly issues: string[]

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join(', ')}` : message)
    this.name = 'TwinValidationError'
    this.issues = issues
  }

  static fromZod(context: string, error: ZodError): TwinValidationError {
    const issues = error.issues.map(e => `${e.path.length ? e.path.join('.') : '(root)'}: ${e.message}`)
    return new TwinValidationError(context, issues)
  }
}

export function isTwinValidationError(error: unknown): error is TwinValidationError {
  return error instanceof TwinValidationError
}
