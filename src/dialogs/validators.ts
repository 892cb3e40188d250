export type ValidationResult<T> =
  | { status: 'accepted'; value: T }
  | { status: 'rejected'; retryMessage?: string }

export type PromptValidator<T> = (value: T) => ValidationResult<T>

export function accepted<T>(value: T): ValidationResult<T> {
  return { status: 'accepted', value }
}

export function rejected<T>(retryMessage?: string): ValidationResult<T> {
  return retryMessage === undefined ? { status: 'rejected' } : { status: 'rejected', retryMessage }
}

export const MIN_TITLE_LENGTH = 3

/**
 * Titles must contain a non-whitespace character and be at least
 * MIN_TITLE_LENGTH characters long as typed.
 */
export function createTitleValidator(retryMessage: string): PromptValidator<string> {
  return (value) => {
    if (value.trim().length === 0 || value.length < MIN_TITLE_LENGTH) {
      return rejected(retryMessage)
    }
    return accepted(value)
  }
}
