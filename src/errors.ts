export class ConfigError extends Error {
  readonly name = 'ConfigError'

  constructor(message: string, public readonly field?: string) {
    super(message)
  }
}

export class MessagesError extends Error {
  readonly name = 'MessagesError'

  constructor(message: string, public readonly key?: string) {
    super(message)
  }
}

export class ActivityError extends Error {
  readonly name = 'ActivityError'

  constructor(message: string, public readonly field?: string) {
    super(message)
  }
}

export class UnknownDialogError extends Error {
  readonly name = 'UnknownDialogError'

  constructor(public readonly dialogId: string) {
    super(`No dialog registered under "${dialogId}"`)
  }
}

export class DuplicateNameError extends Error {
  readonly name = 'DuplicateNameError'

  constructor(public readonly dialogId: string) {
    super(`A dialog is already registered under "${dialogId}"`)
  }
}

export type TransportSource = 'connector' | 'recognizer' | 'oauth'

export class TransportError extends Error {
  readonly name = 'TransportError'

  constructor(
    message: string,
    public readonly source: TransportSource,
    public readonly statusCode?: number,
    options?: ErrorOptions
  ) {
    super(message, options)
  }
}

export class SecretError extends Error {
  readonly name = 'SecretError'

  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
  }
}
