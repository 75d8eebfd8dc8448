export type ErrorCode = 'config' | 'input' | 'template' | 'usage'

export class BulkmailError extends Error {
  public readonly code: ErrorCode

  constructor(message: string, code: ErrorCode) {
    super(message)
    this.code = code
    this.name = 'BulkmailError'
    Error.captureStackTrace(this, this.constructor)
  }
}

export class ConfigError extends BulkmailError {
  public readonly issues: string[]

  constructor(message: string, issues: string[] = []) {
    super(message, 'config')
    this.name = 'ConfigError'
    this.issues = issues
  }
}

export class InputError extends BulkmailError {
  constructor(message: string) {
    super(message, 'input')
    this.name = 'InputError'
  }
}

export class TemplateError extends BulkmailError {
  constructor(message: string, public readonly placeholder: string) {
    super(message, 'template')
    this.name = 'TemplateError'
  }
}

export class UsageError extends BulkmailError {
  constructor(message: string) {
    super(message, 'usage')
    this.name = 'UsageError'
  }
}
