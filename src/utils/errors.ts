'use strict'

export class AppError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
  }
}

export class ConfigError extends AppError {}

/** `1500` -> `2s`, `100` -> `100ms` */
export function formatTimeout(timeoutMs: number) {
  return timeoutMs < 1000 ? `${timeoutMs}ms` : `${Math.round(timeoutMs / 1000)}s`
}

/** Bad date or selection typed at a prompt, recovered by asking again. */
export class InputValidationError extends AppError {}

export class InputClosed extends AppError {
  constructor() {
    super('Input was closed before an answer was given')
  }
}

export class BrowserClosed extends AppError {
  constructor() {
    super('The browser window was closed')
  }
}

export class AuthenticationTimeout extends AppError {
  constructor(site: string, timeoutMs: number) {
    super(`Login to ${site} was not completed within ${formatTimeout(timeoutMs)}`)
  }
}

/** The site's markup no longer matches a selector the adapter relies on. */
export class ElementNotFound extends AppError {
  selector: string

  constructor(selector: string) {
    super(`No visible element matches ${selector}`)
    this.selector = selector
  }
}

export class TimeoutWaitingForCompletion extends AppError {
  constructor(action: string, timeoutMs: number) {
    super(`${action} did not finish within ${formatTimeout(timeoutMs)}`)
  }
}

export class RecordingListUnavailable extends AppError {}

export class DownloadFailed extends AppError {}

export class UploadFailed extends AppError {}

export function getErrorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error)
}
