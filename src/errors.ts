export type ErrorKind =
  | "ConfigError"
  | "ConnectionError"
  | "ProviderError"
  | "SubmissionError"
  | "SigningError"
  | "TimeoutError"
  | "Cancelled"

export class ProbeError extends Error {
  readonly kind: ErrorKind

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.kind = kind
    this.name = kind
  }
}

// Missing or invalid configuration. Raised before any network activity.
export class ConfigError extends ProbeError {
  constructor(message: string) {
    super("ConfigError", message)
  }
}

export class ConnectionError extends ProbeError {
  constructor(message: string, cause?: unknown) {
    super("ConnectionError", message, { cause })
  }
}

export class ProviderError extends ProbeError {
  constructor(message: string, cause?: unknown) {
    super("ProviderError", message, { cause })
  }
}

export class SubmissionError extends ProbeError {
  constructor(message: string, cause?: unknown) {
    super("SubmissionError", message, { cause })
  }
}

export class SigningError extends ProbeError {
  constructor(message: string, cause?: unknown) {
    super("SigningError", message, { cause })
  }
}

export class TimeoutError extends ProbeError {
  constructor(message: string) {
    super("TimeoutError", message)
  }
}

export class CancelledError extends ProbeError {
  constructor(message = "probe cancelled") {
    super("Cancelled", message)
  }
}

// Only these end the whole run; everything else is scoped to one iteration.
export function isFatal(err: unknown): boolean {
  return err instanceof ConfigError || err instanceof SigningError
}

export function errorMessage(err: unknown): string {
  if (typeof err === "object" && err != null && "message" in err && typeof err.message === "string") {
    return err.message
  }
  return String(err)
}
