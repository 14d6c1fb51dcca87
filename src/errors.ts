// src/errors.ts — Typed error classes for endpoint calls, ledger writes and config

/** Error codes for a single endpoint attempt */
export type EndpointErrorCode =
  | "network_error"
  | "http_status"
  | "malformed_response"
  | "timeout"

/** Failure of one endpoint attempt. `statusCode` is set for non-2xx responses. */
export class EndpointError extends Error {
  readonly name = "EndpointError"
  readonly code: EndpointErrorCode
  readonly endpoint: string
  readonly statusCode?: number

  constructor(opts: {
    code: EndpointErrorCode
    endpoint: string
    message: string
    statusCode?: number
  }) {
    super(opts.message)
    this.code = opts.code
    this.endpoint = opts.endpoint
    this.statusCode = opts.statusCode
  }
}

/** Thrown when a round could not be persisted. The chain root is not advanced. */
export class LedgerWriteError extends Error {
  readonly name = "LedgerWriteError"
  readonly path: string

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`[ledger] failed to persist ${path}: ${reason}`, { cause })
    this.path = path
  }
}

/** Invalid or missing configuration value */
export class ConfigError extends Error {
  readonly name = "ConfigError"
  readonly key: string

  constructor(key: string, message: string) {
    super(`${key} ${message}`)
    this.key = key
  }
}
