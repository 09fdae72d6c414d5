/**
 * Error taxonomy shared by the credential layer, the upstream client and the gateway.
 * Every class carries the HTTP status and error `type` the gateway answers with.
 */
export class GatewayError extends Error {
  constructor(
    message: string,
    readonly statusCode: number,
    readonly type: string,
  ) {
    super(message)
    this.name = new.target.name
  }
}

export class ConfigurationError extends GatewayError {
  constructor(message: string) {
    super(message, 500, 'configuration_error')
  }
}

export type AuthenticationFailure =
  | 'missing_credentials'
  | 'browser_unavailable'
  | 'navigation_timeout'
  | 'form_not_found'
  | 'login_timeout'
  | 'token_not_found'
  | 'token_expired'

/**
 * Raised by credential acquirers. Callers only ever see a generic 503; the reason is logged.
 */
export class AuthenticationError extends GatewayError {
  constructor(
    readonly reason: AuthenticationFailure,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, 503, 'upstream_unavailable')
    if (options?.cause !== undefined) {
      this.cause = options.cause
    }
  }
}

export class ValidationError extends GatewayError {
  constructor(message: string, statusCode = 400) {
    super(message, statusCode, 'invalid_request_error')
  }
}

export type RetryableReason = 'status' | 'timeout' | 'network'

export class RetryableUpstreamError extends GatewayError {
  constructor(
    readonly reason: RetryableReason,
    message: string,
    readonly upstreamStatus?: number,
  ) {
    super(
      message,
      reason === 'timeout' ? 504 : 503,
      reason === 'timeout' ? 'timeout_error' : 'upstream_unavailable',
    )
  }
}

/**
 * Upstream rejected the session token. Carries the token that was rejected so the
 * refresh coordinator can tell whether someone already replaced it.
 */
export class AuthorizationError extends GatewayError {
  constructor(readonly rejectedToken: string, readonly upstreamStatus: number) {
    super(`Upstream rejected credential (HTTP ${upstreamStatus})`, 502, 'upstream_authorization_error')
  }
}

export class StreamInterruptedError extends GatewayError {
  constructor(message = 'Upstream stream ended unexpectedly') {
    super(message, 502, 'stream_interrupted')
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error'
}
