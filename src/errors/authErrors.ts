import { AUTH_MESSAGES, ConfigurationReason, getConfigurationMessage, getDenialMessage } from '../constants/authMessages.js';

/**
 * Error classes for the desktop OAuth flow
 * Each failure kind maps to one class so callers can decide between retry,
 * a support message, or an alternate sign-in method
 */

export type AuthErrorKind =
  | 'configuration'
  | 'bind'
  | 'launch'
  | 'security'
  | 'authorization_denied'
  | 'malformed_redirect'
  | 'network'
  | 'timeout'
  | 'token_exchange'
  | 'cancelled';

/** Step of the flow a transport or exchange failure happened in */
export type FlowPhase = 'redirect' | 'authorization_url' | 'code_exchange' | 'refresh' | 'revoke';

/**
 * Base error class for loopback OAuth operations
 */
export class LoopbackAuthError extends Error {
  /** Message safe to show to an end user */
  readonly userMessage: string;

  constructor(
    message: string,
    public readonly kind: AuthErrorKind,
    userMessage: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.userMessage = userMessage;
  }
}

/**
 * Missing or invalid client configuration; fatal for this build/platform
 */
export class ConfigurationError extends LoopbackAuthError {
  constructor(message: string, public readonly reason: ConfigurationReason) {
    super(message, 'configuration', getConfigurationMessage(reason));
  }
}

/**
 * The loopback listener could not bind a port
 */
export class BindError extends LoopbackAuthError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'bind', AUTH_MESSAGES.BIND_FAILED, options);
  }
}

/**
 * Every browser launch strategy failed
 */
export class LaunchError extends LoopbackAuthError {
  constructor(
    public readonly uri: string,
    public readonly attempts: ReadonlyArray<{ method: string; error: string }>
  ) {
    super(`Cannot launch authorization URL: ${uri}`, 'launch', AUTH_MESSAGES.LAUNCH_FAILED);
  }
}

export type SecurityReason = 'state_mismatch' | 'unsafe_uri';

/**
 * CSRF state mismatch or an unsafe launch URI. Never retried silently.
 */
export class SecurityError extends LoopbackAuthError {
  constructor(message: string, public readonly reason: SecurityReason) {
    super(message, 'security', AUTH_MESSAGES.SECURITY);
  }
}

/**
 * The provider redirected back with an explicit `error` parameter
 */
export class AuthorizationDeniedError extends LoopbackAuthError {
  readonly cancelledByUser: boolean;

  constructor(public readonly errorCode: string, public readonly errorDescription?: string) {
    super(
      `OAuth authorization failed: ${errorCode}${errorDescription ? ` - ${errorDescription}` : ''}`,
      'authorization_denied',
      getDenialMessage(errorCode)
    );
    this.cancelledByUser = errorCode === 'access_denied';
  }
}

/**
 * A redirect arrived carrying neither a code nor an error
 */
export class MalformedRedirectError extends LoopbackAuthError {
  constructor(message: string) {
    super(message, 'malformed_redirect', AUTH_MESSAGES.MALFORMED);
  }
}

/**
 * Transport failure talking to the provider or backend
 */
export class NetworkError extends LoopbackAuthError {
  constructor(message: string, public readonly phase: FlowPhase, options?: { cause?: unknown }) {
    super(message, 'network', AUTH_MESSAGES.NETWORK, options);
  }
}

/**
 * A bounded wait ran out: the browser redirect or an HTTP call
 */
export class TimeoutError extends LoopbackAuthError {
  constructor(
    message: string,
    public readonly phase: FlowPhase,
    public readonly timeoutMs: number,
    userMessage: string = phase === 'redirect' ? AUTH_MESSAGES.REDIRECT_TIMEOUT : AUTH_MESSAGES.TIMEOUT
  ) {
    super(message, 'timeout', userMessage);
  }
}

export interface TokenExchangeErrorDetails {
  phase: FlowPhase;
  status?: number;
  /** OAuth `error` code from the response body, when present */
  errorCode?: string;
  errorDescription?: string;
  /** True when starting sign-in again may succeed (expired code, server hiccup) */
  retryable: boolean;
}

/**
 * The provider or backend rejected an exchange
 */
export class TokenExchangeError extends LoopbackAuthError {
  readonly phase: FlowPhase;
  readonly status?: number;
  readonly errorCode?: string;
  readonly errorDescription?: string;
  readonly retryable: boolean;

  constructor(message: string, details: TokenExchangeErrorDetails) {
    super(
      message,
      'token_exchange',
      details.retryable ? AUTH_MESSAGES.EXCHANGE_RETRY : AUTH_MESSAGES.EXCHANGE_SUPPORT
    );
    this.phase = details.phase;
    this.status = details.status;
    this.errorCode = details.errorCode;
    this.errorDescription = details.errorDescription;
    this.retryable = details.retryable;
  }
}

/**
 * The flow was disposed or its signal aborted before it finished
 */
export class FlowCancelledError extends LoopbackAuthError {
  constructor(message: string = 'OAuth flow was cancelled') {
    super(message, 'cancelled', AUTH_MESSAGES.FLOW_CANCELLED);
  }
}

/**
 * Text to show an end user for any error the flow may surface
 */
export function getUserMessage(error: unknown): string {
  return error instanceof LoopbackAuthError ? error.userMessage : AUTH_MESSAGES.UNEXPECTED;
}

/**
 * Wrap anything thrown inside the flow so callers only ever see LoopbackAuthError
 */
export function toAuthError(error: unknown, phase: FlowPhase): LoopbackAuthError {
  if (error instanceof LoopbackAuthError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new NetworkError(`Unexpected failure during ${phase}: ${message}`, phase, { cause: error });
}
