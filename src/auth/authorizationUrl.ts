import { ConfigurationError } from '../errors/authErrors.js';

/**
 * Immutable description of one authorization request
 */
export interface AuthorizationRequest {
  readonly clientId: string;
  /** Ordered, de-duplicated */
  readonly scopes: readonly string[];
  readonly redirectUri: string;
  readonly codeChallenge: string;
  readonly codeChallengeMethod: 'S256';
  readonly state: string;
  readonly hints: Readonly<AuthorizationHints>;
}

/**
 * Optional provider hints appended to the authorization URL
 */
export interface AuthorizationHints {
  /** `offline` asks for a refresh token */
  accessType?: 'online' | 'offline';
  /** e.g. `consent` to always show the consent screen */
  prompt?: string;
  loginHint?: string;
}

export interface AuthorizationRequestInput {
  clientId: string;
  scopes: readonly string[];
  redirectUri: string;
  codeChallenge: string;
  state: string;
  hints?: AuthorizationHints;
}

export interface ClientCheckOptions {
  /** Platforms the client id was issued for; empty or absent means all */
  platforms?: readonly string[];
  platform?: NodeJS.Platform;
}

const LOOPBACK_REDIRECT = /^http:\/\/(localhost|127\.0\.0\.1):(\d{1,5})\/?$/;

/**
 * Fail before any network or browser activity when no client id is available
 */
export function assertClientConfigured(clientId: string | undefined, options: ClientCheckOptions = {}): string {
  const platform = options.platform ?? process.platform;
  const platforms = options.platforms ?? [];

  if (!clientId || clientId.trim() === '') {
    throw new ConfigurationError(
      'OAuth client id is not configured: the application was built without OAuth credentials',
      'missing_client_id'
    );
  }
  if (platforms.length > 0 && !platforms.includes(platform)) {
    throw new ConfigurationError(
      `OAuth client id is not configured for platform "${platform}" (configured for: ${platforms.join(', ')})`,
      'unsupported_platform'
    );
  }
  return clientId.trim();
}

export function assertEndpointUrl(name: string, value: string): void {
  if (!URL.canParse(value)) {
    throw new ConfigurationError(`${name} is not a valid URL: "${value}"`, 'invalid_setting');
  }
}

/**
 * Loopback flows only accept `http://localhost:<port>` (or 127.0.0.1)
 */
export function assertLoopbackRedirectUri(redirectUri: string): void {
  const match = LOOPBACK_REDIRECT.exec(redirectUri);
  const port = match ? Number(match[2]) : 0;
  if (!match || port < 1 || port > 65535) {
    throw new ConfigurationError(
      `Redirect URI must be http://localhost:<port>, got "${redirectUri}"`,
      'invalid_redirect_uri'
    );
  }
}

export function createAuthorizationRequest(input: AuthorizationRequestInput): AuthorizationRequest {
  const clientId = assertClientConfigured(input.clientId);
  assertLoopbackRedirectUri(input.redirectUri);

  const scopes = Object.freeze([...new Set(input.scopes.map((scope) => scope.trim()).filter(Boolean))]);

  return Object.freeze({
    clientId,
    scopes,
    redirectUri: input.redirectUri,
    codeChallenge: input.codeChallenge,
    codeChallengeMethod: 'S256' as const,
    state: input.state,
    hints: Object.freeze({ ...input.hints })
  });
}

/**
 * Compose the provider authorization URL. Values are percent-encoded
 * (scopes joined with %20 rather than '+').
 */
export function buildAuthorizationUrl(endpoint: string, request: AuthorizationRequest): string {
  const params: Array<[string, string]> = [
    ['client_id', request.clientId],
    ['redirect_uri', request.redirectUri],
    ['response_type', 'code'],
    ['scope', request.scopes.join(' ')],
    ['code_challenge', request.codeChallenge],
    ['code_challenge_method', request.codeChallengeMethod],
    ['state', request.state]
  ];

  if (request.hints.accessType) {
    params.push(['access_type', request.hints.accessType]);
  }
  if (request.hints.prompt) {
    params.push(['prompt', request.hints.prompt]);
  }
  if (request.hints.loginHint) {
    params.push(['login_hint', request.hints.loginHint]);
  }

  const url = new URL(endpoint);
  const query = params.map(([key, value]) => `${key}=${encodeURIComponent(value)}`).join('&');
  url.search = url.search ? `${url.search.substring(1)}&${query}` : query;
  return url.toString();
}
