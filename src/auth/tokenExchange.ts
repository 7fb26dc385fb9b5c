import type { FlowConfig } from '../config/flowConfig.js';
import type { FetchLike } from './httpClient.js';

/**
 * Tokens returned by the provider
 */
export interface TokenSet {
  access_token: string;
  id_token?: string;
  refresh_token?: string;
  /** Epoch milliseconds, already reduced by a clock-skew buffer */
  expires_at?: number;
  token_type: string;
  scope?: string;
}

/**
 * User profile the backend proxy may return alongside its custom token
 */
export interface ProxiedUser {
  uid: string;
  email?: string;
  displayName?: string;
  photoURL?: string;
}

/**
 * What the flow hands back to the caller, who signs in to its own identity system with it
 */
export type Credential =
  | { kind: 'provider_tokens'; tokens: TokenSet }
  | { kind: 'custom_token'; customToken: string; tokens?: TokenSet; user?: ProxiedUser };

/**
 * Everything the orchestrator needs before opening the browser
 */
export interface AuthorizationPlan {
  authorizationUrl: string;
  /** CSRF state the redirect must echo */
  expectedState: string;
  /** PKCE verifier; for the proxied strategy it was minted by the backend */
  codeVerifier: string;
}

export interface CodeGrant {
  code: string;
  state: string;
  redirectUri: string;
}

/**
 * One way of turning an authorization code into a credential
 */
export interface TokenExchangeStrategy {
  readonly name: FlowConfig['strategy'];

  /** Throw ConfigurationError before any I/O when the strategy cannot run */
  assertConfigured(): void;

  prepareAuthorization(redirectUri: string, signal?: AbortSignal): Promise<AuthorizationPlan>;

  exchangeCode(grant: CodeGrant, plan: AuthorizationPlan, signal?: AbortSignal): Promise<Credential>;

  /** Single call-through; no lifecycle management */
  refresh?(refreshToken: string, signal?: AbortSignal): Promise<Credential>;

  /** Best-effort; never throws */
  revoke?(accessToken: string): Promise<void>;
}

export interface StrategyDependencies {
  fetchImpl?: FetchLike;
}

/** Expiry buffer for clock skew and network latency */
export const EXPIRY_BUFFER_MS = 60 * 1000;

export function expiresAtFrom(expiresInSeconds: number | undefined, now: number = Date.now()): number | undefined {
  if (expiresInSeconds === undefined) {
    return undefined;
  }
  return now + expiresInSeconds * 1000 - EXPIRY_BUFFER_MS;
}

/**
 * The access token a credential carries, if any
 */
export function accessTokenOf(credential: Credential): string | undefined {
  return credential.kind === 'provider_tokens' ? credential.tokens.access_token : credential.tokens?.access_token;
}
