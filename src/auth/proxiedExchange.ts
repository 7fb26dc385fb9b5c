import type { FlowConfig } from '../config/flowConfig.js';
import { PKCEGenerator } from './pkce.js';
import { assertClientConfigured, assertLoopbackRedirectUri } from './authorizationUrl.js';
import {
  exchangeErrorFromResponse,
  FetchLike,
  isRecord,
  readNumber,
  readString,
  requestJson
} from './httpClient.js';
import {
  AuthorizationPlan,
  CodeGrant,
  Credential,
  expiresAtFrom,
  ProxiedUser,
  StrategyDependencies,
  TokenExchangeStrategy,
  TokenSet
} from './tokenExchange.js';
import {
  ConfigurationError,
  FlowPhase,
  SecurityError,
  TokenExchangeError
} from '../errors/authErrors.js';
import { AUTH_MESSAGES } from '../constants/authMessages.js';
import { createLogger, mask } from '../utils/logger.js';

const logger = createLogger('ProxiedExchange');

export const BACKEND_ROUTES = {
  AUTHORIZATION_URL: 'getOAuthUrl',
  EXCHANGE_CODE: 'exchangeOAuthCode',
  REFRESH_TOKEN: 'refreshOAuthToken'
} as const;

function malformed(phase: FlowPhase, detail: string): TokenExchangeError {
  return new TokenExchangeError(`Authentication server returned an invalid response: ${detail}`, {
    phase,
    retryable: true
  });
}

/**
 * Provider tokens as the backend forwards them: either top-level or under `googleTokens`
 */
function readForwardedTokens(body: Record<string, unknown>): TokenSet | undefined {
  const source = isRecord(body.googleTokens) ? body.googleTokens : body;
  const accessToken = readString(source, 'accessToken');
  if (!accessToken) {
    return undefined;
  }
  return {
    access_token: accessToken,
    id_token: readString(source, 'idToken'),
    refresh_token: readString(source, 'refreshToken'),
    expires_at: expiresAtFrom(readNumber(source, 'expiresIn')),
    token_type: 'Bearer'
  };
}

function readUser(value: unknown): ProxiedUser | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const uid = readString(value, 'uid');
  if (!uid) {
    return undefined;
  }
  return {
    uid,
    email: readString(value, 'email'),
    displayName: readString(value, 'displayName'),
    photoURL: readString(value, 'photoURL')
  };
}

/**
 * Delegates URL construction and the exchange to a backend that holds the client secret.
 * The backend mints state and verifier; this side still checks the echoed state.
 */
export class ProxiedTokenExchange implements TokenExchangeStrategy {
  readonly name = 'proxied' as const;

  private readonly fetchImpl?: FetchLike;

  constructor(private readonly config: Readonly<FlowConfig>, dependencies: StrategyDependencies = {}) {
    this.fetchImpl = dependencies.fetchImpl;
  }

  assertConfigured(): void {
    this.backendUrl();
    if (this.config.clientId) {
      assertClientConfigured(this.config.clientId, { platforms: this.config.platforms });
    }
  }

  async prepareAuthorization(redirectUri: string, signal?: AbortSignal): Promise<AuthorizationPlan> {
    assertLoopbackRedirectUri(redirectUri);
    const url = this.endpoint(BACKEND_ROUTES.AUTHORIZATION_URL);
    url.searchParams.set('redirect_uri', redirectUri);

    logger.info(`Requesting authorization URL from ${url.origin}`);
    const response = await requestJson(url.toString(), {
      method: 'GET',
      phase: 'authorization_url',
      timeoutMs: this.config.requestTimeoutMs,
      timeoutMessage: AUTH_MESSAGES.BACKEND_TIMEOUT,
      signal,
      fetchImpl: this.fetchImpl
    });

    if (!response.ok) {
      throw exchangeErrorFromResponse(response, 'authorization_url', 'Authorization URL request');
    }
    if (!isRecord(response.body)) {
      throw malformed('authorization_url', 'expected a JSON object');
    }

    const authorizationUrl = readString(response.body, 'authUrl');
    const state = readString(response.body, 'state');
    const codeVerifier = readString(response.body, 'codeVerifier');
    if (!authorizationUrl) {
      throw malformed('authorization_url', 'missing authUrl');
    }
    if (!state || !codeVerifier) {
      throw malformed('authorization_url', 'missing state or codeVerifier');
    }
    if (!PKCEGenerator.isValidCodeVerifier(codeVerifier)) {
      throw malformed('authorization_url', 'codeVerifier is not a valid PKCE verifier');
    }

    return { authorizationUrl, expectedState: state, codeVerifier };
  }

  async exchangeCode(grant: CodeGrant, plan: AuthorizationPlan, signal?: AbortSignal): Promise<Credential> {
    if (!PKCEGenerator.statesMatch(plan.expectedState, grant.state)) {
      throw new SecurityError('Invalid state parameter - possible CSRF attack detected', 'state_mismatch');
    }

    logger.info('Exchanging authorization code via authentication server', { code: mask(grant.code) });
    const response = await requestJson(this.endpoint(BACKEND_ROUTES.EXCHANGE_CODE).toString(), {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        code: grant.code,
        state: grant.state,
        codeVerifier: plan.codeVerifier,
        redirectUri: grant.redirectUri
      }),
      phase: 'code_exchange',
      timeoutMs: this.config.requestTimeoutMs,
      timeoutMessage: AUTH_MESSAGES.BACKEND_TIMEOUT,
      signal,
      fetchImpl: this.fetchImpl
    });

    if (!response.ok) {
      const error = exchangeErrorFromResponse(response, 'code_exchange', 'Code exchange');
      logger.error(error.message, { retryable: error.retryable });
      throw error;
    }
    if (!isRecord(response.body)) {
      throw malformed('code_exchange', 'expected a JSON object');
    }

    const customToken = readString(response.body, 'firebaseToken') ?? readString(response.body, 'customToken');
    if (!customToken) {
      throw malformed('code_exchange', 'missing custom token');
    }

    const user = readUser(response.body.user);
    logger.info('Received custom token from authentication server', { uid: user?.uid ?? 'unknown' });
    return {
      kind: 'custom_token',
      customToken,
      tokens: readForwardedTokens(response.body),
      user
    };
  }

  async refresh(refreshToken: string, signal?: AbortSignal): Promise<Credential> {
    const response = await requestJson(this.endpoint(BACKEND_ROUTES.REFRESH_TOKEN).toString(), {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ refreshToken }),
      phase: 'refresh',
      timeoutMs: this.config.requestTimeoutMs,
      timeoutMessage: AUTH_MESSAGES.BACKEND_TIMEOUT,
      signal,
      fetchImpl: this.fetchImpl
    });

    if (!response.ok) {
      throw exchangeErrorFromResponse(response, 'refresh', 'Token refresh');
    }
    const tokens = isRecord(response.body) ? readForwardedTokens(response.body) : undefined;
    if (!tokens) {
      throw malformed('refresh', 'missing accessToken');
    }
    // The backend does not rotate refresh tokens
    return { kind: 'provider_tokens', tokens: { ...tokens, refresh_token: tokens.refresh_token ?? refreshToken } };
  }

  private backendUrl(): string {
    const backendUrl = this.config.backendUrl?.trim();
    if (!backendUrl) {
      throw new ConfigurationError('Authentication server URL is not configured', 'missing_backend_url');
    }
    if (!URL.canParse(backendUrl)) {
      throw new ConfigurationError(`Authentication server URL is not a valid URL: ${backendUrl}`, 'invalid_setting');
    }
    return backendUrl;
  }

  private endpoint(route: string): URL {
    const base = this.backendUrl();
    return new URL(`${base.replace(/\/+$/, '')}/${route}`);
  }
}
