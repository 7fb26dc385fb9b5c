import type { FlowConfig } from '../config/flowConfig.js';
import { PKCEGenerator } from './pkce.js';
import {
  assertClientConfigured,
  assertEndpointUrl,
  buildAuthorizationUrl,
  createAuthorizationRequest
} from './authorizationUrl.js';
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
  StrategyDependencies,
  TokenExchangeStrategy,
  TokenSet
} from './tokenExchange.js';
import { FlowPhase, TokenExchangeError } from '../errors/authErrors.js';
import { createLogger, mask } from '../utils/logger.js';

const logger = createLogger('DirectExchange');

/**
 * Parse a provider token response body
 */
export function parseTokenResponse(body: unknown, phase: FlowPhase, previousRefreshToken?: string): TokenSet {
  if (!isRecord(body)) {
    throw new TokenExchangeError('Token endpoint returned a non-JSON body', { phase, retryable: true });
  }
  const accessToken = readString(body, 'access_token');
  if (!accessToken) {
    throw new TokenExchangeError('Token endpoint response has no access_token', { phase, retryable: true });
  }

  return {
    access_token: accessToken,
    id_token: readString(body, 'id_token'),
    refresh_token: readString(body, 'refresh_token') ?? previousRefreshToken,
    expires_at: expiresAtFrom(readNumber(body, 'expires_in')),
    token_type: readString(body, 'token_type') ?? 'Bearer',
    scope: readString(body, 'scope')
  };
}

/**
 * Exchanges the code directly with the provider's token endpoint.
 * The client secret stays on this machine, so this suits "desktop app" clients
 * whose secret is not confidential anyway; PKCE carries the real proof.
 */
export class DirectTokenExchange implements TokenExchangeStrategy {
  readonly name = 'direct' as const;

  private readonly fetchImpl?: FetchLike;

  constructor(private readonly config: Readonly<FlowConfig>, dependencies: StrategyDependencies = {}) {
    this.fetchImpl = dependencies.fetchImpl;
  }

  assertConfigured(): void {
    assertClientConfigured(this.config.clientId, { platforms: this.config.platforms });
    assertEndpointUrl('authorizationEndpoint', this.config.authorizationEndpoint);
    assertEndpointUrl('tokenEndpoint', this.config.tokenEndpoint);
    assertEndpointUrl('revocationEndpoint', this.config.revocationEndpoint);
  }

  async prepareAuthorization(redirectUri: string): Promise<AuthorizationPlan> {
    const pkce = PKCEGenerator.generateChallenge();
    const state = PKCEGenerator.generateState();

    const request = createAuthorizationRequest({
      clientId: this.config.clientId,
      scopes: this.config.scopes,
      redirectUri,
      codeChallenge: pkce.codeChallenge,
      state,
      hints: this.config.hints
    });

    logger.debug('Generated PKCE challenge and state parameter');
    return {
      authorizationUrl: buildAuthorizationUrl(this.config.authorizationEndpoint, request),
      expectedState: state,
      codeVerifier: pkce.codeVerifier
    };
  }

  async exchangeCode(grant: CodeGrant, plan: AuthorizationPlan, signal?: AbortSignal): Promise<Credential> {
    logger.info('Exchanging authorization code for tokens', {
      clientSecret: this.config.clientSecret ? 'provided' : 'not provided (PKCE only)',
      code: mask(grant.code)
    });

    const form = new URLSearchParams({
      client_id: this.config.clientId,
      code: grant.code,
      code_verifier: plan.codeVerifier,
      grant_type: 'authorization_code',
      redirect_uri: grant.redirectUri
    });
    if (this.config.clientSecret) {
      form.set('client_secret', this.config.clientSecret);
    }

    const tokens = await this.postForm(form, 'code_exchange', signal);
    logger.info('Token exchange successful', {
      accessToken: mask(tokens.access_token),
      idToken: tokens.id_token ? 'present' : 'none',
      refreshToken: tokens.refresh_token ? 'present' : 'none'
    });
    return { kind: 'provider_tokens', tokens };
  }

  async refresh(refreshToken: string, signal?: AbortSignal): Promise<Credential> {
    const form = new URLSearchParams({
      client_id: this.config.clientId,
      grant_type: 'refresh_token',
      refresh_token: refreshToken
    });
    if (this.config.clientSecret) {
      form.set('client_secret', this.config.clientSecret);
    }
    const tokens = await this.postForm(form, 'refresh', signal, refreshToken);
    return { kind: 'provider_tokens', tokens };
  }

  async revoke(accessToken: string): Promise<void> {
    const url = new URL(this.config.revocationEndpoint);
    url.searchParams.set('token', accessToken);
    try {
      const response = await requestJson(url.toString(), {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        phase: 'revoke',
        timeoutMs: this.config.requestTimeoutMs,
        fetchImpl: this.fetchImpl
      });
      if (response.ok) {
        logger.info('Token revoked successfully');
      } else {
        // Revocation failure shouldn't block sign-out
        logger.warn(`Token revocation failed: HTTP ${response.status}`);
      }
    } catch (error) {
      logger.warn(`Token revocation error: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private async postForm(
    form: URLSearchParams,
    phase: FlowPhase,
    signal?: AbortSignal,
    previousRefreshToken?: string
  ): Promise<TokenSet> {
    const response = await requestJson(this.config.tokenEndpoint, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: form.toString(),
      phase,
      timeoutMs: this.config.requestTimeoutMs,
      signal,
      fetchImpl: this.fetchImpl
    });

    if (!response.ok) {
      const error = exchangeErrorFromResponse(response, phase, 'Token exchange');
      logger.error(error.message, { retryable: error.retryable });
      throw error;
    }
    return parseTokenResponse(response.body, phase, previousRefreshToken);
  }
}
