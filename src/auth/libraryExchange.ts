import {
  CodeChallengeMethod,
  Credentials,
  GenerateAuthUrlOpts,
  GetTokenOptions,
  OAuth2Client
} from 'google-auth-library';
import type { FlowConfig } from '../config/flowConfig.js';
import { PKCEGenerator } from './pkce.js';
import { assertClientConfigured, assertLoopbackRedirectUri } from './authorizationUrl.js';
import { isRecord, readString, withDeadline } from './httpClient.js';
import {
  AuthorizationPlan,
  CodeGrant,
  Credential,
  EXPIRY_BUFFER_MS,
  StrategyDependencies,
  TokenExchangeStrategy,
  TokenSet
} from './tokenExchange.js';
import {
  FlowPhase,
  LoopbackAuthError,
  NetworkError,
  TokenExchangeError
} from '../errors/authErrors.js';
import { createLogger, mask } from '../utils/logger.js';

const logger = createLogger('LibraryExchange');

/**
 * The part of OAuth2Client this strategy uses
 */
export interface LibraryTokenClient {
  generateAuthUrl(opts: GenerateAuthUrlOpts): string;
  getToken(options: GetTokenOptions): Promise<{ tokens: Credentials }>;
  refreshAccessToken(): Promise<{ credentials: Credentials }>;
  setCredentials(credentials: Credentials): void;
  revokeToken(token: string): Promise<unknown>;
}

export interface LibraryDependencies extends StrategyDependencies {
  createClient?: (config: Readonly<FlowConfig>) => LibraryTokenClient;
}

// OAuth2Client talks to Google's endpoints; the configured endpoints apply to the direct strategy
function createOAuth2Client(config: Readonly<FlowConfig>): LibraryTokenClient {
  return new OAuth2Client({
    clientId: config.clientId,
    clientSecret: config.clientSecret,
    transporterOptions: { timeout: config.requestTimeoutMs }
  });
}

/**
 * Map library credentials to the flow's TokenSet
 */
export function tokenSetFromCredentials(
  credentials: Credentials,
  phase: FlowPhase,
  previousRefreshToken?: string
): TokenSet {
  if (!credentials.access_token) {
    throw new TokenExchangeError('Token response has no access_token', { phase, retryable: true });
  }
  return {
    access_token: credentials.access_token,
    id_token: credentials.id_token ?? undefined,
    refresh_token: credentials.refresh_token ?? previousRefreshToken,
    expires_at: typeof credentials.expiry_date === 'number' ? credentials.expiry_date - EXPIRY_BUFFER_MS : undefined,
    token_type: credentials.token_type ?? 'Bearer',
    scope: credentials.scope
  };
}

/**
 * Turn a gaxios failure into the flow's error kinds.
 * HTTP responses become TokenExchangeError; anything without one is a network failure.
 */
export function libraryErrorToAuthError(error: unknown, phase: FlowPhase): LoopbackAuthError {
  if (error instanceof LoopbackAuthError) {
    return error;
  }
  const response = isRecord(error) && isRecord(error.response) ? error.response : undefined;
  const status = response && typeof response.status === 'number' ? response.status : undefined;
  const message = error instanceof Error ? error.message : String(error);

  if (status === undefined) {
    return new NetworkError(`Request for ${phase} failed: ${message}`, phase, { cause: error });
  }

  const data = response && isRecord(response.data) ? response.data : {};
  const errorCode = readString(data, 'error');
  const retryable = errorCode === 'invalid_grant' || status >= 500 || status === 429;
  return new TokenExchangeError(`Token exchange failed: HTTP ${status}${errorCode ? ` (${errorCode})` : ''}`, {
    phase,
    status,
    errorCode,
    errorDescription: readString(data, 'error_description'),
    retryable
  });
}

/**
 * Performs URL construction and exchange through google-auth-library's OAuth2Client
 */
export class LibraryTokenExchange implements TokenExchangeStrategy {
  readonly name = 'library' as const;

  private client?: LibraryTokenClient;
  private readonly createClient: (config: Readonly<FlowConfig>) => LibraryTokenClient;

  constructor(private readonly config: Readonly<FlowConfig>, dependencies: LibraryDependencies = {}) {
    this.createClient = dependencies.createClient ?? createOAuth2Client;
  }

  assertConfigured(): void {
    assertClientConfigured(this.config.clientId, { platforms: this.config.platforms });
  }

  async prepareAuthorization(redirectUri: string): Promise<AuthorizationPlan> {
    assertLoopbackRedirectUri(redirectUri);
    const pkce = PKCEGenerator.generateChallenge();
    const state = PKCEGenerator.generateState();

    const authorizationUrl = this.getClient().generateAuthUrl({
      redirect_uri: redirectUri,
      scope: [...this.config.scopes],
      code_challenge: pkce.codeChallenge,
      code_challenge_method: CodeChallengeMethod.S256,
      state,
      access_type: this.config.hints.accessType,
      prompt: this.config.hints.prompt,
      login_hint: this.config.hints.loginHint
    });

    return { authorizationUrl, expectedState: state, codeVerifier: pkce.codeVerifier };
  }

  async exchangeCode(grant: CodeGrant, plan: AuthorizationPlan, signal?: AbortSignal): Promise<Credential> {
    logger.info('Exchanging authorization code through OAuth2Client', { code: mask(grant.code) });
    const client = this.getClient();
    try {
      const { tokens } = await withDeadline(
        () => client.getToken({
          code: grant.code,
          codeVerifier: plan.codeVerifier,
          redirect_uri: grant.redirectUri
        }),
        { phase: 'code_exchange', timeoutMs: this.config.requestTimeoutMs, signal }
      );
      return { kind: 'provider_tokens', tokens: tokenSetFromCredentials(tokens, 'code_exchange') };
    } catch (error) {
      const authError = libraryErrorToAuthError(error, 'code_exchange');
      logger.error(authError.message);
      throw authError;
    }
  }

  async refresh(refreshToken: string, signal?: AbortSignal): Promise<Credential> {
    const client = this.getClient();
    try {
      client.setCredentials({ refresh_token: refreshToken });
      const { credentials } = await withDeadline(
        () => client.refreshAccessToken(),
        { phase: 'refresh', timeoutMs: this.config.requestTimeoutMs, signal }
      );
      return { kind: 'provider_tokens', tokens: tokenSetFromCredentials(credentials, 'refresh', refreshToken) };
    } catch (error) {
      throw libraryErrorToAuthError(error, 'refresh');
    }
  }

  async revoke(accessToken: string): Promise<void> {
    try {
      await this.getClient().revokeToken(accessToken);
      logger.info('Token revoked successfully');
    } catch (error) {
      logger.warn(`Token revocation error: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private getClient(): LibraryTokenClient {
    if (!this.client) {
      this.client = this.createClient(this.config);
    }
    return this.client;
  }
}
