import { expect } from 'chai';
import { describe, it } from 'mocha';
import sinon from 'sinon';
import type { Credentials, GenerateAuthUrlOpts, GetTokenOptions } from 'google-auth-library';
import {
  libraryErrorToAuthError,
  LibraryTokenClient,
  LibraryTokenExchange
} from '../../../src/auth/libraryExchange.js';
import { PKCEGenerator } from '../../../src/auth/pkce.js';
import { DEFAULT_CONFIG, FlowConfig } from '../../../src/config/flowConfig.js';
import { FlowCancelledError, NetworkError, TimeoutError, TokenExchangeError } from '../../../src/errors/authErrors.js';

const config: FlowConfig = { ...DEFAULT_CONFIG, strategy: 'library', clientId: 'test-client', clientSecret: 'test-secret' };
const plan = { authorizationUrl: 'https://accounts.google.com/auth', expectedState: 'xyz', codeVerifier: 'abc' };
const grant = { code: 'validcode', state: 'xyz', redirectUri: 'http://localhost:8080' };

/**
 * In-memory OAuth2Client stand-in recording what it was asked
 */
class FakeTokenClient implements LibraryTokenClient {
  authUrlOptions: GenerateAuthUrlOpts[] = [];
  tokenRequests: GetTokenOptions[] = [];
  credentials: Credentials = {};
  revoked: string[] = [];
  tokenResult: Credentials = { access_token: 'AT1', id_token: 'IT1', refresh_token: 'RT1', expiry_date: 1_700_003_600_000, token_type: 'Bearer' };
  tokenError?: unknown;

  generateAuthUrl(opts: GenerateAuthUrlOpts): string {
    this.authUrlOptions.push(opts);
    return `https://accounts.google.com/o/oauth2/v2/auth?state=${opts.state ?? ''}`;
  }

  async getToken(options: GetTokenOptions): Promise<{ tokens: Credentials }> {
    this.tokenRequests.push(options);
    if (this.tokenError) {
      throw this.tokenError;
    }
    return { tokens: this.tokenResult };
  }

  async refreshAccessToken(): Promise<{ credentials: Credentials }> {
    return { credentials: { access_token: 'AT2', expiry_date: 1_700_000_120_000, token_type: 'Bearer' } };
  }

  setCredentials(credentials: Credentials): void {
    this.credentials = credentials;
  }

  async revokeToken(token: string): Promise<unknown> {
    this.revoked.push(token);
    return {};
  }
}

/**
 * A client whose token calls never settle
 */
class HangingTokenClient extends FakeTokenClient {
  getToken(options: GetTokenOptions): Promise<{ tokens: Credentials }> {
    this.tokenRequests.push(options);
    return new Promise(() => undefined);
  }

  refreshAccessToken(): Promise<{ credentials: Credentials }> {
    return new Promise(() => undefined);
  }
}

function gaxiosLikeError(status: number, data: unknown): Error {
  return Object.assign(new Error(`Request failed with status code ${status}`), { response: { status, data } });
}

describe('LibraryTokenExchange', () => {
  it('should create the client lazily, once', async () => {
    const client = new FakeTokenClient();
    const createClient = sinon.stub().returns(client);
    const strategy = new LibraryTokenExchange(config, { createClient });

    expect(createClient.called).to.be.false;
    await strategy.prepareAuthorization('http://localhost:8080');
    await strategy.exchangeCode(grant, plan);
    expect(createClient.calledOnceWithExactly(config)).to.be.true;
  });

  it('should pass PKCE, state and hints to generateAuthUrl', async () => {
    const client = new FakeTokenClient();
    const strategy = new LibraryTokenExchange(config, { createClient: () => client });

    const result = await strategy.prepareAuthorization('http://localhost:8080');
    const options = client.authUrlOptions[0];

    expect(result.authorizationUrl).to.equal(`https://accounts.google.com/o/oauth2/v2/auth?state=${result.expectedState}`);
    expect(options.redirect_uri).to.equal('http://localhost:8080');
    expect(options.scope).to.deep.equal(['openid', 'email', 'profile']);
    expect(options.code_challenge).to.equal(PKCEGenerator.generateCodeChallenge(result.codeVerifier));
    expect(options.code_challenge_method).to.equal('S256');
    expect(options.state).to.equal(result.expectedState);
    expect(options.access_type).to.equal('offline');
    expect(options.prompt).to.equal('consent');
  });

  it('should exchange the code with the verifier and map the credentials', async () => {
    const client = new FakeTokenClient();
    const strategy = new LibraryTokenExchange(config, { createClient: () => client });

    const credential = await strategy.exchangeCode(grant, plan);

    expect(client.tokenRequests).to.deep.equal([
      { code: 'validcode', codeVerifier: 'abc', redirect_uri: 'http://localhost:8080' }
    ]);
    expect(credential).to.deep.equal({
      kind: 'provider_tokens',
      tokens: {
        access_token: 'AT1',
        id_token: 'IT1',
        refresh_token: 'RT1',
        expires_at: 1_700_003_600_000 - 60 * 1000,
        token_type: 'Bearer',
        scope: undefined
      }
    });
  });

  it('should map an HTTP failure to TokenExchangeError', async () => {
    const client = new FakeTokenClient();
    client.tokenError = gaxiosLikeError(400, { error: 'invalid_grant', error_description: 'Bad Request' });
    const strategy = new LibraryTokenExchange(config, { createClient: () => client });

    try {
      await strategy.exchangeCode(grant, plan);
      expect.fail('Expected TokenExchangeError');
    } catch (error) {
      expect(error).to.be.instanceOf(TokenExchangeError);
      expect(error).to.have.property('message', 'Token exchange failed: HTTP 400 (invalid_grant)');
      expect(error).to.have.property('retryable', true);
    }
  });

  it('should give up on a code exchange that outlives the request timeout', async () => {
    const client = new HangingTokenClient();
    const strategy = new LibraryTokenExchange({ ...config, requestTimeoutMs: 50 }, { createClient: () => client });

    try {
      await strategy.exchangeCode(grant, plan);
      expect.fail('Expected TimeoutError');
    } catch (error) {
      expect(error).to.be.instanceOf(TimeoutError);
      expect(error).to.have.property('phase', 'code_exchange');
      expect(error).to.have.property('message', 'Request for code_exchange timed out after 50ms');
    }
    expect(client.tokenRequests).to.have.length(1);
  });

  it('should stop waiting for the code exchange when the signal aborts', async () => {
    const strategy = new LibraryTokenExchange(config, { createClient: () => new HangingTokenClient() });
    const controller = new AbortController();

    const pending = strategy.exchangeCode(grant, plan, controller.signal).catch((error: unknown) => error);
    controller.abort();

    expect(await pending).to.be.instanceOf(FlowCancelledError);
  });

  it('should not call the client when the signal is already aborted', async () => {
    const client = new HangingTokenClient();
    const strategy = new LibraryTokenExchange(config, { createClient: () => client });
    const controller = new AbortController();
    controller.abort();

    const outcome = await strategy.exchangeCode(grant, plan, controller.signal).catch((error: unknown) => error);

    expect(outcome).to.be.instanceOf(FlowCancelledError);
    expect(client.tokenRequests).to.have.length(0);
  });

  it('should time out a refresh that never settles', async () => {
    const strategy = new LibraryTokenExchange({ ...config, requestTimeoutMs: 50 }, { createClient: () => new HangingTokenClient() });

    const outcome = await strategy.refresh('RT1').catch((error: unknown) => error);

    expect(outcome).to.be.instanceOf(TimeoutError);
    expect(outcome).to.have.property('phase', 'refresh');
  });

  it('should refresh through setCredentials and refreshAccessToken', async () => {
    const client = new FakeTokenClient();
    const strategy = new LibraryTokenExchange(config, { createClient: () => client });

    const credential = await strategy.refresh('RT1');

    expect(client.credentials).to.deep.equal({ refresh_token: 'RT1' });
    expect(credential.tokens?.access_token).to.equal('AT2');
    expect(credential.tokens?.refresh_token).to.equal('RT1');
    expect(credential.tokens?.expires_at).to.equal(1_700_000_060_000);
  });

  it('should revoke through the client and not throw when revocation fails', async () => {
    const client = new FakeTokenClient();
    const strategy = new LibraryTokenExchange(config, { createClient: () => client });

    await strategy.revoke('AT1');
    expect(client.revoked).to.deep.equal(['AT1']);

    sinon.stub(client, 'revokeToken').rejects(new Error('invalid_token'));
    await strategy.revoke('AT1');
  });
});

describe('libraryErrorToAuthError', () => {
  it('should treat errors without a response as network failures', () => {
    const error = libraryErrorToAuthError(new Error('getaddrinfo ENOTFOUND oauth2.googleapis.com'), 'code_exchange');
    expect(error).to.be.instanceOf(NetworkError);
    expect(error.message).to.equal('Request for code_exchange failed: getaddrinfo ENOTFOUND oauth2.googleapis.com');
  });

  it('should mark client errors as non-retryable', () => {
    const error = libraryErrorToAuthError(gaxiosLikeError(401, { error: 'invalid_client' }), 'code_exchange');
    expect(error).to.be.instanceOf(TokenExchangeError);
    expect(error).to.have.property('retryable', false);
    expect(error).to.have.property('errorCode', 'invalid_client');
  });
});
