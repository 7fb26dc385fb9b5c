import { expect } from 'chai';
import { describe, it, beforeEach, afterEach } from 'mocha';
import sinon from 'sinon';
import { ProxiedTokenExchange } from '../../../src/auth/proxiedExchange.js';
import type { FetchLike } from '../../../src/auth/httpClient.js';
import { DEFAULT_CONFIG, FlowConfig } from '../../../src/config/flowConfig.js';
import {
  ConfigurationError,
  SecurityError,
  TimeoutError,
  TokenExchangeError
} from '../../../src/errors/authErrors.js';
import { AUTH_MESSAGES } from '../../../src/constants/authMessages.js';

const NOW = 1_700_000_000_000;
const VERIFIER = 'v'.repeat(64);

const config: FlowConfig = {
  ...DEFAULT_CONFIG,
  strategy: 'proxied',
  backendUrl: 'https://backend.example.com/api/'
};

const plan = { authorizationUrl: 'https://accounts.google.com/auth', expectedState: 'xyz', codeVerifier: VERIFIER };
const grant = { code: 'validcode', state: 'xyz', redirectUri: 'http://localhost:8080' };

function json(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

const hangingFetch: FetchLike = (_input, init) => new Promise<Response>((_resolve, reject) => {
  init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
});

describe('ProxiedTokenExchange', () => {
  let clock: sinon.SinonFakeTimers;

  beforeEach(() => {
    clock = sinon.useFakeTimers({ now: NOW, toFake: ['Date'] });
  });

  afterEach(() => {
    clock.restore();
  });

  describe('assertConfigured', () => {
    it('should require a backend URL', () => {
      const strategy = new ProxiedTokenExchange({ ...config, backendUrl: undefined });
      try {
        strategy.assertConfigured();
        expect.fail('Expected ConfigurationError');
      } catch (error) {
        expect(error).to.be.instanceOf(ConfigurationError);
        expect(error).to.have.property('reason', 'missing_backend_url');
        expect(error).to.have.property('userMessage', AUTH_MESSAGES.BACKEND_NOT_CONFIGURED);
      }
    });

    it('should reject a backend URL that does not parse', () => {
      const strategy = new ProxiedTokenExchange({ ...config, backendUrl: 'not a url' });
      expect(() => strategy.assertConfigured()).to.throw(ConfigurationError);
    });

    it('should not need a client id', () => {
      expect(() => new ProxiedTokenExchange(config).assertConfigured()).to.not.throw();
    });
  });

  describe('prepareAuthorization', () => {
    it('should ask the backend for the URL, state and verifier', async () => {
      const fetchImpl = sinon.stub().resolves(json(200, {
        authUrl: 'https://accounts.google.com/o/oauth2/v2/auth?client_id=server-client',
        state: 'xyz',
        codeVerifier: VERIFIER
      }));
      const strategy = new ProxiedTokenExchange(config, { fetchImpl });

      const result = await strategy.prepareAuthorization('http://localhost:8080');

      expect(fetchImpl.firstCall.args[0]).to.equal(
        'https://backend.example.com/api/getOAuthUrl?redirect_uri=http%3A%2F%2Flocalhost%3A8080'
      );
      expect(fetchImpl.firstCall.args[1].method).to.equal('GET');
      expect(result).to.deep.equal({
        authorizationUrl: 'https://accounts.google.com/o/oauth2/v2/auth?client_id=server-client',
        expectedState: 'xyz',
        codeVerifier: VERIFIER
      });
    });

    it('should reject a response without authUrl', async () => {
      const fetchImpl = sinon.stub().resolves(json(200, { state: 'xyz', codeVerifier: VERIFIER }));
      const strategy = new ProxiedTokenExchange(config, { fetchImpl });

      try {
        await strategy.prepareAuthorization('http://localhost:8080');
        expect.fail('Expected TokenExchangeError');
      } catch (error) {
        expect(error).to.be.instanceOf(TokenExchangeError);
        expect(error).to.have.property('message', 'Authentication server returned an invalid response: missing authUrl');
      }
    });

    it('should reject a malformed verifier', async () => {
      const fetchImpl = sinon.stub().resolves(json(200, {
        authUrl: 'https://accounts.google.com/auth',
        state: 'xyz',
        codeVerifier: 'short'
      }));
      const strategy = new ProxiedTokenExchange(config, { fetchImpl });

      try {
        await strategy.prepareAuthorization('http://localhost:8080');
        expect.fail('Expected TokenExchangeError');
      } catch (error) {
        expect(error).to.be.instanceOf(TokenExchangeError);
      }
    });

    it('should raise TimeoutError with backend guidance when the backend hangs', async () => {
      const strategy = new ProxiedTokenExchange({ ...config, requestTimeoutMs: 20 }, { fetchImpl: hangingFetch });

      try {
        await strategy.prepareAuthorization('http://localhost:8080');
        expect.fail('Expected TimeoutError');
      } catch (error) {
        expect(error).to.be.instanceOf(TimeoutError);
        expect(error).to.have.property('phase', 'authorization_url');
        expect(error).to.have.property('userMessage', AUTH_MESSAGES.BACKEND_TIMEOUT);
      }
    });
  });

  describe('exchangeCode', () => {
    it('should re-check the state before calling the backend', async () => {
      const fetchImpl = sinon.stub();
      const strategy = new ProxiedTokenExchange(config, { fetchImpl });

      try {
        await strategy.exchangeCode({ ...grant, state: 'evil' }, plan);
        expect.fail('Expected SecurityError');
      } catch (error) {
        expect(error).to.be.instanceOf(SecurityError);
      }
      expect(fetchImpl.called).to.be.false;
    });

    it('should return the custom token with forwarded provider tokens and user', async () => {
      const fetchImpl = sinon.stub().resolves(json(200, {
        firebaseToken: 'CT1',
        googleTokens: { accessToken: 'AT1', refreshToken: 'RT1', expiresIn: 3600, idToken: 'IT1' },
        user: { uid: 'u1', email: 'user@example.com', displayName: 'Test User' }
      }));
      const strategy = new ProxiedTokenExchange(config, { fetchImpl });

      const credential = await strategy.exchangeCode(grant, plan);

      const [url, init] = fetchImpl.firstCall.args;
      expect(url).to.equal('https://backend.example.com/api/exchangeOAuthCode');
      expect(init.method).to.equal('POST');
      expect(JSON.parse(init.body)).to.deep.equal({
        code: 'validcode',
        state: 'xyz',
        codeVerifier: VERIFIER,
        redirectUri: 'http://localhost:8080'
      });
      expect(credential).to.deep.equal({
        kind: 'custom_token',
        customToken: 'CT1',
        tokens: {
          access_token: 'AT1',
          id_token: 'IT1',
          refresh_token: 'RT1',
          expires_at: NOW + 3600 * 1000 - 60 * 1000,
          token_type: 'Bearer'
        },
        user: { uid: 'u1', email: 'user@example.com', displayName: 'Test User', photoURL: undefined }
      });
    });

    it('should accept a bare customToken response', async () => {
      const fetchImpl = sinon.stub().resolves(json(200, { customToken: 'CT2' }));
      const strategy = new ProxiedTokenExchange(config, { fetchImpl });

      expect(await strategy.exchangeCode(grant, plan)).to.deep.equal({
        kind: 'custom_token',
        customToken: 'CT2',
        tokens: undefined,
        user: undefined
      });
    });

    it('should surface a backend rejection as TokenExchangeError', async () => {
      const fetchImpl = sinon.stub().resolves(json(400, { error: 'Invalid state parameter' }));
      const strategy = new ProxiedTokenExchange(config, { fetchImpl });

      try {
        await strategy.exchangeCode(grant, plan);
        expect.fail('Expected TokenExchangeError');
      } catch (error) {
        expect(error).to.be.instanceOf(TokenExchangeError);
        expect(error).to.have.property('message', 'Code exchange failed: HTTP 400 (Invalid state parameter)');
        expect(error).to.have.property('status', 400);
      }
    });
  });

  describe('refresh', () => {
    it('should post the refresh token and keep it in the result', async () => {
      const fetchImpl = sinon.stub().resolves(json(200, { accessToken: 'AT2', expiresIn: 3600, idToken: 'IT2' }));
      const strategy = new ProxiedTokenExchange(config, { fetchImpl });

      const credential = await strategy.refresh('RT1');

      expect(fetchImpl.firstCall.args[0]).to.equal('https://backend.example.com/api/refreshOAuthToken');
      expect(JSON.parse(fetchImpl.firstCall.args[1].body)).to.deep.equal({ refreshToken: 'RT1' });
      expect(credential).to.deep.equal({
        kind: 'provider_tokens',
        tokens: {
          access_token: 'AT2',
          id_token: 'IT2',
          refresh_token: 'RT1',
          expires_at: NOW + 3600 * 1000 - 60 * 1000,
          token_type: 'Bearer'
        }
      });
    });
  });
});
