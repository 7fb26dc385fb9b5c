import { randomUUID } from 'node:crypto';
import type { FlowConfig } from '../config/flowConfig.js';
import { BrowserLauncher, UrlOpener } from './browserLauncher.js';
import { createTokenExchangeStrategy } from './exchangeStrategies.js';
import type { LibraryDependencies } from './libraryExchange.js';
import {
  AwaitRequestOptions,
  ListenerBinding,
  LoopbackRedirectServer,
  RawRedirect
} from './loopbackServer.js';
import { assertGranted, parseRedirect } from './redirectValidator.js';
import {
  accessTokenOf,
  AuthorizationPlan,
  Credential,
  TokenExchangeStrategy
} from './tokenExchange.js';
import {
  AuthErrorKind,
  FlowCancelledError,
  FlowPhase,
  LoopbackAuthError,
  toAuthError
} from '../errors/authErrors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('OAuthFlow');

export type FlowState =
  | 'Idle'
  | 'ListenerStarted'
  | 'AwaitingRedirect'
  | 'RedirectCaptured'
  | 'Exchanging'
  | 'Succeeded'
  | 'Failed'
  | 'Disposed';

const TERMINAL_STATES: ReadonlySet<FlowState> = new Set(['Succeeded', 'Failed', 'Disposed']);

/**
 * What the orchestrator needs from a loopback listener
 */
export interface RedirectListener {
  start(): Promise<ListenerBinding>;
  awaitRequest(options?: AwaitRequestOptions): Promise<RawRedirect>;
  stop(): Promise<void>;
  isListening(): boolean;
}

export type TransitionObserver = (from: FlowState, to: FlowState, sessionId: string) => void;

export interface OAuthFlowOptions {
  config: Readonly<FlowConfig>;
  /** Defaults to the strategy named by config.strategy */
  strategy?: TokenExchangeStrategy;
  launcher?: UrlOpener;
  createListener?: () => RedirectListener;
  /** Called once the redirect arrives; failures are ignored */
  bringToForeground?: () => void | Promise<void>;
  onTransition?: TransitionObserver;
  dependencies?: LibraryDependencies;
}

export interface SignInOptions {
  signal?: AbortSignal;
}

/**
 * Read-only view of a session; never carries the verifier or state
 */
export interface FlowSessionSnapshot {
  sessionId: string;
  state: FlowState;
  redirectUri?: string;
  port?: number;
  startedAt: number;
  error?: { kind: AuthErrorKind; message: string };
}

interface FlowSession {
  sessionId: string;
  state: FlowState;
  /** Created once any previous session has released its listener */
  listener?: RedirectListener;
  controller: AbortController;
  plan?: AuthorizationPlan;
  redirectUri?: string;
  port?: number;
  startedAt: number;
  error?: LoopbackAuthError;
}

function phaseOf(state: FlowState): FlowPhase {
  switch (state) {
    case 'Exchanging':
    case 'Succeeded':
      return 'code_exchange';
    case 'AwaitingRedirect':
    case 'RedirectCaptured':
      return 'redirect';
    default:
      return 'authorization_url';
  }
}

/**
 * Desktop sign-in orchestrator
 *
 * Runs one loopback Authorization Code + PKCE flow at a time: bind listener,
 * open the browser, capture the redirect, validate it, exchange the code.
 * Starting a new sign-in disposes whatever the previous one was doing.
 */
export class OAuthFlow {
  private readonly config: Readonly<FlowConfig>;
  private readonly strategy: TokenExchangeStrategy;
  private readonly launcher: UrlOpener;
  private readonly createListener: () => RedirectListener;
  private readonly bringToForeground?: () => void | Promise<void>;
  private readonly onTransition?: TransitionObserver;

  private session: FlowSession | null = null;
  /** Credential from the last successful sign-in, kept for signOut */
  private credential: Credential | null = null;

  constructor(options: OAuthFlowOptions) {
    this.config = options.config;
    this.strategy = options.strategy ?? createTokenExchangeStrategy(options.config, options.dependencies);
    this.launcher = options.launcher ?? new BrowserLauncher({ allowedHosts: options.config.allowedHosts });
    this.createListener = options.createListener
      ?? (() => new LoopbackRedirectServer({ appName: options.config.appName }));
    this.bringToForeground = options.bringToForeground;
    this.onTransition = options.onTransition;
  }

  /**
   * Run the full flow and return the credential
   */
  async signIn(options: SignInOptions = {}): Promise<Credential> {
    // The previous session must be cancelled before the first await
    const previous = this.session;
    const previousStopped = previous ? this.cancel(previous) : Promise.resolve();

    if (options.signal?.aborted) {
      await previousStopped;
      throw new FlowCancelledError('Sign-in was cancelled before it started');
    }
    try {
      this.strategy.assertConfigured();
    } catch (error) {
      await previousStopped;
      throw error;
    }

    const session: FlowSession = {
      sessionId: randomUUID(),
      state: 'Idle',
      controller: new AbortController(),
      startedAt: Date.now()
    };
    this.session = session;

    const onCallerAbort = (): void => session.controller.abort();
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    const signal = session.controller.signal;

    logger.info(`Starting ${this.strategy.name} sign-in`, { sessionId: session.sessionId });

    try {
      await previousStopped;
      this.ensureActive(session);

      const listener = this.createListener();
      session.listener = listener;
      const binding = await listener.start();
      this.ensureActive(session);
      session.redirectUri = binding.redirectUri;
      session.port = binding.port;
      this.transition(session, 'ListenerStarted');

      const plan = await this.strategy.prepareAuthorization(binding.redirectUri, signal);
      this.ensureActive(session);
      session.plan = plan;

      const method = await this.launcher.open(plan.authorizationUrl);
      this.ensureActive(session);
      logger.info(`Opened authorization URL (${method}); waiting for redirect`);
      this.transition(session, 'AwaitingRedirect');

      const redirect = await listener.awaitRequest({
        timeoutMs: this.config.redirectTimeoutMs,
        signal
      });
      this.ensureActive(session);
      this.transition(session, 'RedirectCaptured');
      await this.foreground();
      this.ensureActive(session);

      const grant = assertGranted(parseRedirect(redirect.query), plan.expectedState);
      this.transition(session, 'Exchanging');

      const credential = await this.strategy.exchangeCode(
        { code: grant.code, state: grant.state, redirectUri: binding.redirectUri },
        plan,
        signal
      );
      this.ensureActive(session);

      this.credential = credential;
      this.transition(session, 'Succeeded');
      logger.info('Sign-in completed', { sessionId: session.sessionId, kind: credential.kind });
      return credential;
    } catch (error) {
      const authError = this.isDisposed(session)
        ? new FlowCancelledError()
        : toAuthError(error, phaseOf(session.state));
      if (!this.isDisposed(session)) {
        session.error = authError;
        this.transition(session, 'Failed');
      }
      logger.error(`Sign-in failed: ${authError.message}`, { kind: authError.kind });
      throw authError;
    } finally {
      options.signal?.removeEventListener('abort', onCallerAbort);
      await session.listener?.stop();
      session.plan = undefined;
    }
  }

  /**
   * Cancel the current session, if any. Idempotent.
   */
  async dispose(): Promise<void> {
    const session = this.session;
    if (session) {
      await this.cancel(session);
    }
  }

  /**
   * Forget the credential and revoke its access token, best-effort
   */
  async signOut(): Promise<void> {
    const credential = this.credential;
    this.credential = null;
    await this.dispose();

    const accessToken = credential ? accessTokenOf(credential) : undefined;
    if (accessToken && this.strategy.revoke) {
      await this.strategy.revoke(accessToken);
    }
    logger.info('Signed out');
  }

  getState(): FlowState {
    return this.session?.state ?? 'Idle';
  }

  getSession(): FlowSessionSnapshot | null {
    const session = this.session;
    if (!session) {
      return null;
    }
    return {
      sessionId: session.sessionId,
      state: session.state,
      redirectUri: session.redirectUri,
      port: session.port,
      startedAt: session.startedAt,
      error: session.error ? { kind: session.error.kind, message: session.error.message } : undefined
    };
  }

  private transition(session: FlowSession, to: FlowState): void {
    const from = session.state;
    if (from === to || (TERMINAL_STATES.has(from) && to !== 'Disposed')) {
      return;
    }
    session.state = to;
    logger.debug(`${from} -> ${to}`, { sessionId: session.sessionId });
    this.onTransition?.(from, to, session.sessionId);
  }

  /**
   * Mark the session disposed and abort it synchronously; the returned promise
   * settles once its listener is stopped
   */
  private cancel(session: FlowSession): Promise<void> {
    if (this.isDisposed(session)) {
      return Promise.resolve();
    }
    this.transition(session, 'Disposed');
    session.controller.abort();
    session.plan = undefined;
    return session.listener ? session.listener.stop() : Promise.resolve();
  }

  private isDisposed(session: FlowSession): boolean {
    return session.state === 'Disposed';
  }

  private ensureActive(session: FlowSession): void {
    if (this.isDisposed(session) || this.session !== session) {
      throw new FlowCancelledError();
    }
  }

  private async foreground(): Promise<void> {
    if (!this.bringToForeground) {
      return;
    }
    try {
      await this.bringToForeground();
    } catch (error) {
      logger.debug(`Could not bring window to foreground: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
