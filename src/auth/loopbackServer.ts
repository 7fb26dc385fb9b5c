import express from 'express';
import { createServer, Server } from 'node:http';
import type { Socket } from 'node:net';
import { renderCallbackPage } from './callbackPages.js';
import { BindError, FlowCancelledError, TimeoutError } from '../errors/authErrors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('LoopbackServer');

/**
 * The single request captured from the browser redirect
 */
export interface RawRedirect {
  method: string;
  /** Request path, normally `/` */
  path: string;
  /** Query parameters, first value per key */
  query: Readonly<Record<string, string>>;
  receivedAt: number;
}

export interface ListenerBinding {
  port: number;
  /** `http://localhost:<port>`, the value registered as redirect_uri */
  redirectUri: string;
}

export interface AwaitRequestOptions {
  /** Reject with TimeoutError after this long; 0 waits forever */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface LoopbackServerOptions {
  /** Interface to bind (default 127.0.0.1) */
  host?: string;
  /** Host name placed in the redirect URI (default localhost) */
  redirectHost?: string;
  /** Shown on the confirmation page */
  appName?: string;
}

interface PendingWait {
  resolve: (redirect: RawRedirect) => void;
  reject: (error: Error) => void;
  cleanup: () => void;
}

/**
 * Single-use loopback HTTP listener for the OAuth redirect
 *
 * Binds an OS-assigned port, answers the first request with a static
 * confirmation page and stops accepting connections straight away. Anything
 * that sneaks in before the socket is closed gets a 409 and is never delivered.
 */
export class LoopbackRedirectServer {
  /** Express application instance for handling HTTP requests */
  private app: express.Application;

  /** HTTP server instance (null when not running) */
  private server: Server | null = null;

  private port = 0;

  /** Active sockets, destroyed on stop so the port is released at once */
  private connections: Set<Socket> = new Set();

  /** First request received; once set, every later request is refused */
  private captured: RawRedirect | null = null;

  /** Set once the captured response has been flushed to the browser */
  private delivered: RawRedirect | null = null;

  private pending: PendingWait | null = null;

  /** Rejects a start() whose bind has not completed yet */
  private cancelStart: ((error: Error) => void) | null = null;

  private readonly host: string;
  private readonly redirectHost: string;
  private readonly appName: string;

  constructor(options: LoopbackServerOptions = {}) {
    this.host = options.host ?? '127.0.0.1';
    this.redirectHost = options.redirectHost ?? 'localhost';
    this.appName = options.appName ?? 'the application';

    this.app = express();
    this.app.disable('x-powered-by');
    this.app.use((req, res) => this.handleRequest(req, res));
  }

  /**
   * Bind to an ephemeral port on the loopback interface
   */
  async start(): Promise<ListenerBinding> {
    if (this.server) {
      throw new BindError(`Loopback listener is already running on port ${this.port}; stop it first`);
    }

    this.captured = null;
    this.delivered = null;

    const server = createServer(this.app);
    this.server = server;

    return new Promise<ListenerBinding>((resolve, reject) => {
      this.cancelStart = reject;
      const settled = (): void => {
        if (this.cancelStart === reject) {
          this.cancelStart = null;
        }
      };

      server.on('connection', (socket: Socket) => {
        this.connections.add(socket);
        socket.on('close', () => this.connections.delete(socket));
      });

      server.once('error', (error: NodeJS.ErrnoException) => {
        logger.error(`Listener error: ${error.code ?? error.message}`);
        settled();
        if (this.server === server) {
          this.server = null;
        }
        reject(new BindError(`Failed to start loopback listener: ${error.code ?? error.message}`, { cause: error }));
      });

      server.listen(0, this.host, () => {
        settled();
        // stop() ran while the bind was in flight
        if (this.server !== server) {
          server.close();
          reject(new FlowCancelledError('Loopback listener stopped before it finished binding'));
          return;
        }
        const address = server.address();
        if (address === null || typeof address === 'string') {
          server.close();
          this.server = null;
          reject(new BindError('Could not determine loopback listener port'));
          return;
        }
        this.port = address.port;
        logger.info(`Listening on http://${this.host}:${this.port}`);
        resolve({ port: this.port, redirectUri: this.getRedirectUri() });
      });
    });
  }

  /**
   * Wait for the redirect. A request that arrived before this call is still returned.
   */
  awaitRequest(options: AwaitRequestOptions = {}): Promise<RawRedirect> {
    if (this.delivered) {
      return Promise.resolve(this.delivered);
    }
    if (!this.server) {
      return Promise.reject(new FlowCancelledError('Loopback listener is not running'));
    }
    if (this.pending) {
      return Promise.reject(new Error('Already waiting for the OAuth redirect'));
    }
    const { timeoutMs = 0, signal } = options;
    if (signal?.aborted) {
      return Promise.reject(new FlowCancelledError('OAuth flow was cancelled before the redirect arrived'));
    }

    return new Promise<RawRedirect>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      const onAbort = (): void => {
        this.failPending(new FlowCancelledError('OAuth flow was cancelled before the redirect arrived'));
      };

      const cleanup = (): void => {
        if (timer) {
          clearTimeout(timer);
        }
        signal?.removeEventListener('abort', onAbort);
        this.pending = null;
      };

      this.pending = { resolve, reject, cleanup };

      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          this.failPending(new TimeoutError(
            `No OAuth redirect received within ${Math.round(timeoutMs / 1000)}s`,
            'redirect',
            timeoutMs
          ));
        }, timeoutMs);
      }
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Stop the listener. Safe to call any number of times.
   */
  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    this.port = 0;

    const cancelStart = this.cancelStart;
    this.cancelStart = null;
    cancelStart?.(new FlowCancelledError('Loopback listener stopped before it finished binding'));
    this.failPending(new FlowCancelledError('Loopback listener stopped before the redirect arrived'));

    if (!server) {
      return;
    }

    for (const socket of this.connections) {
      socket.destroy();
    }
    this.connections.clear();

    await new Promise<void>((resolve) => {
      if (!server.listening) {
        resolve();
        return;
      }
      server.close((error) => {
        if (error) {
          logger.warn(`Error closing listener: ${error.message}`);
        }
        resolve();
      });
    });
    logger.debug('Listener stopped');
  }

  getRedirectUri(): string {
    if (!this.server || this.port === 0) {
      throw new Error('Loopback listener is not running');
    }
    return `http://${this.redirectHost}:${this.port}`;
  }

  getPort(): number {
    return this.port;
  }

  /**
   * True while the socket still accepts new connections
   */
  isListening(): boolean {
    return this.server !== null && this.server.listening;
  }

  private handleRequest(req: express.Request, res: express.Response): void {
    if (this.captured) {
      logger.warn(`Ignoring extra request ${req.method} ${req.path}; redirect already captured`);
      res.status(409).set('Connection', 'close').type('text/plain').send('Sign-in already processed. You can close this tab.');
      return;
    }

    const url = new URL(req.originalUrl, `http://${this.redirectHost}`);
    const firstValues = new Map<string, string>();
    for (const [key, value] of url.searchParams) {
      if (!firstValues.has(key)) {
        firstValues.set(key, value);
      }
    }
    const query: Record<string, string> = Object.fromEntries(firstValues);

    const redirect: RawRedirect = {
      method: req.method,
      path: url.pathname,
      query,
      receivedAt: Date.now()
    };
    this.captured = redirect;

    logger.info('Redirect received', {
      hasCode: firstValues.has('code'),
      hasState: firstValues.has('state'),
      error: query.error
    });

    // No new connections from here on; the in-flight response still completes
    this.server?.close();

    // 'close' covers a browser that hangs up before the body is flushed
    const done = (): void => this.deliver(redirect);
    res.once('finish', done);
    res.once('close', done);
    res.status(200).set('Connection', 'close').type('html').send(renderCallbackPage(query, this.appName));
  }

  private deliver(redirect: RawRedirect): void {
    if (this.delivered) {
      return;
    }
    this.delivered = redirect;
    const pending = this.pending;
    if (pending) {
      pending.cleanup();
      pending.resolve(redirect);
    }
  }

  private failPending(error: Error): void {
    const pending = this.pending;
    if (pending) {
      pending.cleanup();
      pending.reject(error);
    }
  }
}
