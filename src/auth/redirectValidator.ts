import { PKCEGenerator } from './pkce.js';
import {
  AuthorizationDeniedError,
  MalformedRedirectError,
  SecurityError
} from '../errors/authErrors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('RedirectValidator');

/**
 * Classification of the captured redirect
 */
export type RedirectOutcome =
  | { type: 'granted'; code: string; state?: string }
  | { type: 'denied'; errorCode: string; errorDescription?: string; state?: string }
  | { type: 'malformed'; reason: string };

export interface AuthorizationGrant {
  code: string;
  state: string;
}

/** Provider domains an authorization URL may point at, besides localhost */
export const DEFAULT_ALLOWED_HOSTS: readonly string[] = ['google.com', 'googleapis.com'];

/** Characters a shell could interpret. '&', '=' and '?' are legal URL syntax and handled by the launcher. */
const SHELL_METACHARACTERS = /[;|`$<>"'\n\r]/;

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value !== '' ? value : undefined;
}

/**
 * Turn the redirect query into an outcome. No state check here.
 */
export function parseRedirect(query: Readonly<Record<string, string | undefined>>): RedirectOutcome {
  const error = nonEmpty(query.error);
  const code = nonEmpty(query.code);
  const state = nonEmpty(query.state);

  if (error) {
    return { type: 'denied', errorCode: error, errorDescription: nonEmpty(query.error_description), state };
  }
  if (code) {
    return { type: 'granted', code, state };
  }
  return { type: 'malformed', reason: 'Redirect carried neither an authorization code nor an error' };
}

/**
 * Accept only a granted outcome whose state matches the one this flow sent.
 * A denial with a foreign state is treated as forged rather than as a denial.
 */
export function assertGranted(outcome: RedirectOutcome, expectedState: string): AuthorizationGrant {
  switch (outcome.type) {
    case 'granted':
      if (!PKCEGenerator.statesMatch(expectedState, outcome.state)) {
        logger.error('State mismatch on authorization response - possible CSRF attack');
        throw new SecurityError('Invalid state parameter - possible CSRF attack detected', 'state_mismatch');
      }
      return { code: outcome.code, state: expectedState };

    case 'denied':
      if (outcome.state !== undefined && !PKCEGenerator.statesMatch(expectedState, outcome.state)) {
        logger.error('State mismatch on error response - possible CSRF attack');
        throw new SecurityError('Invalid state parameter on error response', 'state_mismatch');
      }
      logger.warn(`Authorization denied by provider: ${outcome.errorCode}`);
      throw new AuthorizationDeniedError(outcome.errorCode, outcome.errorDescription);

    case 'malformed':
      logger.error(`Malformed redirect: ${outcome.reason}`);
      throw new MalformedRedirectError(outcome.reason);
  }
}

export type UriCheck = { ok: true; url: URL } | { ok: false; reason: string };

function hostAllowed(host: string, allowedHosts: readonly string[]): boolean {
  if (host === 'localhost') {
    return true;
  }
  return allowedHosts.some((allowed) => host === allowed || host.endsWith(`.${allowed}`));
}

/**
 * Decide whether a URI may be handed to a process-spawning browser launcher
 */
export function checkLaunchUri(uri: string, allowedHosts: readonly string[] = DEFAULT_ALLOWED_HOSTS): UriCheck {
  if (SHELL_METACHARACTERS.test(uri)) {
    return { ok: false, reason: 'URI contains shell metacharacters' };
  }

  let url: URL;
  try {
    url = new URL(uri);
  } catch {
    return { ok: false, reason: 'URI is not a valid absolute URL' };
  }

  const host = url.hostname.toLowerCase();
  if (url.protocol !== 'https:' && !(url.protocol === 'http:' && host === 'localhost')) {
    return { ok: false, reason: `Scheme ${url.protocol} is not allowed` };
  }
  if (!hostAllowed(host, allowedHosts)) {
    return { ok: false, reason: `Host ${host} is not an allowed identity provider` };
  }
  if (url.username || url.password) {
    return { ok: false, reason: 'URI must not carry credentials' };
  }
  // The string the launcher receives is the rendered one; check that as well
  if (SHELL_METACHARACTERS.test(url.toString())) {
    return { ok: false, reason: 'Rendered URI contains shell metacharacters' };
  }
  return { ok: true, url };
}

/**
 * Throwing form of checkLaunchUri, returning the rendered URL string
 */
export function assertSafeLaunchUri(uri: string, allowedHosts: readonly string[] = DEFAULT_ALLOWED_HOSTS): string {
  const check = checkLaunchUri(uri, allowedHosts);
  if (!check.ok) {
    logger.error(`Refusing to launch authorization URL: ${check.reason}`);
    throw new SecurityError(`Unsafe authorization URI: ${check.reason}`, 'unsafe_uri');
  }
  return check.url.toString();
}
