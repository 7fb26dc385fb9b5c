export { OAuthFlow } from './auth/oauthFlow.js';
export type {
  FlowSessionSnapshot,
  FlowState,
  OAuthFlowOptions,
  RedirectListener,
  SignInOptions,
  TransitionObserver
} from './auth/oauthFlow.js';

export { PKCEGenerator } from './auth/pkce.js';
export type { PKCEChallenge } from './auth/pkce.js';

export { LoopbackRedirectServer } from './auth/loopbackServer.js';
export type { ListenerBinding, RawRedirect, LoopbackServerOptions } from './auth/loopbackServer.js';

export { BrowserLauncher, fallbackCommandFor } from './auth/browserLauncher.js';
export type { UrlOpener, LaunchMethod, FallbackCommand, BrowserLauncherOptions } from './auth/browserLauncher.js';

export {
  assertClientConfigured,
  assertLoopbackRedirectUri,
  buildAuthorizationUrl,
  createAuthorizationRequest
} from './auth/authorizationUrl.js';
export type { AuthorizationHints, AuthorizationRequest } from './auth/authorizationUrl.js';

export {
  assertGranted,
  assertSafeLaunchUri,
  checkLaunchUri,
  DEFAULT_ALLOWED_HOSTS,
  parseRedirect
} from './auth/redirectValidator.js';
export type { RedirectOutcome } from './auth/redirectValidator.js';

export { DirectTokenExchange } from './auth/directExchange.js';
export { ProxiedTokenExchange } from './auth/proxiedExchange.js';
export { LibraryTokenExchange } from './auth/libraryExchange.js';
export type { LibraryTokenClient } from './auth/libraryExchange.js';
export { createTokenExchangeStrategy } from './auth/exchangeStrategies.js';
export { accessTokenOf } from './auth/tokenExchange.js';
export type {
  AuthorizationPlan,
  CodeGrant,
  Credential,
  ProxiedUser,
  TokenExchangeStrategy,
  TokenSet
} from './auth/tokenExchange.js';

export { DEFAULT_CONFIG, ENV_KEYS, loadConfigFile, resolveFlowConfig } from './config/flowConfig.js';
export type { FlowConfig, FlowConfigInput, StrategyName } from './config/flowConfig.js';

export * from './errors/authErrors.js';
export { AUTH_MESSAGES } from './constants/authMessages.js';
export { createLogger, log, mask } from './utils/logger.js';
